/**
 * Test module discovery and loading
 *
 * A test module is any ES module whose exports include TestCase instances. They are
 * recognised by brand, so modules bundled with their own copy of the harness work too.
 */

import { isTestCase, type RunnableTestCase } from '@trialrun/harness';
import { glob } from 'glob';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { pathToFileURL } from 'node:url';

export const DEFAULT_PATTERN = '**/*.cases.{js,mjs}';

export type ModuleImporter = (url: string) => Promise<unknown>;

export interface LoadedSuite {
  file: string;
  /** Export name the test case was found under */
  exportName: string;
  suite: RunnableTestCase;
}

/**
 * Thrown when a path or module cannot be loaded
 */
export class ModuleLoadError extends Error {
  readonly file: string;

  constructor(message: string, file: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ModuleLoadError';
    this.file = file;
  }
}

const importModule: ModuleImporter = (url) => import(url);

/**
 * Resolve file and directory arguments to test module paths.
 * Directories are searched with `pattern`; files are taken as given.
 */
export async function discoverModules(
  paths: string[],
  cwd: string = process.cwd(),
  pattern: string = DEFAULT_PATTERN,
): Promise<string[]> {
  const files: string[] = [];

  for (const p of paths) {
    const resolved = path.resolve(cwd, p);

    let stats: fs.Stats;
    try {
      stats = fs.statSync(resolved);
    } catch (error) {
      throw new ModuleLoadError(`Path not found: ${p}`, resolved, error);
    }

    if (stats.isDirectory()) {
      const found = await glob(pattern, {
        cwd: resolved,
        absolute: true,
        nodir: true,
        ignore: ['**/node_modules/**'],
      });
      files.push(...found.sort());
    } else {
      files.push(resolved);
    }
  }

  return [...new Set(files)];
}

/**
 * TestCase instances exported by a module namespace, each once
 */
export function collectSuites(file: string, namespace: unknown): LoadedSuite[] {
  if (typeof namespace !== 'object' || namespace === null) {
    return [];
  }

  const seen = new Set<RunnableTestCase>();
  const suites: LoadedSuite[] = [];

  for (const [exportName, value] of Object.entries(namespace)) {
    if (isTestCase(value) && !seen.has(value)) {
      seen.add(value);
      suites.push({ file, exportName, suite: value });
    }
  }

  return suites;
}

/**
 * Import each module and collect its test cases, in file order
 */
export async function loadSuites(
  files: string[],
  importer: ModuleImporter = importModule,
): Promise<LoadedSuite[]> {
  const suites: LoadedSuite[] = [];

  for (const file of files) {
    let namespace: unknown;
    try {
      namespace = await importer(pathToFileURL(file).href);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ModuleLoadError(`Failed to load ${file}: ${reason}`, file, error);
    }
    suites.push(...collectSuites(file, namespace));
  }

  return suites;
}
