/**
 * Test runner - runs loaded test cases and exports their records
 *
 * 1. Discover test modules under the given paths
 * 2. Import them and collect exported TestCase instances
 * 3. Run each test case in turn, exporting its records as one batch
 * 4. Close the exporter once and print a summary
 *
 * Exit codes: 0 when every test passed, 1 when a test failed, 2 when a lifecycle
 * hook failed or the results could not be written.
 */

import {
  createExporter,
  isLifecycleError,
  SinkError,
  summarize,
  type LifecycleError,
  type ExportFormat,
  type RecordSummary,
  type ResultExporter,
} from '@trialrun/harness';
import { createLogger, type Environment, type Logger } from '@trialrun/logger';
import { discoverModules, loadSuites, type LoadedSuite, type ModuleImporter } from './loader.js';
import { formatSummary, getExitCode } from './summary.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Resolved settings for one invocation
 */
export interface RunSettings {
  format: ExportFormat;
  /** Output file; results go to stdout when absent */
  output?: string;
  durations: boolean;
  color: boolean;
  environment: Environment;
}

/**
 * Result of running one test case
 */
export interface SuiteRun {
  name: string;
  file: string;
  hadFailure: boolean;
  summary: RecordSummary;
  /** Set when setup() or cleanup() failed */
  error?: LifecycleError;
}

export interface RunDependencies {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  cwd?: string;
  importer?: ModuleImporter;
  logger?: Logger;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Run every suite and export each one's records through `exporter`
 */
export async function runSuites(
  suites: LoadedSuite[],
  exporter: ResultExporter,
  logger: Logger,
): Promise<SuiteRun[]> {
  const runs: SuiteRun[] = [];

  for (const { file, suite } of suites) {
    logger.debug('suite_started', { suite: suite.name, file });

    let hadFailure = false;
    let error: LifecycleError | undefined;
    try {
      hadFailure = await suite.run();
    } catch (caught) {
      if (!isLifecycleError(caught)) throw caught;
      error = caught;
      hadFailure = true;
      logger.error('suite_lifecycle_failed', { suite: suite.name, phase: caught.phase, error: caught });
    }

    const records = suite.results();
    exporter.exportResults(records);

    runs.push({
      name: suite.name,
      file,
      hadFailure,
      summary: summarize(records),
      ...(error && { error }),
    });
  }

  return runs;
}

/**
 * Discover, run and export. Resolves to the process exit code.
 */
export async function executeRun(
  paths: string[],
  settings: RunSettings,
  deps: RunDependencies,
): Promise<number> {
  const logger =
    deps.logger ??
    createLogger({
      environment: settings.environment,
      write: (line) => deps.stderr.write(`${line}\n`),
    });

  const files = await discoverModules(paths, deps.cwd);
  if (files.length === 0) {
    deps.stderr.write('No test modules found\n');
    return 0;
  }
  logger.info('modules_discovered', { count: files.length });

  const suites = await loadSuites(files, deps.importer);
  if (suites.length === 0) {
    logger.warn('no_test_cases_found', { modules: files.length });
    deps.stderr.write(`Warning: no test cases exported by ${files.length} test module(s)\n`);
    return 0;
  }

  const exporter = createExporter({
    format: settings.format,
    target: settings.output ? { kind: 'file', path: settings.output } : { kind: 'stream', stream: deps.stdout },
    durations: settings.durations,
    color: settings.color,
  });

  let runs: SuiteRun[];
  try {
    try {
      runs = await runSuites(suites, exporter, logger);
    } finally {
      exporter.close();
    }
    await exporter.flush();
  } catch (error) {
    if (!(error instanceof SinkError)) throw error;
    logger.error('export_failed', { error });
    deps.stderr.write(`Error: ${error.message}\n`);
    return 2;
  }

  deps.stderr.write(`${formatSummary(runs, { color: settings.color }).join('\n')}\n`);
  return getExitCode(runs);
}
