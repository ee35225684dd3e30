/**
 * CLI configuration loading
 *
 * Loads defaults from .env files, searching from the current directory
 * up to the filesystem root, then from the process environment.
 */

import type { ExportFormat } from '@trialrun/harness';
import type { Environment } from '@trialrun/logger';
import * as fs from 'node:fs';
import * as path from 'node:path';

export interface CliConfig {
  format?: ExportFormat;
  output?: string;
  durations?: boolean;
  color?: boolean;
  environment?: Environment;
}

const FORMATS: readonly ExportFormat[] = ['text', 'xml'];
const ENVIRONMENTS: readonly Environment[] = ['test', 'development', 'production'];

/**
 * Parse a .env file into a key-value object
 */
export function parseEnvFile(content: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const line of content.split('\n')) {
    const trimmed = line.trim();

    // Skip empty lines and comments
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const eqIndex = trimmed.indexOf('=');
    if (eqIndex === -1) {
      continue;
    }

    const key = trimmed.slice(0, eqIndex).trim();
    let value = trimmed.slice(eqIndex + 1).trim();

    // Remove surrounding quotes if present
    if ((value.startsWith('"') && value.endsWith('"')) ||
        (value.startsWith("'") && value.endsWith("'"))) {
      value = value.slice(1, -1);
    }

    result[key] = value;
  }

  return result;
}

/**
 * Find and load .env file, searching from startDir up to root
 */
function findEnvFile(startDir: string): Record<string, string> | null {
  let currentDir = path.resolve(startDir);

  while (true) {
    const envPath = path.join(currentDir, '.env');

    if (fs.existsSync(envPath)) {
      try {
        const content = fs.readFileSync(envPath, 'utf-8');
        return parseEnvFile(content);
      } catch {
        // Unreadable .env files are skipped, keep searching upward
      }
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      // Reached filesystem root
      break;
    }
    currentDir = parentDir;
  }

  return null;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes'].includes(normalized)) return true;
  if (['0', 'false', 'no'].includes(normalized)) return false;
  return undefined;
}

function pick<T extends string>(allowed: readonly T[], value: string | undefined): T | undefined {
  return allowed.find((candidate) => candidate === value);
}

/**
 * Apply TRIALRUN_* variables on top of an existing config. Invalid values are ignored.
 */
function applyVariables(config: CliConfig, vars: Record<string, string | undefined>): CliConfig {
  const next = { ...config };

  const format = pick(FORMATS, vars.TRIALRUN_FORMAT);
  if (format) next.format = format;

  if (vars.TRIALRUN_OUTPUT) next.output = vars.TRIALRUN_OUTPUT;

  const durations = parseBoolean(vars.TRIALRUN_DURATIONS);
  if (durations !== undefined) next.durations = durations;

  const color = parseBoolean(vars.TRIALRUN_COLOR);
  if (color !== undefined) next.color = color;

  const environment = pick(ENVIRONMENTS, vars.TRIALRUN_ENV);
  if (environment) next.environment = environment;

  return next;
}

/**
 * Load trialrun configuration from environment and .env files
 *
 * Priority (highest to lowest):
 * 1. Process environment variables
 * 2. .env file (searched from cwd upward)
 */
export function loadConfig(
  cwd: string = process.cwd(),
  env: Record<string, string | undefined> = process.env,
): CliConfig {
  let config: CliConfig = {};

  // Load from .env file first (lower priority)
  const envFile = findEnvFile(cwd);
  if (envFile) {
    config = applyVariables(config, envFile);
  }

  // Override with process environment (higher priority)
  return applyVariables(config, env);
}
