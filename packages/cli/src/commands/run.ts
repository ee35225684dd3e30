/**
 * trialrun run command
 */

import { Command, Option } from 'commander';
import type { ExportFormat } from '@trialrun/harness';
import type { Environment } from '@trialrun/logger';
import { loadConfig, type CliConfig } from '../config.js';
import { executeRun, type RunSettings } from '../runner/index.js';

export interface RunFlags {
  format?: ExportFormat;
  output?: string;
  durations?: boolean;
  color?: boolean;
  env?: Environment;
}

/**
 * Merge command-line flags over configuration and defaults
 */
export function resolveRunSettings(flags: RunFlags, config: CliConfig, isTTY: boolean): RunSettings {
  const output = flags.output ?? config.output;
  return {
    format: flags.format ?? config.format ?? 'text',
    ...(output !== undefined && { output }),
    durations: flags.durations ?? config.durations ?? false,
    // Colour only by default when writing to an interactive console
    color: flags.color ?? config.color ?? (output === undefined && isTTY),
    environment: flags.env ?? config.environment ?? 'production',
  };
}

export function createRunCommand(): Command {
  return new Command('run')
    .description('Run exported test cases and export their results')
    .argument('[paths...]', 'Test modules or directories to search', ['.'])
    .addOption(new Option('--format <type>', 'Output format').choices(['text', 'xml']))
    .option('-o, --output <file>', 'Write results to a file instead of stdout')
    .option('-d, --durations', 'Include test durations')
    .option('--color', 'Force coloured output')
    .option('--no-color', 'Disable coloured output')
    .addOption(
      new Option('--env <environment>', 'Logging environment').choices(['test', 'development', 'production']),
    )
    .action(async (paths: string[], flags: RunFlags) => {
      try {
        const settings = resolveRunSettings(flags, loadConfig(), Boolean(process.stdout.isTTY));
        const code = await executeRun(paths, settings, {
          stdout: process.stdout,
          stderr: process.stderr,
        });
        process.exit(code);
      } catch (error) {
        console.error('Error:', error instanceof Error ? error.message : error);
        process.exit(2);
      }
    });
}
