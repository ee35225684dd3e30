import { Command } from 'commander';
import { createRunCommand } from './commands/run.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program.name('trialrun').description('Run test cases and export their results').version(VERSION);

  // Register commands
  program.addCommand(createRunCommand());

  return program;
}
