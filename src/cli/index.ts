#!/usr/bin/env node

/**
 * CLI entry point for the procedural SQL transpiler
 */

import { Command } from 'commander';
import { convertCommand } from './commands/convert';
import { dialectsCommand } from './commands/dialects';

const program = new Command();

program
  .name('proc-transpile')
  .description('Translate stored routines and packages between Oracle, MySQL and PostgreSQL')
  .version('0.1.0');

program
  .argument('[file]', 'SQL script to convert (reads stdin when omitted)')
  .option('-s, --source <dialect>', 'Dialect of the input: oracle, mysql or postgresql')
  .option('-t, --target <dialect>', 'Dialect to produce: oracle, mysql or postgresql')
  .option('-o, --output <path>', 'Write the converted SQL to a file instead of stdout')
  .option('-c, --config <path>', 'Path to a JSON config file')
  .option('--json', 'Print the full conversion result as JSON')
  .option('--format', 'Pretty-print the converted SQL')
  .option('--score', 'Re-parse DML statements of input and output and report a quality score')
  .option('--fail-on <severity>', 'Exit with code 2 when a warning reaches this severity (info, warning, error)')
  .option('-v, --verbose', 'Verbose output')
  .action(convertCommand);

program
  .command('dialects')
  .description('List the supported conversion directions')
  .action(dialectsCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
