#!/usr/bin/env tsx
/**
 * CLI Entry Point
 *
 * Command-line interface for drive-verify.
 * The verification itself lives in @drive-verify/validation; commands only
 * wire options to it and print the result.
 */

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import { reportCommand } from './commands/report.js';
import { verifyCommand } from './commands/verify.js';
import { audioFormatsHelp } from './lib/output.js';

const program = new Command();

program
  .name('drive-verify')
  .description('Check a USB audio drive for problems a car head unit will not accept')
  .version('1.0.0');

program
  .command('verify <path>')
  .description('Scan a mounted drive and write a CSV report')
  .option('-m, --mount <path>', 'Mount point to inspect, when it differs from the scanned path')
  .option('-w, --workers <count>', 'Number of files analysed at once')
  .option('-o, --output-dir <dir>', 'Directory for the CSV report')
  .option('-l, --limits <file>', 'JSON file overriding the default limits')
  .option('--max-lines <count>', 'Records printed per severity', '50')
  .option('--no-csv', 'Do not write a CSV report')
  .option('--json', 'Output in JSON format')
  .addHelpText('after', audioFormatsHelp())
  .action(verifyCommand);

program
  .command('report <csv>')
  .description('Summarize an existing CSV report by issue type')
  .option('--json', 'Output in JSON format')
  .action(reportCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('drive-verify --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

try {
  await program.parseAsync(process.argv);
} catch (error) {
  if (!(error instanceof CommanderError)) {
    console.error(chalk.red('✗'), error instanceof Error ? error.message : String(error));
  }
  process.exitCode = 1;
}
