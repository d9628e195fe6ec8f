#!/usr/bin/env node

import { Command, program } from 'commander';
import chalk from 'chalk';
import { detectCommand } from './commands/detect';
import { featuresCommand } from './commands/features';
import { batchCommand } from './commands/batch';
import { languagesCommand } from './commands/languages';

const packageJson = require('../package.json');

program
  .name('voicecheck')
  .description('voicecheck - heuristic detection of AI-generated speech')
  .version(packageJson.version);

// Options shared by every command that runs the detector
function withSettings(command: Command) {
  return command
    .option('-b, --battery <name>', 'Check battery: full, lean, core or minimal')
    .option('--max-duration <seconds>', 'Seconds of audio to analyze')
    .option('--sample-rate <hz>', 'Resample to this rate before analysis')
    .option('--native-rate', 'Analyze at the file\'s own sample rate')
    .option('--mfcc <count>', 'Number of MFCC coefficients (13 or 20)')
    .option('-c, --config <path>', 'JSON file with detector settings')
    .option('-v, --verbose', 'Verbose output');
}

// Detect command
withSettings(
  program
    .command('detect <file>')
    .description('Classify a recording as AI-generated or human')
    .requiredOption('-l, --language <language>', 'Spoken language')
    .option('-j, --json', 'Output as JSON')
).action(detectCommand);

// Features command
withSettings(
  program
    .command('features <file>')
    .description('Print the acoustic feature vector of a recording as JSON')
).action(featuresCommand);

// Batch command
withSettings(
  program
    .command('batch <files...>')
    .description('Classify many recordings on a worker pool')
    .requiredOption('-l, --language <language>', 'Spoken language')
    .option('-w, --workers <count>', 'Worker threads (default: cores - 1)')
    .option('-j, --json', 'Output as JSON')
).action(batchCommand);

// Languages command
program
  .command('languages')
  .description('List supported languages and their confidence factors')
  .action(languagesCommand);

// Global error handler
process.on('unhandledRejection', (error) => {
  console.error(chalk.red('Error:'), error);
  process.exit(1);
});

program.parse();
