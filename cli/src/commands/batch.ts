import fs from 'fs-extra';
import chalk from 'chalk';
import ora from 'ora';
import { DetectionPool, DetectionResult, Language, parseLanguage } from '@voicecheck/core';
import { createCliLogger, errorMessage, exitCodeFor, loadSettings, positiveIntegerFlag, SettingsFlags } from '../options';
import { formatPercent } from '../render';

interface BatchOptions extends SettingsFlags {
  language: string;
  workers?: string;
  json?: boolean;
}

export type BatchEntry =
  | { file: string; ok: true; result: DetectionResult }
  | { file: string; ok: false; error: string };

export function formatBatchEntry(entry: BatchEntry): string {
  if (entry.ok) {
    return `${chalk.green('✓')} ${entry.file}  ${entry.result.result}  ${formatPercent(entry.result.confidence)}`;
  }
  return `${chalk.red('✗')} ${entry.file}  ${chalk.red(entry.error)}`;
}

async function detectFile(pool: DetectionPool, file: string, language: Language): Promise<BatchEntry> {
  try {
    const bytes = await fs.readFile(file);
    return { file, ok: true, result: await pool.run(bytes, language) };
  } catch (error) {
    return { file, ok: false, error: errorMessage(error) };
  }
}

export async function batchCommand(files: string[], options: BatchOptions) {
  const spinner = ora({ text: `Analyzing ${files.length} files...`, isEnabled: !options.json }).start();
  let pool: DetectionPool | undefined;

  try {
    const language = parseLanguage(options.language);
    const settings = await loadSettings(options);
    const size = options.workers === undefined ? undefined : positiveIntegerFlag('--workers', options.workers);
    pool = new DetectionPool({ size, settings, logger: createCliLogger(options.verbose) });

    const activePool = pool;
    const entries = await Promise.all(files.map((file) => detectFile(activePool, file, language)));
    spinner.stop();

    if (options.json) {
      console.log(JSON.stringify(entries, null, 2));
    } else {
      entries.forEach((entry) => console.log(formatBatchEntry(entry)));
      const failed = entries.filter((entry) => !entry.ok).length;
      console.log('\n' + chalk.gray('Processed:'), files.length, chalk.gray('Failed:'), failed);
    }

    await pool.close();
    process.exit(entries.every((entry) => entry.ok) ? 0 : 1);
  } catch (error) {
    spinner.fail(`Batch failed: ${errorMessage(error)}`);
    await pool?.close();
    process.exit(exitCodeFor(error));
  }
}
