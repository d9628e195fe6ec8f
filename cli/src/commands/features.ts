import fs from 'fs-extra';
import chalk from 'chalk';
import { VoiceDetector } from '@voicecheck/core';
import { createCliLogger, errorMessage, exitCodeFor, loadSettings, SettingsFlags } from '../options';

export async function featuresCommand(file: string, options: SettingsFlags) {
  try {
    if (!await fs.pathExists(file)) {
      console.error(chalk.red(`File not found: ${file}`));
      process.exit(2);
    }

    const settings = await loadSettings(options);
    const detector = new VoiceDetector({ ...settings, logger: createCliLogger(options.verbose) });
    const signal = detector.decode(await fs.readFile(file));
    const features = detector.extractFeatures(signal);

    console.log(JSON.stringify(features, null, 2));
    process.exit(0);
  } catch (error) {
    console.error(chalk.red('Feature extraction failed:'), errorMessage(error));
    process.exit(exitCodeFor(error));
  }
}
