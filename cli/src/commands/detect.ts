import fs from 'fs-extra';
import ora from 'ora';
import { parseLanguage, VoiceDetector } from '@voicecheck/core';
import { createCliLogger, errorMessage, exitCodeFor, loadSettings, SettingsFlags } from '../options';
import { renderReport } from '../render';

interface DetectOptions extends SettingsFlags {
  language: string;
  json?: boolean;
}

export async function detectCommand(file: string, options: DetectOptions) {
  const spinner = ora({ text: 'Reading audio...', isEnabled: !options.json }).start();

  try {
    if (!await fs.pathExists(file)) {
      spinner.fail(`File not found: ${file}`);
      process.exit(2);
    }

    const language = parseLanguage(options.language);
    const settings = await loadSettings(options);
    const detector = new VoiceDetector({ ...settings, logger: createCliLogger(options.verbose) });
    const bytes = await fs.readFile(file);

    spinner.text = 'Analyzing voice...';

    if (options.json) {
      const result = await detector.detect(bytes, language);
      spinner.stop();
      console.log(JSON.stringify(result, null, 2));
    } else {
      const analysis = detector.analyze(bytes, language);
      spinner.stop();
      renderReport(file, analysis, options.verbose).forEach((line) => console.log(line));
    }
    process.exit(0);
  } catch (error) {
    spinner.fail(`Detection failed: ${errorMessage(error)}`);
    process.exit(exitCodeFor(error));
  }
}
