import chalk from 'chalk';
import { renderLanguages } from '../render';

export function languagesCommand() {
  console.log(chalk.bold('Language    Factor'));
  renderLanguages().forEach((line) => console.log(line));
}
