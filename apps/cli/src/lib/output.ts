/**
 * Output Formatter
 *
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';

const RULE = '='.repeat(60);
const TITLE = 'MEDIA CONVERTER';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

/**
 * Start a new screen: optionally clear the terminal, then show the banner
 */
export function printBanner(clearScreen: boolean): void {
  if (clearScreen) {
    console.clear();
  }
  const padding = ' '.repeat(Math.floor((RULE.length - TITLE.length) / 2));
  console.log(RULE);
  console.log(chalk.bold(`${padding}${TITLE}`));
  console.log(RULE);
  console.log();
}

export function printHeader(title: string): void {
  console.log(chalk.bold(title));
  console.log();
}

/**
 * A numbered menu entry
 */
export function printOption(key: string | number, label: string): void {
  console.log(`${chalk.cyan(`${key}.`)} ${label}`);
}
