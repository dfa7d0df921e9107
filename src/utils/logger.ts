import chalk from 'chalk';
import { Verbosity } from '../interfaces/logger';

export { Verbosity };

// Color helper functions for use across the codebase
export const red = (text: string): string => chalk.red(text);
export const green = (text: string): string => chalk.green(text);
export const yellow = (text: string): string => chalk.yellow(text);
export const blue = (text: string): string => chalk.blue(text);
export const bold = (text: string): string => chalk.bold(text);
export const dim = (text: string): string => chalk.dim(text);

function withNewline(message: string): string {
  return message.endsWith('\n') ? message : message + '\n';
}

export function log(
  message: string,
  level: Verbosity,
  currentVerbosity: number,
): void {
  if (currentVerbosity >= level) {
    process.stdout.write(withNewline(message));
  }
}

export function error(message: string): void {
  process.stderr.write(withNewline(red(`❌ ${message}`)));
}

export function warning(message: string, currentVerbosity: number): void {
  log(yellow(`⚠️ ${message}`), Verbosity.Normal, currentVerbosity);
}

export function info(message: string, currentVerbosity: number): void {
  log(blue(`ℹ️  ${message}`), Verbosity.Normal, currentVerbosity);
}

export function success(message: string, currentVerbosity: number): void {
  log(green(`✅ ${message}`), Verbosity.Normal, currentVerbosity);
}

export function verbose(message: string, currentVerbosity: number): void {
  log(dim(message), Verbosity.Verbose, currentVerbosity);
}

export function always(message: string): void {
  process.stdout.write(withNewline(message));
}
