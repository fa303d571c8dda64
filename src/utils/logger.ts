import chalk from 'chalk';
import { Verbosity } from '../interfaces/logger';

export { Verbosity };

/**
 * --quiet wins over --verbose.
 */
export function resolveVerbosity(flags: {
  quiet?: boolean;
  verbose?: boolean;
}): Verbosity {
  if (flags.quiet) {
    return Verbosity.Quiet;
  }
  return flags.verbose ? Verbosity.Verbose : Verbosity.Normal;
}

export const red = (text: string): string => chalk.red(text);
export const green = (text: string): string => chalk.green(text);
export const yellow = (text: string): string => chalk.yellow(text);
export const blue = (text: string): string => chalk.blue(text);
export const gray = (text: string): string => chalk.gray(text);
export const bold = (text: string): string => chalk.bold(text);

// Duplicate message tracking
const recentMessages = new Set<string>();
const MAX_RECENT_MESSAGES = 10;
const DUPLICATE_TIMEOUT = 1000;

function clearOldMessages(): void {
  if (recentMessages.size > MAX_RECENT_MESSAGES) {
    recentMessages.clear();
  }
  setTimeout(() => {
    recentMessages.clear();
  }, DUPLICATE_TIMEOUT).unref();
}

function withNewline(message: string): string {
  return message.endsWith('\n') ? message : message + '\n';
}

export function log(
  message: string,
  level: Verbosity,
  currentVerbosity: number,
  allowDuplicates: boolean = true,
): void {
  if (currentVerbosity < level) {
    return;
  }
  if (!allowDuplicates && recentMessages.has(message)) {
    return;
  }

  process.stdout.write(withNewline(message));

  if (!allowDuplicates) {
    recentMessages.add(message);
    clearOldMessages();
  }
}

/**
 * Errors are shown at every verbosity, on stderr.
 */
export function error(message: string): void {
  process.stderr.write(red(`✖ ${message}`) + '\n');
}

export function warning(message: string, currentVerbosity: number): void {
  log(yellow(`⚠ ${message}`), Verbosity.Normal, currentVerbosity, false);
}

export function info(message: string, currentVerbosity: number): void {
  log(blue(`ℹ ${message}`), Verbosity.Normal, currentVerbosity, false);
}

export function success(message: string, currentVerbosity: number): void {
  log(green(`✔ ${message}`), Verbosity.Normal, currentVerbosity, true);
}

export function dim(message: string, currentVerbosity: number): void {
  log(gray(message), Verbosity.Normal, currentVerbosity, true);
}

export function header(title: string, currentVerbosity: number): void {
  log(
    `\n${bold(title)}\n${gray('─'.repeat(title.length))}`,
    Verbosity.Normal,
    currentVerbosity,
    true,
  );
}

export function verbose(message: string, currentVerbosity: number): void {
  log(message, Verbosity.Verbose, currentVerbosity, true);
}

export function always(message: string): void {
  process.stdout.write(withNewline(message));
}
