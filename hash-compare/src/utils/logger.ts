import chalk from 'chalk';

/**
 * Console logger. Everything goes to stderr so stdout only ever carries
 * the rendered comparison.
 */
class Logger {
  private debugEnabled = false;

  enableDebug(): void {
    this.debugEnabled = true;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.debugEnabled) {
      console.error(chalk.gray(`[DEBUG] ${message}`), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    console.error(chalk.blue(`[INFO] ${message}`), ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    console.error(chalk.yellow(`[WARN] ${message}`), ...args);
  }

  error(message: string, ...args: unknown[]): void {
    console.error(chalk.red(`[ERROR] ${message}`), ...args);
  }

  success(message: string, ...args: unknown[]): void {
    console.error(chalk.green(`[SUCCESS] ${message}`), ...args);
  }
}

export const logger = new Logger();
