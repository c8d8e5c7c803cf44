import chalk from 'chalk';

export type LogLevel = 'info' | 'success' | 'warn' | 'error' | 'debug';

export interface ScopedLogger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

class Logger implements ScopedLogger {
  private debugMode = process.env.FEEDMIND_DEBUG === '1';
  private quiet = false;

  setDebug(enabled: boolean): void {
    this.debugMode = enabled;
  }

  // --json 输出时屏蔽 info/success，避免污染 stdout
  setQuiet(enabled: boolean): void {
    this.quiet = enabled;
  }

  isDebug(): boolean {
    return this.debugMode;
  }

  info(message: string): void {
    if (this.quiet) return;
    console.log(chalk.blue('ℹ'), message);
  }

  success(message: string): void {
    if (this.quiet) return;
    console.log(chalk.green('✓'), message);
  }

  warn(message: string): void {
    console.warn(chalk.yellow('⚠'), message);
  }

  error(message: string): void {
    console.error(chalk.red('✗'), message);
  }

  debug(message: string): void {
    if (this.debugMode) {
      console.error(chalk.gray('[DEBUG]'), message);
    }
  }

  /** Prefixes every line with `[scope]`, e.g. `logger.scope('LLM')`. */
  scope(name: string): ScopedLogger {
    const tag = `[${name}]`;
    return {
      info: (message) => this.info(`${tag} ${message}`),
      success: (message) => this.success(`${tag} ${message}`),
      warn: (message) => this.warn(`${tag} ${message}`),
      error: (message) => this.error(`${tag} ${message}`),
      debug: (message) => this.debug(`${tag} ${message}`),
    };
  }
}

export const logger = new Logger();
