import chalk from 'chalk';

/**
 * Simple logger with colored output
 */
export class Logger {
  constructor(private verbose: boolean = false, private quiet: boolean = false) {}

  get isVerbose(): boolean {
    return this.verbose && !this.quiet;
  }

  get isQuiet(): boolean {
    return this.quiet;
  }

  error(message: string, details?: unknown): void {
    if (this.quiet) return;
    console.error(chalk.red('❌ Error:'), message);
    if (this.verbose && details) {
      console.error(chalk.gray(this.formatDetails(details)));
    }
  }

  warn(message: string, details?: unknown): void {
    if (this.quiet) return;
    console.warn(chalk.yellow('⚠️  Warning:'), message);
    if (this.verbose && details) {
      console.warn(chalk.gray(this.formatDetails(details)));
    }
  }

  info(message: string, details?: unknown): void {
    if (this.quiet) return;
    console.log(chalk.blue('ℹ️  Info:'), message);
    if (this.verbose && details) {
      console.log(chalk.gray(this.formatDetails(details)));
    }
  }

  success(message: string, details?: unknown): void {
    if (this.quiet) return;
    console.log(chalk.green('✅ Success:'), message);
    if (this.verbose && details) {
      console.log(chalk.gray(this.formatDetails(details)));
    }
  }

  debug(message: string, details?: unknown): void {
    if (!this.verbose || this.quiet) return;
    console.log(chalk.gray('🔍 Debug:'), message);
    if (details) {
      console.log(chalk.gray(this.formatDetails(details)));
    }
  }

  log(message: string): void {
    if (this.quiet) return;
    console.log(message);
  }

  private formatDetails(details: unknown): string {
    if (typeof details === 'string') {
      return details;
    }
    if (details instanceof Error) {
      return details.stack ?? details.message;
    }
    return JSON.stringify(details, null, 2);
  }
}

