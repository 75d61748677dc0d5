import chalk from 'chalk';

export interface TextSink {
  write(chunk: string): unknown;
}

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

// Informational lines go to `out`; warnings and errors to `err`.
export const createLogger = (out: TextSink = process.stdout, err: TextSink = process.stderr): Logger => ({
  info: (message) => {
    out.write(`${message}\n`);
  },
  warn: (message) => {
    err.write(`${chalk.yellow('WARN')} ${message}\n`);
  },
  error: (message) => {
    err.write(`${chalk.red('ERROR')} ${message}\n`);
  }
});

export const logger = createLogger();
