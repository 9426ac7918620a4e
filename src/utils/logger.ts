import { createLogger, format, transports } from 'winston';

const { combine, colorize, printf, timestamp } = format;

class Logger {
  private output = createLogger({
    level: 'info',
    format: combine(
      colorize(),
      timestamp({ format: 'HH:mm:ss' }),
      printf(info => `${info.timestamp} [${info.level}] ${info.message}`)
    ),
    transports: [new transports.Console({ stderrLevels: ['error', 'warn'] })]
  });

  setVerbose(verbose: boolean): void {
    this.output.level = verbose ? 'debug' : 'info';
  }

  info(message: string): void {
    this.output.info(message);
  }

  success(message: string): void {
    this.output.info(`✓ ${message}`);
  }

  warn(message: string): void {
    this.output.warn(message);
  }

  error(message: string): void {
    this.output.error(message);
  }

  debug(message: string): void {
    this.output.debug(message);
  }
}

export const logger = new Logger();
