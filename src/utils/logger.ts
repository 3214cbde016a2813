import path from 'path';
import winston from 'winston';
import chalk from 'chalk';
import { env } from '../config';

const { combine, timestamp, printf, errors } = winston.format;

type Paint = chalk.Chalk;

// Color definitions for different log levels
const levelColors: Record<string, Paint> = {
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.blue,
  http: chalk.magenta,
  debug: chalk.cyan,
};

const levelBrightColors: Record<string, Paint> = {
  error: chalk.redBright,
  warn: chalk.yellowBright,
  info: chalk.blueBright,
  http: chalk.magentaBright,
  debug: chalk.cyanBright,
};

const levelIcons: Record<string, string> = {
  error: '❌',
  warn: '⚠️ ',
  info: 'ℹ️ ',
  http: '🌐',
  debug: '🔍',
};

// Custom colorized format for console output
const colorizedFormat = printf(({ level, message, timestamp: ts, stack }) => {
  const color = levelColors[level] ?? chalk.white;
  const brightColor = levelBrightColors[level] ?? chalk.whiteBright;
  const icon = levelIcons[level] ?? '📝';

  const timestampStr = chalk.gray(`[${String(ts)}]`);
  const levelStr = color(`[${level.toUpperCase()}]`);
  const iconStr = icon;

  // Format the message - use bright color for strings
  const formattedMessage = typeof message === 'string' ? brightColor(message) : message;

  // Include stack trace for errors
  const output = stack
    ? `${timestampStr} ${iconStr} ${levelStr}\n${chalk.red(String(stack))}`
    : `${timestampStr} ${iconStr} ${levelStr} ${formattedMessage}`;

  return output;
});

// Simple format for file output (no colors)
const fileFormat = printf(({ level, message, timestamp: ts, stack }) => {
  return `${String(ts)} [${level.toUpperCase()}]: ${String(stack ?? message)}`;
});

const STAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss';

// Timestamp and stack capture in front of a line format
const stamped = (line: winston.Logform.Format): winston.Logform.Format =>
  combine(timestamp({ format: STAMP_FORMAT }), errors({ stack: true }), line);

// Create logger instance
const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: combine(timestamp({ format: STAMP_FORMAT }), errors({ stack: true })),
  defaultMeta: { service: 'ledger-reconciliation' },
  transports: [new winston.transports.Console({ format: stamped(colorizedFormat) })],
});

// Add file transports in production
if (env.NODE_ENV === 'production') {
  logger.add(
    new winston.transports.File({
      filename: path.join(env.LOG_DIR, 'error.log'),
      level: 'error',
      format: stamped(fileFormat),
    })
  );
  logger.add(
    new winston.transports.File({
      filename: path.join(env.LOG_DIR, 'combined.log'),
      format: stamped(fileFormat),
    })
  );
}

const toMessage = (args: unknown): string =>
  typeof args === 'string' ? args : JSON.stringify(args, null, 2);

// Static helpers for plain and decorated console output.
// Errors go through logger.error directly so winston keeps their stack.
export class Logging {
  public static info = (args: unknown): void => {
    logger.info(toMessage(args));
  };

  public static warn = (args: unknown): void => {
    logger.warn(toMessage(args));
  };

  public static debug = (args: unknown): void => {
    logger.debug(toMessage(args));
  };

  public static http = (args: unknown): void => {
    logger.http(toMessage(args));
  };

  // Pretty formatted success message
  public static success = (args: unknown): void => {
    const message = toMessage(args);
    const ts = new Date().toISOString().replace('T', ' ').substring(0, 19);
    // eslint-disable-next-line no-console
    console.log(chalk.gray(`[${ts}]`), '✅', chalk.green('[SUCCESS]'), chalk.greenBright(message));
  };

  // Box-styled important message; one row per line
  public static box = (title: string, ...lines: string[]): void => {
    const width = Math.max(50, title.length + 2, ...lines.map((line) => line.length + 2));
    const rule = '═'.repeat(width);
    const row = (text: string): string => ` ${text}`.padEnd(width);

    // eslint-disable-next-line no-console
    console.log(chalk.cyan(`╔${rule}╗`));
    // eslint-disable-next-line no-console
    console.log(chalk.cyan('║') + chalk.bold.cyanBright(row(title)) + chalk.cyan('║'));
    // eslint-disable-next-line no-console
    console.log(chalk.cyan(`╠${rule}╣`));
    for (const line of lines) {
      // eslint-disable-next-line no-console
      console.log(chalk.cyan('║') + chalk.white(row(line)) + chalk.cyan('║'));
    }
    // eslint-disable-next-line no-console
    console.log(chalk.cyan(`╚${rule}╝`));
  };
}

export default logger;
