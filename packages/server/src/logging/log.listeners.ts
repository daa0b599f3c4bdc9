import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import chalk from 'chalk';
import type { LogListener, LogPayload } from '@codescout/httpkit';

const levelTags: Record<LogPayload['level'], string> = {
  error: chalk.red('[ERROR]'),
  info: chalk.blue('[INFO]'),
  warn: chalk.yellow('[WARN]'),
  debug: chalk.gray('[DEBUG]'),
  trace: chalk.gray('[TRACE]'),
};

export const formatLogLine = (payload: LogPayload): string => {
  const { level, time = Date.now(), msg, meta } = payload;
  const details = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${levelTags[level]} [${new Date(time).toISOString()}] - ${msg}${details}\n`;
};

/** Colored one-line records; warnings and errors go to stderr. */
export function createConsoleLogListener(
  out: (line: string) => void = (line) => process.stdout.write(line),
  err: (line: string) => void = (line) => process.stderr.write(line),
): LogListener {
  return (payload) => {
    const line = formatLogLine(payload);

    if (payload.level === 'error' || payload.level === 'warn') {
      err(line);
      return;
    }

    out(line);
  };
}

/** Appends one JSON object per record. */
export function createFileLogListener(filename: string): LogListener {
  mkdirSync(dirname(filename), { recursive: true });

  return ({ time = Date.now(), level, msg, meta }) => {
    appendFileSync(filename, `${JSON.stringify({ time, level, msg, meta })}\n`);
  };
}
