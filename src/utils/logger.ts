import path from 'path';
import util from 'util';
import log from 'electron-log';

export interface TreeLogger {
  debug(...params: unknown[]): void;
  info(...params: unknown[]): void;
  warn(...params: unknown[]): void;
  error(...params: unknown[]): void;
}

export type TreeLogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggerSetupOptions {
  /** Also append log lines to this file */
  logfile?: string | null;
  level?: TreeLogLevel;
  /** Set to false to keep the console free for tree output */
  console?: boolean;
}

const pad = (value: number) => String(value).padStart(2, '0');

/** `HH:MM:SS [level] message` */
export const formatLogLine = (date: Date, level: string, data: unknown[]) =>
  `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())} [${level}] ${util.format(
    ...data,
  )}`;

// A dedicated instance leaves the host application's default logger untouched.
export const treeLog = log.create({ logId: 'dir-tree' });

treeLog.transports.console.format = ({ message }) => [formatLogLine(message.date, message.level, message.data)];
treeLog.transports.file.format = ({ message }) => [formatLogLine(message.date, message.level, message.data)];

// Console lines go to stderr; stdout is reserved for tree output.
treeLog.transports.console.writeFn = ({ message }) => {
  process.stderr.write(`${util.format(...message.data)}\n`);
};

// Nothing is written until setupLogger runs, so library callers stay quiet.
treeLog.transports.console.level = false;
treeLog.transports.file.level = false;

export const getLogger = (scope: string): TreeLogger => treeLog.scope?.(scope) ?? treeLog;

export const setupLogger = ({
  logfile = null,
  level = 'debug',
  console: toConsole = true,
}: LoggerSetupOptions = {}): TreeLogger => {
  treeLog.transports.console.level = toConsole ? level : false;

  if (logfile) {
    const resolvedLogfile = path.resolve(logfile);
    treeLog.transports.file.resolvePathFn = () => resolvedLogfile;
    treeLog.transports.file.level = level;
  } else {
    treeLog.transports.file.level = false;
  }

  return getLogger('dir-tree');
};

export const resetLogger = () => {
  treeLog.transports.console.level = false;
  treeLog.transports.file.level = false;
};
