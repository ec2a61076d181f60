import os from 'os';
import path from 'path';
import log from 'electron-log/node';
import type { FsError } from '../common/fsError';

export interface LoggingOptions {
  verbose: boolean;
  logFile: string | null;
}

export const DEFAULT_LOG_FILE = path.join(os.tmpdir(), 'dirtree.log');

const isTestRun = () =>
  process.env.JEST_WORKER_ID !== undefined || process.env.NODE_ENV === 'test';

let verboseEnabled = false;

if (isTestRun()) {
  log.transports.console.level = false;
  log.transports.file.level = false;
}

/**
 * Routes logs to a file only. The explorer owns the terminal, so the console
 * transport stays off for the whole session.
 */
export const configureLogging = (options: LoggingOptions) => {
  verboseEnabled = options.verbose;
  log.transports.console.level = false;
  if (isTestRun()) {
    log.transports.file.level = false;
    return;
  }
  log.transports.file.level = options.verbose ? 'debug' : 'info';
  const logFile = options.logFile ?? DEFAULT_LOG_FILE;
  log.transports.file.resolvePathFn = () => logFile;
};

export const sessionLog = log.scope('session');
export const fsLog = log.scope('fs');
export const appLog = log.scope('app');

export const indentBlock = (value: string, indent = '   ') =>
  value
    .split('\n')
    .map((line) => `${indent}${line}`)
    .join('\n');

export const formatDuration = (durationMs: number) =>
  `${(durationMs / 1000).toFixed(durationMs >= 10000 ? 1 : 2)} s`;

export const formatLogLines = (header: string, details: string[] = []) => {
  const lines = [header];
  details.forEach((detail) => {
    lines.push(indentBlock(detail));
  });
  return lines.join('\n');
};

export interface OperationLogInfo {
  operation: string;
  path: string;
  destination?: string;
}

export const logOperation = (info: OperationLogInfo) => {
  const details = [`Path: ${info.path}`];
  if (info.destination) {
    details.push(`Destination: ${info.destination}`);
  }
  fsLog.info(formatLogLines(`${info.operation} applied`, details));
};

export interface RefreshLogInfo {
  rootPath: string;
  entryCount: number;
  expandedCount: number;
  durationMs: number;
}

export const logRefresh = (info: RefreshLogInfo) => {
  if (!verboseEnabled) return;
  sessionLog.debug(
    formatLogLines(`Rebuilt tree for ${info.rootPath}`, [
      `Entries: ${info.entryCount}`,
      `Expanded directories: ${info.expandedCount}`,
      `Duration: ${formatDuration(info.durationMs)}`,
    ]),
  );
};

export const logFsError = (error: FsError, operation: string) => {
  const details = [`Kind: ${error.kind}`];
  if (error.path) {
    details.push(`Path: ${error.path}`);
  }
  if (error.cause instanceof Error && error.cause.message !== error.message) {
    details.push(`Cause: ${error.cause.message}`);
  }
  fsLog.error(formatLogLines(`${operation} failed: ${error.message}`, details));
};
