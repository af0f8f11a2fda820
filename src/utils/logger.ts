import path from 'path';

export enum LogLevel {
  DEBUG = 'DEBUG',
  LOG = 'LOG',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.LOG]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

export type ExtraInformation = Record<string, string | number | boolean | null | undefined>;

export interface LogEntry {
  fileName: string;
  functionName: string;
  context?: string;
  level: LogLevel;
  message: string;
}

/**
 * Extracts caller information from the call stack
 * @param depth How deep in the call stack to look (2 = caller of caller)
 */
function getCallerInfo(depth: number = 2): { fileName: string; functionName: string } {
  const originalPrepareStackTrace = Error.prepareStackTrace;

  try {
    Error.prepareStackTrace = (_, stack) => stack;
    const stack = new Error().stack as unknown as NodeJS.CallSite[];

    if (stack && stack.length > depth) {
      const caller = stack[depth];
      const fileName = caller.getFileName();
      const functionName = caller.getFunctionName();

      return {
        fileName: fileName ? path.basename(fileName, '.ts') : 'unknown',
        functionName: functionName || 'anonymous',
      };
    }
  } finally {
    Error.prepareStackTrace = originalPrepareStackTrace;
  }

  return {
    fileName: 'unknown',
    functionName: 'unknown',
  };
}

function formatExtraInformation(extraInformation: ExtraInformation): string {
  return Object.entries(extraInformation)
    .map(([key, value]) => `${key}: ${value}`)
    .join(' | ');
}

function isExtraInformation(value: unknown): value is ExtraInformation {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.getPrototypeOf(value) === Object.prototype &&
    Object.keys(value).length > 0
  );
}

/**
 * Resolves the minimum level to print from LOG_LEVEL, defaulting to DEBUG.
 */
function minimumLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL?.toUpperCase();
  const match = Object.values(LogLevel).find((level) => level === configured);
  return match ?? LogLevel.DEBUG;
}

/**
 * Builds the single output line for a log call.
 * Format: `[context | ]LEVEL | file:function | message[ | key: value ...]`
 */
export function formatLogLine(entry: LogEntry, extraInformation?: ExtraInformation): string {
  const parts: string[] = [];

  if (entry.context) {
    parts.push(entry.context);
  }

  parts.push(entry.level);
  parts.push(`${entry.fileName}:${entry.functionName}`);
  parts.push(entry.message);

  if (extraInformation && Object.keys(extraInformation).length > 0) {
    parts.push(formatExtraInformation(extraInformation));
  }

  return parts.join(' | ');
}

/**
 * Main logging function
 * @param level Log level
 * @param args Message parts and optional extraInformation
 */
function logMessage(level: LogLevel, ...args: unknown[]): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel()]) {
    return;
  }

  const { fileName, functionName } = getCallerInfo(3); // 3 because we go through helper methods

  // A trailing plain object is treated as key/value context, not as part of the message
  let extraInformation: ExtraInformation | undefined;
  let messageParts = args;

  const lastArg = args[args.length - 1];
  if (isExtraInformation(lastArg)) {
    extraInformation = lastArg;
    messageParts = args.slice(0, -1);
  }

  // Join message parts like console.log does
  const message = messageParts
    .map((part) => (typeof part === 'string' ? part : part instanceof Error ? part.message : JSON.stringify(part)))
    .join(' ');

  const entry: LogEntry = {
    fileName,
    functionName,
    level,
    message,
  };

  if (process.env.LOG_CONTEXT) {
    entry.context = process.env.LOG_CONTEXT;
  }

  const fullOutput = formatLogLine(entry, extraInformation);

  switch (level) {
    case LogLevel.DEBUG:
      console.debug(fullOutput);
      break;
    case LogLevel.LOG:
      console.log(fullOutput);
      break;
    case LogLevel.WARN:
      console.warn(fullOutput);
      break;
    case LogLevel.ERROR:
      console.error(fullOutput);
      break;
  }
}

/**
 * Debug level logging - accepts multiple message parts like console.log
 * @param args Message parts and optional extraInformation (e.g., 'Walking cycles for', name, { cycle: 'monthly' })
 */
export function debug(...args: unknown[]): void {
  logMessage(LogLevel.DEBUG, ...args);
}

/**
 * Info level logging - accepts multiple message parts like console.log
 * @param args Message parts and optional extraInformation (e.g., 'Reminders sent', { successCount: 3 })
 */
export function log(...args: unknown[]): void {
  logMessage(LogLevel.LOG, ...args);
}

/**
 * Warning level logging - accepts multiple message parts like console.log
 * @param args Message parts and optional extraInformation (e.g., 'Iteration limit reached', { subscriptionId: 'abc' })
 */
export function warn(...args: unknown[]): void {
  logMessage(LogLevel.WARN, ...args);
}

/**
 * Error level logging - accepts multiple message parts like console.log
 * @param args Message parts and optional extraInformation (e.g., 'Failed to send reminder', { error: 'timeout' })
 */
export function err(...args: unknown[]): void {
  logMessage(LogLevel.ERROR, ...args);
}

/**
 * Generic logging function that accepts a level and multiple message parts like console.log
 */
export function logger(level: LogLevel, ...args: unknown[]): void {
  logMessage(level, ...args);
}
