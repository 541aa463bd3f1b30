import fs from 'fs';
import path from 'path';

export enum LogLevel {
  LOG = 'LOG',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

type ExtraInformation = Record<string, unknown>;

let logFile: string | null = null;

/**
 * Sets the file every log line is also appended to. Pass null to log to the console only.
 */
export function setLogFile(fn: string | null) {
  logFile = fn;
}

/**
 * Logs a message to the configured log file with optional reset flag
 *
 * @param message - The message to log to the file
 * @param reset - If true, overwrites the file; if false, appends to the file
 */
export function logToFile(message: string, reset: boolean = false) {
  if (!logFile) {
    return;
  }
  const stream = fs.createWriteStream(logFile, { flags: reset ? 'w' : 'a' });
  stream.write(message + '\n');
  stream.end();
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

function isExtraInformation(value: unknown): value is ExtraInformation {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.getPrototypeOf(value) === Object.prototype &&
    Object.keys(value).length > 0
  );
}

function formatExtraInformation(extraInformation: ExtraInformation): string {
  return Object.entries(extraInformation)
    .map(([key, value]) => `${key}: ${typeof value === 'string' ? value : JSON.stringify(value)}`)
    .join(' | ');
}

/**
 * Builds the single output line for a log call. A trailing plain object is treated as
 * extra information and printed as `key: value` pairs after the message.
 */
export function formatLogLine(level: LogLevel, fileName: string, functionName: string, args: unknown[]): string {
  let extraInformation: ExtraInformation | undefined;
  let messageParts = args;

  if (args.length > 0) {
    const lastArg = args[args.length - 1];
    if (isExtraInformation(lastArg)) {
      extraInformation = lastArg;
      messageParts = args.slice(0, -1);
    }
  }

  // Join message parts like console.log does
  const message = messageParts
    .map((part) => (typeof part === 'string' ? part : part instanceof Error ? part.message : JSON.stringify(part)))
    .join(' ');

  const parts: string[] = [level, `${fileName}:${functionName}`, message];
  if (extraInformation) {
    parts.push(formatExtraInformation(extraInformation));
  }
  return parts.join(' | ');
}

function logMessage(level: LogLevel, ...args: unknown[]): void {
  const { fileName, functionName } = getCallerInfo(3); // 3 because we go through helper methods
  const fullOutput = formatLogLine(level, fileName, functionName, args);

  switch (level) {
    case LogLevel.WARN:
      console.warn(fullOutput);
      break;
    case LogLevel.ERROR:
      console.error(fullOutput);
      break;
    default:
      console.log(fullOutput);
  }

  logToFile(`${new Date().toISOString()} | ${fullOutput}`);
}

/**
 * Info level logging - accepts multiple message parts like console.log
 */
export function log(...args: unknown[]): void {
  logMessage(LogLevel.LOG, ...args);
}

/**
 * Warning level logging - accepts multiple message parts like console.log
 * @param args Message parts and optional extraInformation (e.g., 'Unknown account', { account: 'Savings' })
 */
export function warn(...args: unknown[]): void {
  logMessage(LogLevel.WARN, ...args);
}

/**
 * Error level logging - accepts multiple message parts like console.log
 */
export function err(...args: unknown[]): void {
  logMessage(LogLevel.ERROR, ...args);
}
