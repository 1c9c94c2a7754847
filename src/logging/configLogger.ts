import { inspect } from "util";

export interface Logger {
  debug: (...args: unknown[]) => void;
  log: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
}

function formatArg(arg: unknown): string {
  if (typeof arg === "string") {
    return arg;
  }
  if (arg instanceof Error) {
    return arg.stack ?? arg.message;
  }
  return inspect(arg, { depth: 4, breakLength: 120 });
}

function writeLine(stream: NodeJS.WriteStream, args: unknown[]): void {
  try {
    stream.write(args.map(formatArg).join(" ") + "\n");
  } catch {
    // stdout/stderr already closed; nothing left to report to
  }
}

export function debug(debugMode: boolean, ...args: unknown[]): void {
  if (debugMode) {
    writeLine(process.stdout, args);
  }
}

export function error(...args: unknown[]): void {
  writeLine(process.stderr, args);
}

export function warn(...args: unknown[]): void {
  writeLine(process.stderr, args);
}

export function info(...args: unknown[]): void {
  writeLine(process.stdout, args);
}

export function createLogger(debugMode: boolean | string = false): Logger {
  const isDebugEnabled = typeof debugMode === "string" ? debugMode === "true" : Boolean(debugMode);

  return {
    debug: (...args: unknown[]) => debug(isDebugEnabled, ...args),
    log: (...args: unknown[]) => debug(isDebugEnabled, ...args),
    error,
    warn,
    info,
  };
}
