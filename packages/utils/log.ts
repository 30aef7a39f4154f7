// packages/utils/log.ts
// Console logger with a uniform "[tag]" prefix. debug/time only print in verbose mode (CORE_VERBOSE=1).

export type Log = {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  time: (label: string) => void;
  timeEnd: (label: string) => void;
  child: (opts: { traceId?: string; tag?: string }) => Log;
};

export type LogOptions = { verbose?: boolean; traceId?: string };

export function createLog(tag: string, opts: LogOptions = {}): Log {
  const verbose = opts.verbose ?? process.env.CORE_VERBOSE === "1";
  const prefix = opts.traceId ? `[${tag}:${opts.traceId}]` : `[${tag}]`;

  return {
    debug: (...args) => {
      if (verbose) console.log(prefix, ...args);
    },
    info: (...args) => console.log(prefix, ...args),
    warn: (...args) => console.warn(prefix, ...args),
    error: (...args) => console.error(prefix, ...args),
    time: (label) => {
      if (verbose) console.time(`${prefix} ${label}`);
    },
    timeEnd: (label) => {
      if (verbose) console.timeEnd(`${prefix} ${label}`);
    },
    child: (next) =>
      createLog(next.tag ?? tag, { verbose, traceId: next.traceId ?? opts.traceId }),
  };
}

export function errMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
