import type { Log } from "@orcha/utils";

const noop = (): void => undefined;

export const silentLog: Log = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  time: noop,
  timeEnd: noop,
  child: () => silentLog,
};
