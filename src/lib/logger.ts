export type Logger = Pick<Console, "log" | "warn" | "error">;

const noop = () => undefined;

export const silentLogger: Logger = {
  log: noop,
  warn: noop,
  error: noop,
};
