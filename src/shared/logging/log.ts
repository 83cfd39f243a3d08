export type LogLevel = "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

/**
 * Writes one JSON line per event, e.g. `{"event":"query.completed","records":10}`.
 */
export const logEvent = (level: LogLevel, event: string, fields: LogFields = {}): void => {
  const line = JSON.stringify({ event, ...fields });
  /* eslint-disable no-console */
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
  /* eslint-enable no-console */
};

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};
