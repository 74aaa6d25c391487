// Console logging with the INFO:/WARN: markers the CLI tools print.
// The runtime takes a Logger so tests can capture lines instead.

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
}

export const consoleLogger: Logger = {
  info: (message) => console.log(`INFO: ${message}`),
  warn: (message) => console.warn(`WARN: ${message}`)
};

export type LogValue = string | number | boolean | null;

/**
 * Formats `key=value` pairs. Values with spaces are quoted.
 */
export function kv(fields: Record<string, LogValue>): string {
  return Object.entries(fields)
    .map(([k, v]) => {
      const s = String(v);
      return /\s/.test(s) ? `${k}="${s}"` : `${k}=${s}`;
    })
    .join(" ");
}
