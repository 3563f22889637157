import debug from "debug";

export interface Logger {
  info(message: string, ...args: unknown[]): void
  debug(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
}

/**
 * Namespaced logger on top of `debug`. Output is off unless the namespace is
 * enabled, e.g. `DEBUG=drover:*` or `DROVER_DEBUG=drover:deployment`.
 */
export function getLogger(name: string): Logger {
  const d = debug(`drover:${name}`);
  const warn = debug(`drover:${name}:warn`);
  return {
    info: (message, ...args) => d(message, ...args),
    debug: (message, ...args) => d(message, ...args),
    warn: (message, ...args) => warn(message, ...args),
  };
}

/** Turn on logging for the given namespaces (comma separated, wildcards allowed) */
export function enableLogging(namespaces: string): void {
  debug.enable(namespaces);
}
