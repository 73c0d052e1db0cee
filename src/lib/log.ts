/**
 * Minimal logger seam. Defaults to the console; tests pass a recorder.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

export const consoleLogger: Logger = console

const noop = () => {}

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
}

/** Prefixes every message with `[tag]`. */
export function taggedLogger(tag: string, base: Logger = consoleLogger): Logger {
  const prefix = `[${tag}]`
  return {
    debug: (message, ...args) => base.debug(`${prefix} ${message}`, ...args),
    info: (message, ...args) => base.info(`${prefix} ${message}`, ...args),
    warn: (message, ...args) => base.warn(`${prefix} ${message}`, ...args),
    error: (message, ...args) => base.error(`${prefix} ${message}`, ...args),
  }
}
