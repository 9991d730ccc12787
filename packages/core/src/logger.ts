export interface Logger {
  debug(message: string, ...details: unknown[]): void
  info(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
  error(message: string, ...details: unknown[]): void
}

export const consoleLogger: Logger = {
  debug: (message, ...details) => console.debug(`[glyphgrid] ${message}`, ...details),
  info: (message, ...details) => console.info(`[glyphgrid] ${message}`, ...details),
  warn: (message, ...details) => console.warn(`[glyphgrid] ${message}`, ...details),
  error: (message, ...details) => console.error(`[glyphgrid] ${message}`, ...details),
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
}
