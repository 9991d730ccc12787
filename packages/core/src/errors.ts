export class GlyphgridError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
  }
}

export type InitializationResource =
  | 'context'
  | 'monitor'
  | 'shader'
  | 'framebuffer'
  | 'atlas'
  | 'console'

/**
 * Raised while bringing up GPU resources. Initialization is all-or-nothing:
 * anything acquired before the failure has already been released when this
 * reaches the caller.
 */
export class InitializationError extends GlyphgridError {
  readonly resource: InitializationResource

  constructor(
    resource: InitializationResource,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`[${resource}] ${message}`, options)
    this.resource = resource
  }
}

export class NoMonitorFoundError extends InitializationError {
  constructor() {
    super('monitor', 'No available monitor found for fullscreen mode')
  }
}

export class ResourceLimitError extends GlyphgridError {
  readonly limit: number

  constructor(message: string, limit: number) {
    super(message)
    this.limit = limit
  }
}

export class DeviceLostError extends GlyphgridError {
  constructor(message = 'GPU context was lost', options?: ErrorOptions) {
    super(message, options)
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}
