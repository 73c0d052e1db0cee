export type EyesErrorCode = 'INVALID_COMMAND' | 'CONFIG_INVALID'

export class EyesError extends Error {
  constructor(
    readonly code: EyesErrorCode,
    message: string,
  ) {
    super(message)
    this.name = new.target.name
  }
}

/** Unrecognised mood, direction, speed or eye selector. State is left untouched. */
export class InvalidCommandError extends EyesError {
  constructor(
    message: string,
    readonly field?: string,
    readonly value?: unknown,
  ) {
    super('INVALID_COMMAND', message)
  }
}

/** Raw configuration whose structure cannot be interpreted. */
export class ConfigError extends EyesError {
  constructor(
    message: string,
    readonly path: string,
  ) {
    super('CONFIG_INVALID', message)
  }
}

/** A configured value outside what the screen can hold. Clamped, never thrown. */
export interface ConfigOutOfBounds {
  kind: 'ConfigOutOfBounds'
  field: string
  requested: number
  applied: number
}
