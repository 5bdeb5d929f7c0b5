export class InputDeviceUnavailableError extends Error {
  constructor(message = "otpview needs an interactive terminal (stdin and stdout must be a TTY)") {
    super(message)
    this.name = "InputDeviceUnavailableError"
  }
}

export class VaultAuthError extends Error {
  constructor(message = "No password slot could be opened with the given password") {
    super(message)
    this.name = "VaultAuthError"
  }
}

export class VaultFormatError extends Error {
  readonly path: string | null

  constructor(message: string, options?: { path?: string; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause })
    this.name = "VaultFormatError"
    this.path = options?.path ?? null
  }
}

export class VaultIOError extends Error {
  readonly path: string | null

  constructor(message: string, options?: { path?: string; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause })
    this.name = "VaultIOError"
    this.path = options?.path ?? null
  }
}

export class OtpComputationError extends Error {
  readonly entryUuid: string

  constructor(entryUuid: string, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = "OtpComputationError"
    this.entryUuid = entryUuid
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "ConfigError"
  }
}

/** A command-line value that names nothing in the vault (`--group`, `--uuid`). */
export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "UsageError"
  }
}

/** Errors that end the process with a message but no stack trace. */
export const isReportableError = (error: unknown): error is Error =>
  error instanceof InputDeviceUnavailableError ||
  error instanceof VaultAuthError ||
  error instanceof VaultFormatError ||
  error instanceof VaultIOError ||
  error instanceof ConfigError ||
  error instanceof UsageError
