/**
 * Error types for the login flows
 *
 * Provider errors come from the account client. CliError is what reaches the
 * user: a fixed message plus suggestions, rendered once by the entry point.
 */

export enum CliErrorType {
  CONNECTION = "CONNECTION",
  SERVER_ERROR = "SERVER_ERROR",
  INVALID_CREDENTIALS = "INVALID_CREDENTIALS",
  WALLET_INVALID = "WALLET_INVALID",
}

const CLI_ERROR_MESSAGES: Record<CliErrorType, { message: string; suggestions: string[] }> = {
  [CliErrorType.CONNECTION]: {
    message: "Could not reach the tally account service. Check your connection and try again.",
    suggestions: ["Set TALLY_API_URL if you use a self-hosted account service"],
  },
  [CliErrorType.SERVER_ERROR]: {
    message: "The tally account service returned an error. Try again later.",
    suggestions: ["Run with DEBUG=1 to see the server response"],
  },
  [CliErrorType.INVALID_CREDENTIALS]: {
    message: "Invalid username or password.",
    suggestions: ["Log in without a password: tally login --accounts"],
  },
  [CliErrorType.WALLET_INVALID]: {
    message: "The wallet file could not be read.",
    suggestions: ["Restore it from your seed phrase, or point TALLY_WALLET_PATH at a valid wallet"],
  },
}

/**
 * User-facing error with a fixed message
 */
export class CliError extends Error {
  public readonly type: CliErrorType
  public readonly originalError?: Error
  public readonly context?: Record<string, unknown>

  constructor(
    type: CliErrorType,
    options?: {
      originalError?: Error
      context?: Record<string, unknown>
    }
  ) {
    super(CLI_ERROR_MESSAGES[type].message)
    this.name = "CliError"
    this.type = type
    this.originalError = options?.originalError
    this.context = options?.context

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CliError)
    }
  }

  getSuggestions(): string[] {
    return CLI_ERROR_MESSAGES[this.type].suggestions
  }
}

/**
 * The account service could not be reached (no HTTP response)
 */
export class ProviderUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "ProviderUnavailableError"
  }
}

/**
 * The account service answered with an error status or an unusable body
 */
export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly body?: unknown
  ) {
    super(message)
    this.name = "ProviderError"
  }
}

/**
 * Account setup ended without an authenticated user.
 * The entry point exits with status 1 and prints nothing more.
 */
export class UnauthenticatedError extends Error {
  public readonly exitCode = 1

  constructor(reason: string = "Not authenticated") {
    super(reason)
    this.name = "UnauthenticatedError"
  }
}

/**
 * Translate provider failures into the fixed user-facing messages
 */
export function toCliError(error: unknown): unknown {
  if (error instanceof ProviderUnavailableError) {
    return new CliError(CliErrorType.CONNECTION, { originalError: error })
  }
  if (error instanceof ProviderError) {
    return new CliError(CliErrorType.SERVER_ERROR, {
      originalError: error,
      context: { status: error.status },
    })
  }
  return error
}

export function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
