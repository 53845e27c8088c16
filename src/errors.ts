// src/errors.ts

// inbound record failed JSON parsing or structural validation
export class SchemaValidationError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(issues.length ? `invalid wallet record: ${issues.join('; ')}` : 'invalid wallet record')
    this.name = 'SchemaValidationError'
    this.issues = issues
  }
}

// wallet has no "dexes" block and the policy says to report it as a failure
export class NoDexDataError extends Error {
  constructor() {
    super('no dexes activity found for wallet')
    this.name = 'NoDexDataError'
  }
}

// anything else thrown while scoring or building the envelope
export class UnexpectedProcessingError extends Error {
  constructor(cause: unknown) {
    super(cause instanceof Error ? cause.message : String(cause), { cause })
    this.name = 'UnexpectedProcessingError'
  }
}

// broker connect/read/write failure; never reported per message
export class TransportError extends Error {
  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause)
    super(`${operation} failed: ${detail}`, { cause })
    this.name = 'TransportError'
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
