export class ProfileScraperError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ProfileScraperError'
    Object.setPrototypeOf(this, ProfileScraperError.prototype)
  }
}

function createErrorClass(name: string) {
  return class extends ProfileScraperError {
    constructor(message: string) {
      super(message)
      this.name = name
      Object.setPrototypeOf(this, new.target.prototype)
    }
  }
}

export class NavigationTimeoutError extends createErrorClass(
  'NavigationTimeoutError',
) {}
export class NetworkError extends createErrorClass('NetworkError') {}
export class ExtractionError extends createErrorClass('ExtractionError') {}
export class StorageError extends createErrorClass('StorageError') {}

export class ConfigurationError extends ProfileScraperError {
  constructor(
    message: string,
    public readonly path?: string,
  ) {
    super(message)
    this.name = 'ConfigurationError'
    Object.setPrototypeOf(this, ConfigurationError.prototype)
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}
