// Error types raised by the shell and its catalog

/**
 * The engine rejected a statement while planning it.
 */
export class PlanError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'PlanError'
  }
}

/**
 * The database connection behind a catalog is closed.
 */
export class CatalogUnavailableError extends Error {
  constructor(message = 'database connection is closed') {
    super(message)
    this.name = 'CatalogUnavailableError'
  }
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ConfigError'
  }
}

/**
 * A dot-command or statement the shell refuses to run.
 */
export class CommandError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CommandError'
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
