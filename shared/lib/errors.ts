/**
 * Shared error types and helpers.
 */

/**
 * Formats error message from unknown error type.
 */
export function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * The generator could not be constructed or could not produce an event.
 * There is no event source after this, so the owning server stops.
 */
export class GenerationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GenerationError';
  }
}

/**
 * Invalid or missing run configuration (environment, config round trip,
 * parameter files). Fatal at startup.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/** The server did not take a request or did not answer it in time. */
export class ServerUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ServerUnavailableError';
  }
}

export function toGenerationError(error: unknown): GenerationError {
  if (error instanceof GenerationError) return error;
  return new GenerationError(`Event generation failed: ${formatError(error)}`, { cause: error });
}
