export class CompressorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CompressorError';
  }
}

/**
 * Thrown when a payload's top-level JSON value is not an array
 * (including payloads that are not JSON at all)
 */
export class InputFormatError extends CompressorError {
  constructor(reason: string = 'expected JSON array') {
    super(reason);
    this.name = 'InputFormatError';
  }
}

/**
 * Thrown when aggregated groups cannot be written back as JSON
 */
export class SerializationError extends CompressorError {
  constructor(reason: string) {
    super(`Failed to serialize aggregated output: ${reason}`);
    this.name = 'SerializationError';
  }
}

export class ConfigurationError extends CompressorError {
  constructor(
    message: string,
    public source?: string
  ) {
    super(source ? `${source}: ${message}` : message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Extracts error message from unknown error type
 * @param error - The caught error (unknown type)
 * @returns Error message as string
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
