/**
 * Error types raised by the LegiScan client
 */

export class LegiScanError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * No usable API key or invalid client options
 */
export class ConfigurationError extends LegiScanError {}

/**
 * Missing or unexpected parameter, raised before any request is sent
 */
export class ParameterError extends LegiScanError {
  constructor(
    readonly operation: string,
    readonly parameter: string,
    message: string
  ) {
    super(`${operation}: ${message}`);
  }
}

/**
 * Network failure, timeout or non-2xx HTTP status
 */
export class TransportError extends LegiScanError {
  constructor(
    readonly operation: string,
    message: string,
    readonly status?: number,
    options?: ErrorOptions
  ) {
    super(`${operation}: ${message}`, options);
  }
}

/**
 * Response body is not valid JSON
 */
export class DecodeError extends LegiScanError {
  constructor(readonly operation: string, options?: ErrorOptions) {
    super(`${operation}: response body is not valid JSON`, options);
  }
}

/**
 * The API answered with status ERROR; apiMessage is its alert text, unchanged
 */
export class ApiError extends LegiScanError {
  constructor(readonly operation: string, readonly apiMessage: string) {
    super(`${operation}: ${apiMessage}`);
  }
}

/**
 * Successful response that does not have the expected structure
 */
export class ShapeError extends LegiScanError {
  constructor(readonly operation: string, message: string) {
    super(`${operation}: ${message}`);
  }
}
