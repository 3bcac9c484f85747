/**
 * Custom error classes
 */

export class FossaToolsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FossaToolsError';
  }
}

export class ConfigurationError extends FossaToolsError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Non-accepted HTTP status from the FOSSA API.
 */
export class ApiError extends FossaToolsError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly body?: unknown
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export class NetworkError extends FossaToolsError {
  constructor(
    message: string,
    public readonly code?: string
  ) {
    super(message);
    this.name = 'NetworkError';
  }
}

export class AnalysisError extends FossaToolsError {
  constructor(
    message: string,
    public readonly exitCode: number
  ) {
    super(message);
    this.name = 'AnalysisError';
  }
}
