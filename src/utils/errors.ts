// src/utils/errors.ts

export class ScraperError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

// Configuration errors
export class ConfigError extends ScraperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
  }
}

// API errors
export class ApiError extends ScraperError {
  constructor(
    message: string,
    public status: number,
    details?: Record<string, unknown>
  ) {
    super(message, 'API_ERROR', { ...details, status });
  }
}

export class ApiClientError extends ApiError {
  constructor(message: string, status: number = 400, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_CLIENT_ERROR';
  }
}

export class ApiServerError extends ApiError {
  constructor(message: string, status: number = 500, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_SERVER_ERROR';
  }
}

export class InvalidResponseError extends ScraperError {
  constructor(message: string = 'Response body is not valid JSON', details?: Record<string, unknown>) {
    super(message, 'INVALID_RESPONSE', details);
  }
}

// Network errors
export class NetworkError extends ScraperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', details);
  }
}

export class NetworkTimeoutError extends NetworkError {
  constructor(message: string = 'Request timeout', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'NETWORK_TIMEOUT';
  }
}

// Normalization errors
export class NormalizationError extends ScraperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NORMALIZATION_FAILED', details);
  }
}

// Export errors
export class ExportError extends ScraperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'EXPORT_ERROR', details);
  }
}

export class UnsupportedExportFormatError extends ExportError {
  constructor(format: string, details?: Record<string, unknown>) {
    super(`Unsupported output format: ${format}`, { ...details, format });
    this.code = 'INVALID_ARGUMENT';
  }
}
