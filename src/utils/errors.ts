/**
 * Custom error classes for codespec
 * Each error includes user-friendly messages and suggested resolutions
 */

/**
 * Base error class for codespec
 */
export class CodespecError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: unknown,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Get formatted error message for display
   */
  getFormattedMessage(): string {
    let msg = `[${this.code}] ${this.message}`;
    if (this.suggestion) {
      msg += `\n\nSuggestion: ${this.suggestion}`;
    }
    if (this.details) {
      const detailsStr = typeof this.details === 'string' ? this.details : JSON.stringify(this.details, null, 2);
      msg += `\n\nDetails: ${detailsStr}`;
    }
    return msg;
  }
}

/**
 * Configuration error - missing or invalid configuration
 */
export class ConfigurationError extends CodespecError {
  constructor(message: string, details?: unknown, suggestion?: string) {
    super(message, 'CONFIG_ERROR', details, suggestion);
  }

  static missingRequired(variableName: string): ConfigurationError {
    return new ConfigurationError(
      `Missing required environment variable: ${variableName}`,
      { variable: variableName },
      `Set the ${variableName} environment variable in your MCP configuration.`
    );
  }

  static invalidValue(variableName: string, value: unknown, expected: string): ConfigurationError {
    return new ConfigurationError(
      `Invalid value for ${variableName}: ${String(value)}`,
      { variable: variableName, value, expected },
      `Expected ${expected}. Check your MCP configuration.`
    );
  }
}

/**
 * Connection refused, DNS failure or reset while calling a collaborating service
 */
export class ServiceConnectionError extends CodespecError {
  constructor(service: string, url: string, cause?: Error) {
    super(
      `Cannot connect to ${service} at ${url}`,
      'SERVICE_CONNECTION_ERROR',
      { service, url, cause: cause?.message },
      `Check that the ${service} is running and that BACKEND_URL points to it.`
    );
  }
}

/**
 * Non-2xx transport status from a collaborating service
 */
export class HttpStatusError extends CodespecError {
  constructor(
    url: string,
    public readonly status: number,
    body: string
  ) {
    super(
      `HTTP ${String(status)} from ${url}`,
      'HTTP_STATUS_ERROR',
      { url, status, body: body.slice(0, 200) },
      status === 404
        ? 'A 404 from the LLM API usually means the request was blocked by the firewall. Inspect the prompt and content in the error log.'
        : 'Check the service logs for the failing request.'
    );
  }
}

/**
 * A 200 response whose body does not have the expected shape
 */
export class InvalidResponseError extends CodespecError {
  constructor(service: string, url: string, body: string) {
    super(
      `Malformed response from ${service}`,
      'INVALID_RESPONSE',
      { service, url, body: body.slice(0, 200) },
      `Check that ${url} returns the documented JSON shape.`
    );
  }
}

/**
 * The LLM API answered with a 200 transport status but a non-200 application status
 */
export class ContentFilteredError extends CodespecError {
  constructor(
    public readonly status: number,
    output: string
  ) {
    super(
      `LLM request filtered with application status ${String(status)}`,
      'CONTENT_FILTERED',
      { status, output: output.slice(0, 200) },
      'The content policy rejected the prompt or content. Terms like "password", "secret" or "admin" commonly trigger it.'
    );
  }
}

/**
 * LLM output that no parsing strategy could turn into a structured document
 */
export class UnparsableOutputError extends CodespecError {
  constructor(operation: string, output: string) {
    super(
      `${operation} returned output that could not be parsed as JSON`,
      'UNPARSABLE_OUTPUT',
      { operation, output: output.slice(0, 200) },
      'The call will be retried; persistent failures fall back to the deterministic output.'
    );
  }
}

/**
 * Database connection error
 */
export class DatabaseConnectionError extends CodespecError {
  constructor(message: string, details?: unknown, suggestion?: string) {
    super(message, 'DB_CONNECTION_ERROR', details, suggestion);
  }

  static cannotConnect(host: string, port: number, database: string, cause?: Error): DatabaseConnectionError {
    return new DatabaseConnectionError(
      `Cannot connect to PostgreSQL database '${database}' at ${host}:${String(port)}`,
      { host, port, database, cause: cause?.message },
      `Check that:\n1. PostgreSQL is running on ${host}:${String(port)}\n2. Database '${database}' holds the pgvector collections\n3. Credentials are correct (POSTGRES_USER, POSTGRES_PASSWORD)`
    );
  }
}

/**
 * Database not connected error
 */
export class DatabaseNotConnectedError extends CodespecError {
  constructor(operation: string) {
    super(
      'Database not connected',
      'DB_NOT_CONNECTED',
      { operation },
      `Call connect() before attempting ${operation}.`
    );
  }
}

/**
 * Database query error
 */
export class DatabaseQueryError extends CodespecError {
  constructor(query: string, params: unknown[], cause: Error) {
    super(
      `Database query failed: ${cause.message}`,
      'DB_QUERY_ERROR',
      {
        query: query.slice(0, 200), // Truncate long queries
        params: params.length,
        cause: cause.message,
      },
      'Check that the langchain_pg_collection and langchain_pg_embedding tables exist.'
    );
  }
}

/**
 * Ollama model not found error
 */
export class ModelNotFoundError extends CodespecError {
  constructor(modelName: string, host: string) {
    super(
      `Model '${modelName}' not found on Ollama instance at ${host}`,
      'MODEL_NOT_FOUND',
      { model: modelName, host },
      `Pull the model:\n  ollama pull ${modelName}\n\nOr set OLLAMA_MODEL / EMBEDDING_MODEL to an available model.`
    );
  }
}

/**
 * Vector dimension mismatch error
 */
export class VectorDimensionError extends CodespecError {
  constructor(expected: number, actual: number, context: string) {
    super(
      `Vector dimension mismatch: expected ${String(expected)} but got ${String(actual)}`,
      'VECTOR_DIM_MISMATCH',
      { expected, actual, context },
      `Set EMBEDDING_DIMENSIONS=${String(actual)} or use the embedding model the collections were built with.`
    );
  }
}

/**
 * Request timeout error
 */
export class RequestTimeoutError extends CodespecError {
  constructor(operation: string, timeoutMs: number) {
    super(
      `${operation} timed out after ${String(timeoutMs)}ms`,
      'TIMEOUT_ERROR',
      { operation, timeoutMs },
      `Increase the timeout in your configuration or check that the service is responding.`
    );
  }
}

/**
 * Check if error is a retriable error (transient failure)
 *
 * 408, 429 and 5xx statuses are transient; other 4xx statuses are content-policy
 * blocks and are final. Filtered application statuses are never retried.
 */
export const isRetriableError = (error: Error): boolean => {
  const retriableCodes = ['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'EAI_AGAIN'];

  if (error instanceof HttpStatusError) {
    return error.status === 408 || error.status === 429 || error.status >= 500;
  }
  if (error instanceof ContentFilteredError) {
    return false;
  }

  return (
    retriableCodes.some((code) => error.message.toLowerCase().includes(code.toLowerCase())) ||
    error instanceof RequestTimeoutError ||
    error instanceof ServiceConnectionError ||
    error instanceof UnparsableOutputError
  );
};

/**
 * Check if error is a 429 rate limit response
 */
export const isRateLimitError = (error: Error): boolean => {
  return error instanceof HttpStatusError && error.status === 429;
};

/**
 * Normalize an unknown thrown value into an Error
 */
export const toError = (error: unknown): Error => {
  return error instanceof Error ? error : new Error(String(error));
};
