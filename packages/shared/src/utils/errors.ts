export class TriangulateError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'TriangulateError';
  }
}

export class AgentError extends TriangulateError {
  constructor(message: string, cause?: Error) {
    super(message, 'AGENT_ERROR', cause);
    this.name = 'AgentError';
  }
}

export class LlmError extends TriangulateError {
  constructor(
    message: string,
    public readonly isTransient: boolean,
    cause?: Error,
  ) {
    super(message, 'LLM_ERROR', cause);
    this.name = 'LlmError';
  }
}

export class SchemaValidationError extends TriangulateError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[],
  ) {
    super(message, 'SCHEMA_VALIDATION_ERROR');
    this.name = 'SchemaValidationError';
  }
}

export class ConfigurationError extends TriangulateError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class UnsupportedCapabilityError extends TriangulateError {
  constructor(public readonly capability: string) {
    super(`No agent registered for capability: ${capability}`, 'UNSUPPORTED_CAPABILITY');
    this.name = 'UnsupportedCapabilityError';
  }
}

export class AgentUnavailableError extends TriangulateError {
  constructor(
    public readonly agentId: string,
    message: string,
    cause?: Error,
  ) {
    super(message, 'AGENT_UNAVAILABLE', cause);
    this.name = 'AgentUnavailableError';
  }
}

export class AgentTimeoutError extends TriangulateError {
  constructor(
    public readonly agentId: string,
    message: string,
  ) {
    super(message, 'AGENT_TIMEOUT');
    this.name = 'AgentTimeoutError';
  }
}

export interface SubtaskFailure {
  readonly subtaskId: string;
  readonly capability: string;
  readonly code: string;
  readonly message: string;
}

export class NoUsableResultsError extends TriangulateError {
  constructor(public readonly failures: readonly SubtaskFailure[]) {
    super(
      `All ${String(failures.length)} subtasks failed: ${failures.map((f) => `${f.capability} (${f.code})`).join(', ')}`,
      'NO_USABLE_RESULTS',
    );
    this.name = 'NoUsableResultsError';
  }
}

export class EmbeddingUnavailableError extends TriangulateError {
  constructor(message: string, cause?: Error) {
    super(message, 'EMBEDDING_UNAVAILABLE', cause);
    this.name = 'EmbeddingUnavailableError';
  }
}

export class CacheBackendUnavailableError extends TriangulateError {
  constructor(message: string, cause?: Error) {
    super(message, 'CACHE_BACKEND_UNAVAILABLE', cause);
    this.name = 'CacheBackendUnavailableError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
