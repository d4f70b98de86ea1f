export class UpliftError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'UpliftError';
  }
}

export class ConfigError extends UpliftError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

export class ManifestError extends UpliftError {
  constructor(message: string, public readonly source: string, cause?: Error) {
    super(message, 'MANIFEST_ERROR', cause);
    this.name = 'ManifestError';
  }
}

export class ValidationError extends UpliftError {
  constructor(message: string, public readonly details?: unknown) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends UpliftError {
  constructor(public readonly resource: string, public readonly id: string) {
    super(`${resource} not found: ${id}`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class ScopeAccessError extends UpliftError {
  constructor(
    public readonly agentId: string,
    public readonly scope: string,
    public readonly access: 'read' | 'write',
  ) {
    super(`Agent "${agentId}" is not authorized to ${access} scope ${scope}`, 'SCOPE_ACCESS_DENIED');
    this.name = 'ScopeAccessError';
  }
}

export class PermissionDeniedError extends UpliftError {
  constructor(message: string) {
    super(message, 'PERMISSION_DENIED');
    this.name = 'PermissionDeniedError';
  }
}

export class UnauthorizedError extends UpliftError {
  constructor(message = 'Unauthorized') {
    super(message, 'UNAUTHORIZED');
    this.name = 'UnauthorizedError';
  }
}

export class PayloadTooLargeError extends UpliftError {
  constructor(public readonly limit: number) {
    super(`Request body exceeds ${limit} bytes`, 'PAYLOAD_TOO_LARGE');
    this.name = 'PayloadTooLargeError';
  }
}

export class InvalidStateError extends UpliftError {
  constructor(message: string, public readonly currentState: string) {
    super(message, 'INVALID_STATE');
    this.name = 'InvalidStateError';
  }
}

export class AgentProcessError extends UpliftError {
  constructor(message: string, public readonly agentName: string, cause?: Error) {
    super(message, 'AGENT_PROCESS_ERROR', cause);
    this.name = 'AgentProcessError';
  }
}

/** Raised by the agent client when the runtime answers with a non-2xx status. */
export class ApiRequestError extends UpliftError {
  constructor(
    message: string,
    public readonly status: number,
    code: string,
    public readonly details?: unknown,
  ) {
    super(message, code);
    this.name = 'ApiRequestError';
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
