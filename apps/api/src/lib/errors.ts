import { GatewayErrorCode } from '@consent-gateway/shared/constants/gateway.constants.js';

export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    message: string,
    public details?: unknown
  ) {
    super(message);
  }
}

// ---------------------------------------------------------------------------
// ValidationError — malformed input, rejected synchronously, never retried
// ---------------------------------------------------------------------------

export class ValidationError extends AppError {
  constructor(
    message: string,
    details?: unknown,
    code: string = GatewayErrorCode.VALIDATION_ERROR,
  ) {
    super(400, code, message, details);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Authentication required', code: string = GatewayErrorCode.UNAUTHORIZED) {
    super(401, code, message);
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Insufficient permissions', code = 'FORBIDDEN') {
    super(403, code, message);
  }
}

// ---------------------------------------------------------------------------
// NotFoundError — unknown bridge, request, consent, job or correlation id
// ---------------------------------------------------------------------------

export class NotFoundError extends AppError {
  constructor(resource: string, code = 'NOT_FOUND') {
    super(404, code, `${resource} not found`);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, code = 'CONFLICT') {
    super(409, code, message);
  }
}

// ---------------------------------------------------------------------------
// StateConflictError — the entity is not in a state that allows the call.
// The caller must re-initiate the flow rather than retry the same call.
// ---------------------------------------------------------------------------

export class StateConflictError extends AppError {
  constructor(
    message: string,
    code: string = GatewayErrorCode.INVALID_TRANSITION,
    statusCode = 409,
  ) {
    super(statusCode, code, message);
  }
}

// ---------------------------------------------------------------------------
// RemoteCallError — a bridge or collaborator was unreachable or answered non-2xx
// ---------------------------------------------------------------------------

export class RemoteCallError extends AppError {
  constructor(message: string, public remoteStatus?: number) {
    super(502, GatewayErrorCode.TRANSIENT_REMOTE_FAILURE, message);
  }
}
