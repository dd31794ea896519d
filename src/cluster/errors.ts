export type ControlPlaneErrorCode =
  | 'DUPLICATE_NODE'
  | 'DUPLICATE_POD'
  | 'NODE_NOT_FOUND'
  | 'MISSING_FIELD'
  | 'INVALID_ARGUMENT'
  | 'INSUFFICIENT_CLUSTER_CAPACITY'
  | 'NO_FEASIBLE_NODE';

export interface ErrorMeta {
  nodeId?: string;
  podId?: string;
  field?: string;
  [key: string]: unknown;
}

/**
 * Caller-visible failure of a control plane operation.
 * All codes are recoverable; none of them indicate corrupted state.
 */
export class ControlPlaneError extends Error {
  readonly code: ControlPlaneErrorCode;
  readonly meta: ErrorMeta;

  constructor(code: ControlPlaneErrorCode, message: string, meta: ErrorMeta = {}) {
    super(message);
    this.name = 'ControlPlaneError';
    this.code = code;
    this.meta = meta;
  }

  static duplicateNode(nodeId: string): ControlPlaneError {
    return new ControlPlaneError('DUPLICATE_NODE', `Node ${nodeId} already exists`, { nodeId });
  }

  static duplicatePod(podId: string): ControlPlaneError {
    return new ControlPlaneError('DUPLICATE_POD', `Pod ${podId} already exists`, { podId });
  }

  static nodeNotFound(nodeId: string): ControlPlaneError {
    return new ControlPlaneError('NODE_NOT_FOUND', `Node ${nodeId} not found`, { nodeId });
  }

  static missingField(field: string): ControlPlaneError {
    return new ControlPlaneError('MISSING_FIELD', `Missing required field: ${field}`, { field });
  }

  static invalidArgument(field: string, reason: string): ControlPlaneError {
    return new ControlPlaneError('INVALID_ARGUMENT', `Invalid ${field}: ${reason}`, { field });
  }
}

export function isControlPlaneError(error: unknown): error is ControlPlaneError {
  return error instanceof ControlPlaneError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
