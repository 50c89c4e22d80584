/**
 * Failure categories surfaced to callers instead of thrown errors.
 */
export type OperationErrorType = 'READ_ONLY' | 'INVALID_QUERY' | 'TIMEOUT' | 'BACKEND_ERROR';

export interface OperationError {
    type: OperationErrorType;
    message: string;
    cause?: unknown;
}

// Result type for consistent error handling
export type Result<T> = { success: true; data: T } | { success: false; error: OperationError };
