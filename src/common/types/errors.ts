/**
 * Base error shape for the application.
 * Module errors are plain discriminated objects extending this interface.
 */
export interface AppError {
  readonly type: string;
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Extracts a readable message from an unknown thrown value.
 */
export const describeCause = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);
