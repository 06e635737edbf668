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

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(404, 'NOT_FOUND', `${resource} not found`);
  }
}

/**
 * The persistent store could not be reached or the write failed. Intake
 * callers see this instead of a silent drop.
 */
export class StorageUnavailableError extends AppError {
  constructor(operation: string, cause: unknown) {
    super(503, 'STORAGE_UNAVAILABLE', `Notification storage unavailable during ${operation}`, {
      cause: cause instanceof Error ? cause.message : String(cause),
    });
  }
}
