export type LogContext = {
  entityType?: string;
  entityId?: string;
  intakeId?: string;
  message?: string;
};

/**
 * Logs server errors with structured context so route handlers can return a short JSON error.
 * Use this in route handlers before mapping the failure to a response.
 */
export function logServerError(context: LogContext, error: unknown) {
  const { entityType = "server", entityId, intakeId, message = "Unexpected error" } = context;
  const errorMessage = error instanceof Error ? error.message : String(error);

  console.error(
    `[${entityType}] ${message}`,
    {
      entityType,
      entityId,
      intakeId,
      error: errorMessage,
    }
  );
}
