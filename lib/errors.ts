export class StudioError extends Error {
  constructor(
    message: string,
    readonly status = 500,
    readonly code = "internal_error",
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "StudioError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
