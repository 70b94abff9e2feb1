export type TodoErrorKind = "usage" | "not_found" | "data_corruption" | "io";

export class TodoError extends Error {
  /** Print the usage text after the message. */
  readonly showUsage: boolean;

  constructor(
    public readonly kind: TodoErrorKind,
    message: string,
    options?: { cause?: unknown; showUsage?: boolean },
  ) {
    super(message, { cause: options?.cause });
    this.name = "TodoError";
    this.showUsage = options?.showUsage ?? false;
  }
}

export function isTodoError(err: unknown): err is TodoError {
  return err instanceof TodoError;
}

/** Message of any thrown value, for reporting. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
