export type ErrorKind =
  | "DocumentLoadError"
  | "ReferenceResolutionError"
  | "SerializationError"
  | "HighlightError"
  | "RenderError";

export type ViewerError = {
  kind: ErrorKind;
  message: string;
  ref?: string;
};

export type Result<T> = { ok: true; value: T } | { ok: false; error: ViewerError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export const OK: Result<void> = { ok: true, value: undefined };

export function fail<T = never>(kind: ErrorKind, message: string, ref?: string): Result<T> {
  return { ok: false, error: ref === undefined ? { kind, message } : { kind, message, ref } };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function formatError(error: ViewerError): string {
  return `${error.kind}: ${error.message}`;
}
