export type PreflightFailureKind =
  | "configuration"
  | "dependency_install"
  | "strict_lint"
  | "module_load"
  | "missing_symbol"
  | "manifest";

export class PreflightError extends Error {
  readonly kind: PreflightFailureKind;
  readonly exitCode: number;

  constructor(kind: PreflightFailureKind, message: string, exitCode = 1, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PreflightError";
    this.kind = kind;
    this.exitCode = exitCode;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === "string" ? error : "Unknown error.";
}
