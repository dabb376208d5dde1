// ── Error taxonomy ──
//
// Every failure inside a dispatch cycle ends up as one of these kinds on a
// CommandResult. Only ConfigError and a failed capability probe escape to
// the process entry point.

export const ErrorKind = {
  EmptyInput: "EmptyInput",
  Arity: "Arity",
  InvalidArgument: "InvalidArgument",
  UnknownCommand: "UnknownCommand",
  TranslationAmbiguous: "TranslationAmbiguous",
  TranslationUnrecognized: "TranslationUnrecognized",
  NotFound: "NotFound",
  PermissionDenied: "PermissionDenied",
  AlreadyExists: "AlreadyExists",
  NotEmpty: "NotEmpty",
  IsDirectory: "IsDirectory",
  NotDirectory: "NotDirectory",
  Unsupported: "Unsupported",
  Interrupted: "Interrupted",
  Failed: "Failed",
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

export type CapabilityErrorKind =
  | typeof ErrorKind.NotFound
  | typeof ErrorKind.PermissionDenied
  | typeof ErrorKind.AlreadyExists
  | typeof ErrorKind.NotEmpty
  | typeof ErrorKind.IsDirectory
  | typeof ErrorKind.NotDirectory
  | typeof ErrorKind.Unsupported
  | typeof ErrorKind.Failed;

export class ShellError extends Error {
  constructor(readonly kind: ErrorKind, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class EmptyInputError extends ShellError {
  constructor() {
    super(ErrorKind.EmptyInput, "empty input");
  }
}

export class ArityError extends ShellError {
  constructor(readonly verb: string, readonly usage: string) {
    super(ErrorKind.Arity, `usage: ${usage}`);
  }
}

export class InvalidArgumentError extends ShellError {
  constructor(message: string) {
    super(ErrorKind.InvalidArgument, message);
  }
}

// Raised by capabilities; `path` is the operand as the user typed it when known.
export class CapabilityError extends ShellError {
  constructor(
    override readonly kind: CapabilityErrorKind,
    readonly path: string,
    readonly detail?: string
  ) {
    super(kind, detail ? `${path}: ${detail}` : path);
  }
}

export class InterruptedError extends ShellError {
  constructor() {
    super(ErrorKind.Interrupted, "interrupted");
  }
}

export class ConfigError extends Error {
  constructor(message: string, readonly file?: string) {
    super(file ? `${file}: ${message}` : message);
    this.name = "ConfigError";
  }
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err && typeof err.code === "string";
}

const ERRNO_KINDS: Record<string, CapabilityErrorKind> = {
  ENOENT: ErrorKind.NotFound,
  EACCES: ErrorKind.PermissionDenied,
  EPERM: ErrorKind.PermissionDenied,
  EEXIST: ErrorKind.AlreadyExists,
  ENOTEMPTY: ErrorKind.NotEmpty,
  EISDIR: ErrorKind.IsDirectory,
  ENOTDIR: ErrorKind.NotDirectory,
};

export function fromErrno(err: unknown, path: string): ShellError {
  if (err instanceof ShellError) return err;
  const kind = isErrnoException(err) && err.code ? ERRNO_KINDS[err.code] : undefined;
  if (kind) return new CapabilityError(kind, path);
  return new CapabilityError(ErrorKind.Failed, path, errorMessage(err));
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
