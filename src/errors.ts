export type ErrorKind = "fatal" | "document" | "warning";

export class PagewrightError extends Error {
  readonly kind: ErrorKind;
  /** Source path (relative to the source root) the error belongs to, if any */
  readonly path?: string;

  constructor(kind: ErrorKind, message: string, path?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
    this.path = path;
  }
}

// Whole-build failures: abort the pass, trust no output.

export class ConfigError extends PagewrightError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("fatal", message, undefined, options);
  }
}

export class SourceRootError extends PagewrightError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("fatal", message, undefined, options);
  }
}

export class DestinationError extends PagewrightError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("fatal", message, undefined, options);
  }
}

export class ManifestCorruptError extends PagewrightError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("fatal", message, undefined, options);
  }
}

export class BuildFailedError extends PagewrightError {
  constructor(message: string) {
    super("fatal", message);
  }
}

// Subtree failures: the document (or book) is skipped, the pass continues.

export class DataFragmentError extends PagewrightError {
  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super("document", message, path, options);
  }
}

export class ReservedKeyError extends PagewrightError {
  constructor(path: string, key: string, origin: string) {
    super("document", `Reserved key "${key}" is not allowed in ${origin}`, path);
  }
}

export class LayoutValidationError extends PagewrightError {
  constructor(path: string, message: string) {
    super("document", message, path);
  }
}

export class FileCollisionError extends PagewrightError {
  constructor(path: string, other: string) {
    super("document", `File name collision ${path} with ${other}`, path);
  }
}

export class RenderError extends PagewrightError {
  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super("document", message, path, options);
  }
}

export class RedirectError extends PagewrightError {
  /** Request path of the redirect, such as `/old/` */
  readonly from: string;

  constructor(from: string, message: string) {
    super("document", message, from);
    this.from = from;
  }
}

export class BookBuildError extends PagewrightError {
  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super("document", message, path, options);
  }
}

/** Non-fatal diagnostics; output is still produced. */
export interface BuildWarning {
  code:
    | "classification-ambiguous"
    | "invalid-flag"
    | "unknown-config-key"
    | "missing-layout"
    | "missing-book-theme"
    | "release-live"
    | "manifest-discarded"
    | "unused-template";
  message: string;
  path?: string;
}

export function isFatal(err: unknown): boolean {
  return err instanceof PagewrightError && err.kind === "fatal";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
