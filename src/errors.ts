/**
 * Raised when markdown source cannot be turned into HTML: the bytes are not
 * valid UTF-8, or the grammar or the sanitizer failed.
 */
export class RenderError extends Error {
  override readonly name = "RenderError";
}

/** The watched source file could not be read (missing, not a file, no permission). */
export class FileAccessError extends Error {
  override readonly name = "FileAccessError";
  readonly path: string;
  readonly code: string | undefined;

  constructor(filePath: string, cause: unknown) {
    super(`Unable to read '${filePath}': ${describeError(cause)}`, { cause });
    this.path = filePath;
    this.code = errorCode(cause);
  }
}

export class BindError extends Error {
  override readonly name = "BindError";
  readonly host: string;
  readonly port: number;

  constructor(host: string, port: number, cause: unknown) {
    const reason =
      errorCode(cause) === "EADDRINUSE"
        ? "address already in use"
        : describeError(cause);
    super(`Unable to listen on ${host}:${port}: ${reason}`, { cause });
    this.host = host;
    this.port = port;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): string | undefined {
  if (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string"
  ) {
    return error.code;
  }
  return undefined;
}

/** Invalid command-line options; each entry names the option and the problem. */
export class ConfigError extends Error {
  override readonly name = "ConfigError";
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid options:\n  ${issues.join("\n  ")}`);
    this.issues = issues;
  }
}
