/**
 * Error types shared by every burrow package.
 *
 * Each error carries a typed code so callers (the CLI, the install report) can
 * branch on it without string matching, plus an optional context that survives
 * JSON serialization.
 */

export type BurrowErrorCode =
  | "EMANIFEST" // manifest could not be parsed
  | "ERANGE" // no version satisfies the requested ranges
  | "EREGISTRY" // registry metadata could not be retrieved
  | "ENETWORK" // tarball download failed after retries
  | "EINTEGRITY" // downloaded bytes do not match the expected digest
  | "EFS" // filesystem operation failed
  | "ESCRIPT" // lifecycle script exited with an error
  | "EFROZEN" // lockfile is out of date and may not be rewritten
  | "ECONFIG"; // configuration file is unreadable

export interface BurrowErrorContext {
  package?: string;
  version?: string;
  range?: string;
  path?: string;
  url?: string;
  cause?: string;
}

export interface BurrowErrorJSON {
  name: string;
  code: BurrowErrorCode;
  message: string;
  context?: BurrowErrorContext;
}

export class BurrowError extends Error {
  readonly code: BurrowErrorCode;
  readonly context?: BurrowErrorContext;

  constructor(
    code: BurrowErrorCode,
    message: string,
    context?: BurrowErrorContext,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "BurrowError";
    this.code = code;
    this.context = context;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): BurrowErrorJSON {
    const json: BurrowErrorJSON = {
      name: this.name,
      code: this.code,
      message: this.message,
    };
    if (this.context !== undefined) {
      json.context = this.context;
    }
    return json;
  }
}

export class MalformedManifestError extends BurrowError {
  constructor(message: string, path?: string) {
    super("EMANIFEST", message, path === undefined ? undefined : { path });
    this.name = "MalformedManifestError";
  }
}

export class UnsatisfiableRangeError extends BurrowError {
  readonly ranges: readonly string[];

  constructor(name: string, ranges: readonly string[], reason?: string) {
    super(
      "ERANGE",
      `No version of "${name}" satisfies ${ranges
        .map((r) => `"${r}"`)
        .join(" and ")}${reason ? ` (${reason})` : ""}`,
      { package: name, range: ranges.join(" ") }
    );
    this.name = "UnsatisfiableRangeError";
    this.ranges = ranges;
  }
}

export class RegistryUnavailableError extends BurrowError {
  readonly status?: number;

  constructor(
    name: string,
    message: string,
    options?: { status?: number; url?: string; cause?: unknown }
  ) {
    super(
      "EREGISTRY",
      message,
      { package: name, url: options?.url, cause: describeCause(options?.cause) },
      { cause: options?.cause }
    );
    this.name = "RegistryUnavailableError";
    this.status = options?.status;
  }
}

export class NetworkError extends BurrowError {
  readonly status?: number;

  constructor(
    url: string,
    message: string,
    options?: { status?: number; cause?: unknown }
  ) {
    super(
      "ENETWORK",
      message,
      { url, cause: describeCause(options?.cause) },
      { cause: options?.cause }
    );
    this.name = "NetworkError";
    this.status = options?.status;
  }
}

export class IntegrityMismatchError extends BurrowError {
  readonly expected: string;
  readonly actual: string;

  constructor(name: string, version: string, expected: string, actual: string) {
    super(
      "EINTEGRITY",
      `Integrity check failed for ${name}@${version}: expected ${expected}, got ${actual}`,
      { package: name, version }
    );
    this.name = "IntegrityMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

export class FileSystemError extends BurrowError {
  constructor(message: string, path: string, cause?: unknown) {
    super(
      "EFS",
      message,
      { path, cause: describeCause(cause) },
      { cause }
    );
    this.name = "FileSystemError";
  }
}

export class ScriptError extends BurrowError {
  readonly script: string;
  readonly exitCode: number | null;
  readonly output: string;

  constructor(
    pkg: string,
    script: string,
    exitCode: number | null,
    output: string,
    path?: string
  ) {
    super(
      "ESCRIPT",
      `${script} script of ${pkg} failed${
        exitCode === null ? "" : ` with exit code ${exitCode}`
      }`,
      { package: pkg, path }
    );
    this.name = "ScriptError";
    this.script = script;
    this.exitCode = exitCode;
    this.output = output;
  }
}

export class FrozenLockfileError extends BurrowError {
  readonly reasons: readonly string[];

  constructor(reasons: readonly string[]) {
    super(
      "EFROZEN",
      `The lockfile needs to be updated, but --frozen-lockfile was set:\n  ${reasons.join(
        "\n  "
      )}`
    );
    this.name = "FrozenLockfileError";
    this.reasons = reasons;
  }
}

export class ConfigError extends BurrowError {
  constructor(message: string, path: string, cause?: unknown) {
    super("ECONFIG", message, { path, cause: describeCause(cause) }, { cause });
    this.name = "ConfigError";
  }
}

export function isBurrowError(value: unknown): value is BurrowError {
  return value instanceof BurrowError;
}

/**
 * Node system errors expose a `code` such as ENOENT; this reads it without
 * trusting the shape of the value.
 */
export function errnoCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const code = error.code;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

export function describeCause(cause: unknown): string | undefined {
  if (cause === undefined) {
    return undefined;
  }
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}

/**
 * Wraps an arbitrary failure of a filesystem call, leaving burrow errors untouched.
 */
export function toFileSystemError(
  error: unknown,
  path: string,
  action: string
): BurrowError {
  if (isBurrowError(error)) {
    return error;
  }
  const code = errnoCode(error);
  return new FileSystemError(
    `Failed to ${action} ${path}${code ? ` (${code})` : ""}`,
    path,
    error
  );
}
