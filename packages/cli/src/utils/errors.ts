// pattern: Functional Core

export type ErrorCategory =
  | "sandbox"
  | "permission"
  | "delete"
  | "argument"
  | "configuration"
  | "validation"
  | "filesystem"
  | "command";

/**
 * Base class for sandshell application errors
 * Keeps proper instanceof support and a category for error analysis
 */
export abstract class SandshellError extends Error {
  public readonly category: ErrorCategory;

  protected constructor(category: ErrorCategory, message: string) {
    super(message);
    this.name = this.constructor.name;
    this.category = category;

    // Maintain proper stack trace for where our error was created
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * A path escaped the allowed root, or could not be canonicalized at all
 */
export class SandboxViolation extends SandshellError {
  public readonly rejectedPath: string;
  public readonly allowedRoot: string;
  public readonly reason: string;
  public readonly candidatePath?: string;

  constructor(
    rejectedPath: string,
    allowedRoot: string,
    reason: string,
    candidatePath?: string
  ) {
    super(
      "sandbox",
      `Access denied: ${candidatePath ?? rejectedPath} ${reason} (allowed root: ${allowedRoot})`
    );
    this.rejectedPath = rejectedPath;
    this.allowedRoot = allowedRoot;
    this.reason = reason;
    if (candidatePath) {
      this.candidatePath = candidatePath;
    }
  }
}

/**
 * The advisory permission pre-check failed; the operation was not attempted
 */
export class PermissionDenied extends SandshellError {
  public readonly path: string;
  public readonly kind: string;

  constructor(path: string, kind: string) {
    super("permission", `Permission denied (${kind}): ${path}`);
    this.path = path;
    this.kind = kind;
  }
}

/**
 * Moving a path into the recycle directory failed or was refused
 */
export class DeleteFailed extends SandshellError {
  public readonly path: string;
  public readonly reason: string;
  public readonly code?: string;

  constructor(path: string, reason: string, code?: string) {
    super("delete", `Failed to delete ${path}: ${reason}`);
    this.path = path;
    this.reason = reason;
    if (code) {
      this.code = code;
    }
  }
}

/**
 * An argument matched the denylist while safe mode was on
 */
export class ArgumentRejected extends SandshellError {
  public readonly argument: string;
  public readonly pattern: string;

  constructor(argument: string, pattern: string) {
    super(
      "argument",
      `Invalid or potentially dangerous argument: ${argument} (matches "${pattern}")`
    );
    this.argument = argument;
    this.pattern = pattern;
  }
}

/**
 * Errors related to configuration files and startup
 */
export class ConfigurationError extends SandshellError {
  constructor(message: string) {
    super("configuration", message);
  }
}

/**
 * Errors related to validation failures
 */
export class ValidationError extends SandshellError {
  public readonly validationErrors?: string[];

  constructor(message: string, validationErrors?: string[]) {
    super("validation", message);
    if (validationErrors) {
      this.validationErrors = validationErrors;
    }
  }
}

/**
 * Errors related to file system operations performed by commands
 */
export class FileSystemError extends SandshellError {
  public readonly operation?: string;
  public readonly filePath?: string;

  constructor(message: string, operation?: string, filePath?: string) {
    super("filesystem", message);
    if (operation) {
      this.operation = operation;
    }
    if (filePath) {
      this.filePath = filePath;
    }
  }
}

/**
 * Usage errors: unknown commands, missing operands, unparsable lines
 */
export class CommandError extends SandshellError {
  public readonly commandName?: string;

  constructor(message: string, commandName?: string) {
    super("command", message);
    if (commandName) {
      this.commandName = commandName;
    }
  }
}

/**
 * Extracts the errno code from an unknown thrown value
 */
export function errnoCode(error: unknown): string | undefined {
  if (error && typeof error === "object" && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
