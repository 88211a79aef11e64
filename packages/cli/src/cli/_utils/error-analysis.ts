// pattern: Functional Core

import {
  ArgumentRejected,
  ConfigurationError,
  DeleteFailed,
  type ErrorCategory,
  FileSystemError,
  PermissionDenied,
  SandboxViolation,
  SandshellError,
  ValidationError,
} from "../../utils/errors.js";

/**
 * Represents a categorized error with user-friendly messaging
 */
export interface AnalyzedError {
  category: ErrorCategory | "unknown";
  userMessage: string;
  technicalMessage: string;
  suggestions: string[];
}

function analyzeSandshellError(error: SandshellError): AnalyzedError {
  const message = error.message;
  const analyzed = (suggestions: string[]): AnalyzedError => ({
    category: error.category,
    userMessage: message,
    technicalMessage: message,
    suggestions,
  });

  if (error instanceof SandboxViolation) {
    return analyzed([
      `Only paths inside ${error.allowedRoot} are reachable`,
      "Use a path relative to the current directory or starting with / for the allowed root",
    ]);
  }

  if (error instanceof PermissionDenied) {
    return analyzed([
      `Check the ${error.kind} permissions on ${error.path}`,
    ]);
  }

  if (error instanceof DeleteFailed) {
    const suggestions = [
      "Ensure the file is not in use by another process",
    ];
    if (error.code === "EXDEV") {
      suggestions.push(
        "Check that the recycle directory's filesystem has room for a copy"
      );
    }
    return analyzed(suggestions);
  }

  if (error instanceof ArgumentRejected) {
    return analyzed([
      "Arguments containing parent-directory or system paths are blocked in safe mode",
      "Restart with --no-safe-mode to only log such arguments",
    ]);
  }

  if (error instanceof ValidationError) {
    const suggestions = [
      "Check your settings file syntax",
      "Run `sandshell schema` to see the accepted settings",
    ];
    if (error.validationErrors && error.validationErrors.length > 0) {
      suggestions.push(...error.validationErrors.map(e => `- ${e}`));
    }
    return analyzed(suggestions);
  }

  if (error instanceof ConfigurationError) {
    const errorLower = message.toLowerCase();
    if (errorLower.includes("multiple sandshell settings files")) {
      return analyzed(["Keep only one settings file per directory"]);
    }
    if (errorLower.includes("allowed root")) {
      return analyzed([
        "Check `allowedRoot` in your settings file or the --root option",
        "Verify the directory exists",
      ]);
    }
    return analyzed([
      "Check your sandshell settings file for errors",
      "Run with --log-level debug for more detailed information",
    ]);
  }

  if (error instanceof FileSystemError) {
    const suggestions = ["Verify the file or directory path exists"];
    if (error.operation === "read") {
      suggestions.push("Ensure the file exists and is readable");
    } else if (error.operation === "write") {
      suggestions.push("Ensure the directory is writable");
    } else if (error.operation === "delete") {
      suggestions.push("Ensure the file is not in use by another process");
    }
    return analyzed(suggestions);
  }

  return analyzed(["Type 'help' for available commands"]);
}

/**
 * Analyzes an error and provides structured information with user-friendly messages
 *
 * @param error The error to analyze (can be Error, string, or unknown)
 */
export function analyzeError(error: unknown): AnalyzedError {
  if (error instanceof SandshellError) {
    return analyzeSandshellError(error);
  }

  // Fall back to string-based analysis for foreign errors
  const errorMessage = getErrorMessage(error);
  const errorString = errorMessage.toLowerCase();

  if (
    errorString.includes("eacces") ||
    errorString.includes("permission denied")
  ) {
    return {
      category: "filesystem",
      userMessage: "Permission denied accessing files or directories",
      technicalMessage: errorMessage,
      suggestions: [
        "Check that you have write permissions to the target directories",
        "Verify the file or directory ownership is correct",
      ],
    };
  }

  if (errorString.includes("enoent")) {
    return {
      category: "filesystem",
      userMessage: "Required file or directory not found",
      technicalMessage: errorMessage,
      suggestions: ["Verify the file or directory path exists"],
    };
  }

  if (errorString.includes("invalid") || errorString.includes("validation")) {
    return {
      category: "validation",
      userMessage: "Configuration or input validation failed",
      technicalMessage: errorMessage,
      suggestions: [
        "Check your settings file syntax",
        "Check the command syntax and arguments",
      ],
    };
  }

  return {
    category: "unknown",
    userMessage: "An unexpected error occurred",
    technicalMessage: errorMessage,
    suggestions: [
      "Try the operation again",
      "Run with --log-level debug for more detailed information",
    ],
  };
}

/**
 * Extracts a string message from various error types
 */
function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  if (error && typeof error === "object" && "message" in error) {
    return String(error.message);
  }
  return String(error);
}
