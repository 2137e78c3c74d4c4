// pattern: Functional Core

import {
  CommandNotFoundError,
  ConfigurationError,
  ExitCode,
  FileSystemError,
  InvalidPolicyError,
  LaunchFailedError,
  NorunError,
  NotFoundError,
  PrefixLockedError,
  ProcessError,
  SandboxUnavailableError,
  UserCancellationError,
  ValidationError,
} from "../../utils/errors.js";

/**
 * Represents a categorized error with user-friendly messaging
 */
export interface AnalyzedError {
  category:
    | "filesystem"
    | "process"
    | "validation"
    | "configuration"
    | "sandbox"
    | "not-found"
    | "launch"
    | "cancellation"
    | "unknown";
  userMessage: string;
  technicalMessage: string;
  suggestions: string[];
  /** Process exit code for the CLI */
  exitCode: number;
}

const INSTALL_UMU_SUGGESTION =
  "Install umu-launcher to use the Proton runner (provides umu-run)";
const INSTALL_BWRAP_SUGGESTION =
  "Install bubblewrap (bwrap) from your distribution's packages";

function suggestionsForMissingCommand(command: string): string[] {
  switch (command) {
    case "umu-run":
      return [INSTALL_UMU_SUGGESTION, "Or switch the app to the wine runner"];
    case "bwrap":
      return [INSTALL_BWRAP_SUGGESTION];
    case "wine":
    case "wine64":
    case "wineboot":
    case "wineserver":
    case "winepath":
      return ["Install Wine and make sure it is on your PATH"];
    case "winetricks":
      return ["Install winetricks and make sure it is on your PATH"];
    default:
      return [`Make sure ${command} is installed and on your PATH`];
  }
}

/**
 * Analyzes an error and provides structured information with user-friendly
 * messages and the exit code the CLI should use
 */
export function analyzeError(error: unknown): AnalyzedError {
  if (error instanceof NorunError) {
    const errorMessage = error.message;

    if (error instanceof LaunchFailedError) {
      const suggestions: string[] = [];
      if (error.logPath) {
        suggestions.push(`Inspect the log: ${error.logPath}`);
      }
      if (error.exitCode === undefined) {
        suggestions.push("Check that the program exists and is executable");
      }
      return {
        category: "launch",
        userMessage: errorMessage,
        technicalMessage: `${errorMessage} (command: ${error.command.join(" ")})`,
        suggestions,
        exitCode: error.exitCode ?? ExitCode.LAUNCH_FAILED,
      };
    }

    if (error instanceof CommandNotFoundError) {
      return {
        category: "not-found",
        userMessage: errorMessage,
        technicalMessage: errorMessage,
        suggestions: suggestionsForMissingCommand(error.command),
        exitCode: ExitCode.NOT_FOUND,
      };
    }

    if (error instanceof NotFoundError) {
      return {
        category: "not-found",
        userMessage: errorMessage,
        technicalMessage: errorMessage,
        suggestions: [
          "Check the name or path for typos",
          "Run `norun ls` to see configured apps",
        ],
        exitCode: ExitCode.NOT_FOUND,
      };
    }

    if (error instanceof SandboxUnavailableError) {
      return {
        category: "sandbox",
        userMessage: errorMessage,
        technicalMessage: errorMessage,
        suggestions: [INSTALL_BWRAP_SUGGESTION, "Or add the app without --sandbox"],
        exitCode: ExitCode.USAGE,
      };
    }

    if (error instanceof InvalidPolicyError) {
      return {
        category: "sandbox",
        userMessage: errorMessage,
        technicalMessage: errorMessage,
        suggestions: [],
        exitCode: ExitCode.USAGE,
      };
    }

    if (error instanceof ValidationError) {
      const suggestions = ["Check the app's YAML file for invalid values"];
      if (error.validationErrors && error.validationErrors.length > 0) {
        suggestions.push(...error.validationErrors.map(e => `- ${e}`));
      }
      return {
        category: "validation",
        userMessage: errorMessage,
        technicalMessage: errorMessage,
        suggestions,
        exitCode: ExitCode.USAGE,
      };
    }

    if (error instanceof ConfigurationError) {
      return {
        category: "configuration",
        userMessage: errorMessage,
        technicalMessage: errorMessage,
        suggestions: ["Run with --log-level debug for more detailed information"],
        exitCode: ExitCode.USAGE,
      };
    }

    if (error instanceof PrefixLockedError) {
      return {
        category: "process",
        userMessage: errorMessage,
        technicalMessage: errorMessage,
        suggestions: ["Wait for the other launch to finish, then try again"],
        exitCode: ExitCode.FAILURE,
      };
    }

    if (error instanceof FileSystemError) {
      const suggestions = [
        "Verify the file or directory path exists",
        "Check that you have the necessary permissions",
      ];
      if (error.operation === "read") {
        suggestions.push("Ensure the file exists and is readable");
      } else if (error.operation === "write") {
        suggestions.push("Ensure the directory is writable");
      }
      return {
        category: "filesystem",
        userMessage: errorMessage,
        technicalMessage: errorMessage,
        suggestions,
        exitCode: ExitCode.FAILURE,
      };
    }

    if (error instanceof ProcessError) {
      return {
        category: "process",
        userMessage: errorMessage,
        technicalMessage: errorMessage,
        suggestions: ["Run with --log-level debug for more detailed information"],
        exitCode: ExitCode.FAILURE,
      };
    }

    if (error instanceof UserCancellationError) {
      return {
        category: "cancellation",
        userMessage: error.silent ? "" : errorMessage,
        technicalMessage: errorMessage,
        suggestions: [],
        exitCode: ExitCode.FAILURE,
      };
    }

    return {
      category: "unknown",
      userMessage: errorMessage,
      technicalMessage: errorMessage,
      suggestions: ["Run with --log-level debug for more information"],
      exitCode: ExitCode.FAILURE,
    };
  }

  // Fall back to string-based analysis for errors from Node and libraries
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
        "Check that you have write permissions to the norun data directory",
        "Verify the file or directory ownership is correct",
      ],
      exitCode: ExitCode.FAILURE,
    };
  }

  if (errorString.includes("enoent")) {
    return {
      category: "filesystem",
      userMessage: "Required file or directory not found",
      technicalMessage: errorMessage,
      suggestions: ["Verify the file or directory path exists"],
      exitCode: ExitCode.FAILURE,
    };
  }

  if (errorString.includes("enospc")) {
    return {
      category: "filesystem",
      userMessage: "No space left on device",
      technicalMessage: errorMessage,
      suggestions: ["Free some disk space; prefixes can grow to several gigabytes"],
      exitCode: ExitCode.FAILURE,
    };
  }

  // Ctrl+C in an interactive prompt
  if (errorString.includes("force closed")) {
    return {
      category: "cancellation",
      userMessage: "",
      technicalMessage: errorMessage,
      suggestions: [],
      exitCode: ExitCode.FAILURE,
    };
  }

  return {
    category: "unknown",
    userMessage: "An unexpected error occurred",
    technicalMessage: errorMessage,
    suggestions: [
      "Check the command syntax and arguments",
      "Run with --log-level debug for more detailed information",
    ],
    exitCode: ExitCode.FAILURE,
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
