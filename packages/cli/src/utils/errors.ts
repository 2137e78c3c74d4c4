// pattern: Functional Core

/**
 * Process exit codes used by the CLI when an error reaches the top level.
 * A failed launch exits with the child's own code instead.
 */
export const ExitCode = {
  OK: 0,
  FAILURE: 1,
  USAGE: 2,
  NOT_FOUND: 3,
  LAUNCH_FAILED: 10,
} as const;

/**
 * Base class for norun application errors
 */
export abstract class NorunError extends Error {
  public readonly category: string;

  protected constructor(category: string, message: string) {
    super(message);
    this.name = this.constructor.name;
    this.category = category;

    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Errors related to persisted app configuration and directory setup
 */
export class ConfigurationError extends NorunError {
  constructor(message: string) {
    super("configuration", message);
  }
}

/**
 * Errors related to schema validation of loaded data
 */
export class ValidationError extends NorunError {
  public readonly validationErrors?: string[];

  constructor(message: string, validationErrors?: string[]) {
    super("validation", message);
    if (validationErrors) {
      this.validationErrors = validationErrors;
    }
  }
}

/**
 * Errors related to file system operations
 */
export class FileSystemError extends NorunError {
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
 * Unknown sandbox mode. Raised before any directive is built.
 */
export class InvalidPolicyError extends NorunError {
  public readonly mode: string;

  constructor(mode: string) {
    super(
      "sandbox",
      `Invalid sandbox mode '${mode}': must be one of full, strict`
    );
    this.mode = mode;
  }
}

/**
 * Sandboxing was requested but bubblewrap is not installed or not usable
 */
export class SandboxUnavailableError extends NorunError {
  constructor(message: string) {
    super("sandbox", message);
  }
}

/**
 * Errors related to launching and supervising child processes
 */
export class ProcessError extends NorunError {
  public readonly processName?: string;
  public readonly exitCode?: number;

  constructor(message: string, processName?: string, exitCode?: number) {
    super("process", message);
    if (processName) {
      this.processName = processName;
    }
    if (exitCode !== undefined) {
      this.exitCode = exitCode;
    }
  }
}

export class CommandNotFoundError extends ProcessError {
  public readonly command: string;

  constructor(command: string) {
    super(`Command not found: ${command}`, command);
    this.command = command;
  }
}

/**
 * A supervised child exited non-zero, or could not be started at all
 * (in which case exitCode is undefined).
 */
export class LaunchFailedError extends ProcessError {
  public readonly command: string[];
  public readonly logPath?: string;

  constructor(
    message: string,
    command: string[],
    exitCode?: number,
    logPath?: string
  ) {
    super(message, command[0], exitCode);
    this.command = command;
    if (logPath) {
      this.logPath = logPath;
    }
  }
}

/**
 * Base for errors where a named thing the user asked for does not exist
 */
export abstract class NotFoundError extends NorunError {
  protected constructor(message: string) {
    super("not-found", message);
  }
}

export class InstallerNotFoundError extends NotFoundError {
  public readonly installerPath: string;

  constructor(installerPath: string) {
    super(`Installer file not found: ${installerPath}`);
    this.installerPath = installerPath;
  }
}

export class NoGlobMatchError extends NotFoundError {
  public readonly pattern: string;

  constructor(pattern: string) {
    super(`No installer matched pattern: ${pattern}`);
    this.pattern = pattern;
  }
}

export class AppNotFoundError extends NotFoundError {
  public readonly appName: string;

  constructor(appName: string) {
    super(`App not found: ${appName}`);
    this.appName = appName;
  }
}

/**
 * No executable was given, none was recorded, and autodetection found nothing
 */
export class ExecutableNotFoundError extends NotFoundError {
  public readonly appName: string;

  constructor(appName: string) {
    super(`No executable known for app '${appName}'`);
    this.appName = appName;
  }
}

/**
 * Another norun process holds the lock for this prefix
 */
export class PrefixLockedError extends NorunError {
  public readonly prefixPath: string;
  public readonly ownerPid?: number;

  constructor(prefixPath: string, ownerPid?: number) {
    super(
      "process",
      ownerPid !== undefined
        ? `Prefix ${prefixPath} is in use by process ${ownerPid}`
        : `Prefix ${prefixPath} is in use by another process`
    );
    this.prefixPath = prefixPath;
    if (ownerPid !== undefined) {
      this.ownerPid = ownerPid;
    }
  }
}

/**
 * Errors related to user cancellation (Ctrl+C, declined confirmation)
 */
export class UserCancellationError extends NorunError {
  public readonly silent: boolean;

  constructor(message: string, silent = true) {
    super("cancellation", message);
    this.silent = silent;
  }
}
