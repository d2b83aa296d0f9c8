/**
 * Error types raised by the discovery pipeline
 */

export class MacroProbeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MacroProbeError";
  }
}

/** Invalid discovery options or an out-of-range type tag. */
export class ConfigurationError extends MacroProbeError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * The preprocessor exited non-zero or was killed by a signal.
 * Fatal to the discovery run.
 */
export class ToolInvocationError extends MacroProbeError {
  public readonly command: string[];
  public readonly stderr: string;
  public readonly status: number | null;
  public readonly signal: string | null;

  constructor(command: string[], stderr: string, status: number | null, signal: string | null) {
    const reason = signal ? `killed by ${signal}` : `exited with status ${status ?? "unknown"}`;
    super(`command: ${command.join(" ")} failed (${reason})${stderr ? `\n${stderr.trimEnd()}` : ""}`);
    this.name = "ToolInvocationError";
    this.command = command;
    this.stderr = stderr;
    this.status = status;
    this.signal = signal;
  }
}

export class ProbeBuildError extends MacroProbeError {
  public readonly command: string[];
  public readonly stderr: string;

  constructor(command: string[], stderr: string) {
    super(`probe build failed: ${command.join(" ")}`);
    this.name = "ProbeBuildError";
    this.command = command;
    this.stderr = stderr;
  }
}

export class ProbeLoadError extends MacroProbeError {
  public readonly libraryPath: string;

  constructor(libraryPath: string, cause: unknown) {
    super(`unable to load or call probe ${libraryPath}: ${describeError(cause)}`);
    this.name = "ProbeLoadError";
    this.libraryPath = libraryPath;
  }
}

/**
 * Format any thrown value as a single message
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
