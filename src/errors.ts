export class NowPlayingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Raised once at startup when the environment is missing or has invalid values.
 */
export class ConfigError extends NowPlayingError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export type FetchErrorKind = 'transient' | 'permanent';

export class FetchError extends NowPlayingError {
  readonly kind: FetchErrorKind;
  readonly statusCode?: number;

  constructor(
    kind: FetchErrorKind,
    message: string,
    options: { statusCode?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.kind = kind;
    this.statusCode = options.statusCode;
  }
}

export class DocumentError extends NowPlayingError {
  readonly operation: 'read' | 'write';
  readonly filePath: string;

  constructor(operation: 'read' | 'write', filePath: string, cause: unknown) {
    super(`Failed to ${operation} ${filePath}: ${errorMessage(cause)}`, { cause });
    this.operation = operation;
    this.filePath = filePath;
  }
}

export class GitCommandError extends NowPlayingError {
  readonly command: string;
  readonly args: string[];
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly stderr: string;

  constructor(
    command: string,
    args: string[],
    details: { exitCode: number | null; signal: NodeJS.Signals | null; stderr: string; reason?: string }
  ) {
    const outcome = details.reason
      ?? (details.signal ? `killed by ${details.signal}` : `exited with code ${details.exitCode}`);
    const stderr = details.stderr.trim();
    super(`${command} ${args.join(' ')} ${outcome}${stderr ? `: ${stderr}` : ''}`);
    this.command = command;
    this.args = args;
    this.exitCode = details.exitCode;
    this.signal = details.signal;
    this.stderr = details.stderr;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
