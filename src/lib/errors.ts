/**
 * Error classes for larder.
 *
 * Every error carries a stable code so callers (and logs) can branch on the
 * failure kind without matching on message text.
 */

export enum ErrorCode {
  PARSE_FAILED = "E1000",
  PARSE_DUPLICATE_RESOURCE = "E1001",
  PARSE_TEMPLATE = "E1002",

  RESOURCE_APPLY_FAILED = "E2000",
  RESOURCE_VERIFY_FAILED = "E2001",
  COMMAND_TIMEOUT = "E2002",

  SYNC_TRANSPORT = "E3000",
  SYNC_PUBLISH = "E3001",
  SYNC_GIT = "E3002",

  STATE_LOCKED = "E4000",

  CONFIG_INVALID = "E9000",
}

export class LarderError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, context?: Record<string, unknown>) {
    super(message);
    this.name = "LarderError";
    this.code = code;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

export interface ParseIssue {
  path: string;
  message: string;
}

/**
 * A cookbook that cannot be turned into a typed model. Raised before any
 * resource is touched.
 */
export class ParseError extends LarderError {
  public readonly source: string;
  public readonly issues: ParseIssue[];

  constructor(
    source: string,
    issues: ParseIssue[],
    code: ErrorCode = ErrorCode.PARSE_FAILED
  ) {
    const detail = issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join("; ");
    super(`Invalid cookbook ${source}: ${detail}`, code, { source });
    this.name = "ParseError";
    this.source = source;
    this.issues = issues;
  }
}

export class ResourceApplyError extends LarderError {
  public readonly resourceId: string;

  constructor(resourceId: string, message: string, code: ErrorCode = ErrorCode.RESOURCE_APPLY_FAILED) {
    super(message, code, { resourceId });
    this.name = "ResourceApplyError";
    this.resourceId = resourceId;
  }
}

export class CommandTimeoutError extends LarderError {
  public readonly timeoutMs: number;

  constructor(command: string, timeoutMs: number) {
    super(`Command timed out after ${timeoutMs}ms: ${command}`, ErrorCode.COMMAND_TIMEOUT, { command });
    this.name = "CommandTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class SyncTransportError extends LarderError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.SYNC_TRANSPORT, context);
    this.name = "SyncTransportError";
  }
}

export class PublishError extends LarderError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.SYNC_PUBLISH, context);
    this.name = "PublishError";
  }
}

export class StateLockedError extends LarderError {
  public readonly holderPid: number | null;

  constructor(lockPath: string, holderPid: number | null) {
    const holder = holderPid === null ? "another process" : `pid ${holderPid}`;
    super(`State is locked by ${holder}: ${lockPath}`, ErrorCode.STATE_LOCKED, { lockPath });
    this.name = "StateLockedError";
    this.holderPid = holderPid;
  }
}

export class ConfigError extends LarderError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIG_INVALID, context);
    this.name = "ConfigError";
  }
}

export function isLarderError(error: unknown): error is LarderError {
  return error instanceof LarderError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
