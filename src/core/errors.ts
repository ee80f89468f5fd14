/*
Purpose: core error types shared by the scope resolver and CLI output.
Assumptions: UserFacingError instances are safe to display to end users.
Usage: throw new ConfigError("...", issues); throw new UserFacingError({ code, title, message, hint, next, cause }).
*/

// =============================================================================
// ERROR CODES
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  input: "INPUT_ERROR",
  git: "GIT_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

// =============================================================================
// SCOPE ERRORS
// =============================================================================

// Internal failures that still know which user-facing code and title they report under
// when nothing upstream wraps them.
export abstract class ScopeError extends Error {
  abstract readonly code: UserFacingErrorCode;
  abstract readonly title: string;

  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "ScopeError";
  }

  details(): string[] {
    return [];
  }
}

export class ConfigError extends ScopeError {
  readonly code = USER_FACING_ERROR_CODES.config;
  readonly title = "Selection config invalid.";

  constructor(
    message: string,
    public readonly issues: string[] = [],
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "ConfigError";
  }

  details(): string[] {
    return this.issues.map((issue) => `  - ${issue}`);
  }
}

export class GitError extends ScopeError {
  readonly code = USER_FACING_ERROR_CODES.git;
  readonly title = "Git command failed.";

  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "GitError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly next?: string;
  public readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}
