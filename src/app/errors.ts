/**
 * Error taxonomy for git-retcon
 *
 * Every failure carries the phase it happened in. Nothing here is retried.
 */

export type Phase =
  | "config"
  | "auth"
  | "fetch"
  | "traverse"
  | "plan"
  | "write"
  | "publish";

export class RetconError extends Error {
  readonly phase: Phase;

  constructor(phase: Phase, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.phase = phase;
  }
}

export class ConfigError extends RetconError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("config", issues.length ? `${message}\n  - ${issues.join("\n  - ")}` : message);
    this.issues = issues;
  }
}

export class InvalidArgumentError extends RetconError {
  constructor(message: string) {
    super("plan", message);
  }
}

export class AuthError extends RetconError {
  constructor(message: string, options?: { cause?: unknown; phase?: Phase }) {
    super(options?.phase ?? "auth", message, options);
  }
}

/**
 * Clone, fetch or push failed. `message` is git's own output.
 */
export class TransportError extends RetconError {
  constructor(phase: "fetch" | "publish", message: string, options?: { cause?: unknown }) {
    super(phase, message, options);
  }
}

export class ConcurrentModificationError extends RetconError {
  constructor(branchRef: string, expected: string, options?: { cause?: unknown }) {
    super(
      "publish",
      `Remote ${branchRef} moved since it was fetched (expected ${expected}); nothing was overwritten`,
      options,
    );
  }
}

export class NotABranchError extends RetconError {
  constructor(head: string) {
    super("traverse", `HEAD is not on a branch: ${head}`);
  }
}

export class TraversalError extends RetconError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("traverse", message, options);
  }
}

export class MergeCommitError extends RetconError {
  constructor(hash: string, parentCount: number) {
    super("traverse", `Commit ${hash} has ${parentCount} parents; only linear history can be rewritten`);
  }
}

export class CommitNotFoundError extends RetconError {
  constructor(target: string) {
    super("plan", `Commit not found in history: ${target}`);
  }
}

export class AmbiguousCommitError extends RetconError {
  readonly candidates: string[];

  constructor(target: string, candidates: string[]) {
    super("plan", `Commit prefix ${target} is ambiguous: ${candidates.join(", ")}`);
    this.candidates = candidates;
  }
}

export class CannotDeleteSoleCommitError extends RetconError {
  constructor() {
    super("plan", "Cannot delete the only commit in the repository");
  }
}

/**
 * Writing a rewritten commit failed. The branch reference was not touched.
 */
export class EncodeOrStoreError extends RetconError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("write", message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
