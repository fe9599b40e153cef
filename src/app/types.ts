/**
 * Domain types for git-retcon
 */

export interface Signature {
  name: string;
  email: string;
  timestamp: number; // epoch milliseconds
  timezone?: string; // "+0200"; UTC when absent
}

/**
 * A commit as read from the object store. Single-parent by construction:
 * merge commits never make it into a CommitRecord.
 */
export interface CommitRecord {
  readonly hash: string;
  readonly parentHash: string | null;
  readonly treeHash: string;
  readonly author: Readonly<Signature>;
  readonly committer: Readonly<Signature>;
  readonly message: string;
}

/**
 * A commit about to be written. The store derives the hash.
 */
export type CommitDraft = Omit<CommitRecord, "hash">;

/**
 * A commit exactly as a backend reports it, before the single-parent check
 */
export interface RawCommit extends Omit<CommitRecord, "parentHash"> {
  parents: string[];
}

/**
 * Committer identity used for every commit this tool creates
 */
export interface Identity {
  name: string;
  email: string;
}

/**
 * Newest commit first, as a traversal yields it
 */
export interface TipFirstChain {
  readonly order: "tip-first";
  readonly records: readonly CommitRecord[];
}

/**
 * Oldest commit first, as a rewrite consumes it
 */
export interface RootFirstChain {
  readonly order: "root-first";
  readonly records: readonly CommitRecord[];
}

export interface CommitSummary {
  hash: string;
  authorName: string;
  authorEmail: string;
  message: string;
  timestampMillis: number;
}

export type RewritePolicy =
  | { type: "truncate"; keep: number }
  | { type: "delete"; target: string }
  | { type: "amend"; target: string; message: string };

export type HeadRef =
  | { kind: "branch"; ref: string; hash: string }
  | { kind: "detached"; hash: string };

export type Credentials =
  | { kind: "ssh"; privateKey: string }
  | { kind: "ssh-agent" }
  | { kind: "none" };

export type OperationResult =
  | { status: "noop"; tip: string }
  | {
    status: "rewritten";
    branchRef: string;
    originalTip: string;
    newTip: string;
    kept: number;
    dropped: string[];
  };
