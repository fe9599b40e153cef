/**
 * Boundaries between the rewrite engine and a version-control backend
 */

import type { CommitDraft, CommitRecord, Credentials, HeadRef, Identity } from "./types.js";

/**
 * Content-addressed commit storage plus the refs that point into it.
 * The engine never sees encoded bytes.
 */
export interface ObjectStore {
  currentHead(): Promise<HeadRef>;
  resolveTip(branchRef: string): Promise<string>;
  readCommit(hash: string): Promise<CommitRecord>;
  writeCommit(draft: CommitDraft): Promise<string>;
  setReference(branchRef: string, hash: string): Promise<void>;
}

/**
 * Checked-out files of a session, used to append ordinary commits
 */
export interface Worktree {
  writeFile(path: string, content: string): Promise<void>;
  stage(path: string): Promise<void>;
  /** Commit staged changes onto the checked-out branch */
  commit(message: string, identity: Identity, when: Date): Promise<string>;
}

export type PushOutcome = "pushed" | "up-to-date";

export interface PushOptions {
  force: boolean;
  /** Remote value the push may overwrite; anything else is rejected */
  expectedRemoteHash?: string;
}

/**
 * A full local copy of a remote, holding the credentials it was fetched with
 */
export interface RepositorySession {
  readonly remoteURL: string;
  readonly store: ObjectStore;
  readonly worktree: Worktree;
  /** Propagate a local branch to the remote under the same name */
  push(branchRef: string, options: PushOptions): Promise<PushOutcome>;
  dispose(): Promise<void>;
}

export interface Transport {
  fetchFullHistory(remoteURL: string, credentials: Credentials): Promise<RepositorySession>;
}

export type Clock = () => Date;
