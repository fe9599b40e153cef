/**
 * Construction and conversion of ancestry chains
 */

import { MergeCommitError } from "./errors.js";
import type { CommitRecord, CommitSummary, RawCommit, RootFirstChain, TipFirstChain } from "./types.js";

export function tipFirst(records: readonly CommitRecord[]): TipFirstChain {
  return { order: "tip-first", records };
}

export function rootFirst(records: readonly CommitRecord[]): RootFirstChain {
  return { order: "root-first", records };
}

export function toRootFirst(chain: TipFirstChain): RootFirstChain {
  return rootFirst([...chain.records].reverse());
}

export function toTipFirst(chain: RootFirstChain): TipFirstChain {
  return tipFirst([...chain.records].reverse());
}

/**
 * Narrow a backend commit to a single-parent record
 */
export function toCommitRecord(raw: RawCommit): CommitRecord {
  if (raw.parents.length > 1) {
    throw new MergeCommitError(raw.hash, raw.parents.length);
  }
  return {
    hash: raw.hash,
    parentHash: raw.parents[0] ?? null,
    treeHash: raw.treeHash,
    author: raw.author,
    committer: raw.committer,
    message: raw.message,
  };
}

export function toCommitSummary(record: CommitRecord): CommitSummary {
  return {
    hash: record.hash,
    authorName: record.author.name,
    authorEmail: record.author.email,
    message: record.message,
    timestampMillis: record.author.timestamp,
  };
}
