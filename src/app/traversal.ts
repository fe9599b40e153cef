/**
 * Walk a branch tip back to its root
 */

import { tipFirst } from "./chain.js";
import { errorMessage, NotABranchError, RetconError, TraversalError } from "./errors.js";
import type { ObjectStore } from "./ports.js";
import type { CommitRecord, TipFirstChain } from "./types.js";

export const DEFAULT_MAX_DEPTH = 1_000_000;

export interface WalkOptions {
  /** Stop after this many records; 0 or less walks to the root */
  limit?: number;
  maxDepth?: number;
}

export interface BranchHistory {
  branchRef: string;
  tip: string;
  chain: TipFirstChain;
}

/**
 * Walk the checked-out branch. Rewriting needs a ref to move, so a
 * detached HEAD is rejected.
 */
export async function walkBranch(store: ObjectStore, options: WalkOptions = {}): Promise<BranchHistory> {
  const head = await store.currentHead();
  if (head.kind !== "branch") {
    throw new NotABranchError(head.hash);
  }

  const tip = await store.resolveTip(head.ref);
  const chain = await walkAncestry(store, tip, options);
  return { branchRef: head.ref, tip, chain };
}

/**
 * Follow parent links from `tip` until a root commit
 */
export async function walkAncestry(
  store: ObjectStore,
  tip: string,
  options: WalkOptions = {},
): Promise<TipFirstChain> {
  const { limit = 0, maxDepth = DEFAULT_MAX_DEPTH } = options;

  const records: CommitRecord[] = [];
  const seen = new Set<string>();
  let next: string | null = tip;

  while (next !== null) {
    if (limit > 0 && records.length >= limit) {
      break;
    }
    if (seen.has(next)) {
      throw new TraversalError(`Cycle in history: ${next} was reached twice`);
    }
    if (records.length >= maxDepth) {
      throw new TraversalError(`History deeper than ${maxDepth} commits`);
    }
    seen.add(next);

    const record = await readReported(store, next, records.at(-1));
    records.push(record);
    next = record.parentHash;
  }

  return tipFirst(records);
}

async function readReported(
  store: ObjectStore,
  hash: string,
  child: CommitRecord | undefined,
): Promise<CommitRecord> {
  try {
    return await store.readCommit(hash);
  } catch (error) {
    // Merge rejections and the like already say what went wrong
    if (error instanceof RetconError) {
      throw error;
    }
    const origin = child ? `parent of ${child.hash}` : "branch tip";
    throw new TraversalError(`Cannot read commit ${hash} (${origin}): ${errorMessage(error)}`, {
      cause: error,
    });
  }
}
