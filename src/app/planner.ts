/**
 * Plan a history rewrite
 * Decides which commits survive and what changes, without writing anything
 */

import { toRootFirst } from "./chain.js";
import {
  AmbiguousCommitError,
  CannotDeleteSoleCommitError,
  CommitNotFoundError,
  InvalidArgumentError,
} from "./errors.js";
import type { CommitRecord, RewritePolicy, TipFirstChain } from "./types.js";

export type Change = "message" | "parent" | "root";

/**
 * Plan for a single surviving commit
 */
export interface CommitPlan {
  source: CommitRecord;
  action: "reuse" | "create";
  message: string;
  changes: Change[]; // What changed (for display)
}

export type RewritePlan =
  | { kind: "noop"; policy: RewritePolicy; tip: string; reason: string }
  | {
    kind: "rewrite";
    policy: RewritePolicy;
    originalTip: string;
    steps: CommitPlan[]; // root first
    dropped: CommitRecord[];
  };

export interface PlanOptions {
  /**
   * Keep the original object for survivors whose message and parent are
   * untouched. When off, every survivor is rebuilt with a fresh committer.
   */
  reuseUnchanged?: boolean;
}

const HASH_PATTERN = /^[0-9a-f]{7,64}$/;

/**
 * Create a rewrite plan for a branch's history
 */
export function createPlan(
  chain: TipFirstChain,
  policy: RewritePolicy,
  options: PlanOptions = {},
): RewritePlan {
  const { reuseUnchanged = true } = options;
  const tip = chain.records[0];
  if (!tip) {
    throw new InvalidArgumentError("Branch has no commits");
  }

  const history = toRootFirst(chain).records;
  let survivors: CommitRecord[];
  let messages = new Map<string, string>();

  switch (policy.type) {
    case "truncate": {
      if (!Number.isInteger(policy.keep) || policy.keep < 1) {
        throw new InvalidArgumentError(`keep must be a positive integer, got ${policy.keep}`);
      }
      if (history.length <= policy.keep) {
        return {
          kind: "noop",
          policy,
          tip: tip.hash,
          reason: `History has ${history.length} commit${history.length === 1 ? "" : "s"}, no more than ${policy.keep}`,
        };
      }
      survivors = history.slice(history.length - policy.keep);
      break;
    }

    case "delete": {
      if (history.length === 1) {
        throw new CannotDeleteSoleCommitError();
      }
      const target = findTarget(history, policy.target);
      survivors = history.filter((record) => record !== target);
      break;
    }

    case "amend": {
      const target = findTarget(history, policy.target);
      if (target.message === policy.message) {
        return { kind: "noop", policy, tip: tip.hash, reason: `Commit ${target.hash} already has this message` };
      }
      survivors = [...history];
      messages = new Map([[target.hash, policy.message]]);
      break;
    }
  }

  const steps: CommitPlan[] = [];
  let previous: CommitPlan | null = null;

  for (const source of survivors) {
    const message = messages.get(source.hash) ?? source.message;
    const parent = previous?.source.hash ?? null;

    const changes: Change[] = [];
    if (message !== source.message) {
      changes.push("message");
    }
    if (parent === null && source.parentHash !== null) {
      changes.push("root");
    } else if (parent !== source.parentHash || previous?.action === "create") {
      changes.push("parent");
    }

    const action = reuseUnchanged && changes.length === 0 ? "reuse" : "create";
    const step: CommitPlan = { source, action, message, changes };
    steps.push(step);
    previous = step;
  }

  const kept = new Set(survivors);
  return {
    kind: "rewrite",
    policy,
    originalTip: tip.hash,
    steps,
    dropped: history.filter((record) => !kept.has(record)),
  };
}

/**
 * Find the commit a full or abbreviated hash names
 */
export function findTarget(history: readonly CommitRecord[], target: string): CommitRecord {
  const needle = target.trim().toLowerCase();
  // Anything that cannot name a commit matches none
  if (!HASH_PATTERN.test(needle)) {
    throw new CommitNotFoundError(target);
  }

  const exact = history.find((record) => record.hash === needle);
  if (exact) {
    return exact;
  }

  const matches = history.filter((record) => record.hash.startsWith(needle));
  if (matches.length > 1) {
    throw new AmbiguousCommitError(target, matches.map((record) => record.hash));
  }
  const [match] = matches;
  if (!match) {
    throw new CommitNotFoundError(target);
  }
  return match;
}
