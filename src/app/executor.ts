/**
 * Execute a rewrite plan
 * Rebuilds the surviving commits root first, linking each to the new hash
 * of the one before it
 */

import { rootFirst } from "./chain.js";
import { EncodeOrStoreError, errorMessage } from "./errors.js";
import type { RewritePlan } from "./planner.js";
import type { Clock, ObjectStore } from "./ports.js";
import type { CommitDraft, CommitRecord, Identity, RootFirstChain } from "./types.js";
import type { Logger } from "../lib/logger.js";
import { silentLogger } from "../lib/logger.js";
import { truncate } from "../lib/string.js";

export interface ExecuteOptions {
  identity: Identity;
  clock?: Clock;
  logger?: Logger;
}

export interface RewriteResult {
  originalTip: string;
  newTip: string;
  commits: RootFirstChain;
  /** original hash → hash in the new history */
  rewritten: Map<string, string>;
  dropped: string[];
}

/**
 * Write the new commits of a plan. The branch reference is left alone;
 * a failure part-way leaves only unreferenced objects behind.
 */
export async function executePlan(
  plan: Extract<RewritePlan, { kind: "rewrite" }>,
  store: ObjectStore,
  options: ExecuteOptions,
): Promise<RewriteResult> {
  const { identity, clock = () => new Date(), logger = silentLogger } = options;

  const commits: CommitRecord[] = [];
  const rewritten = new Map<string, string>();
  let parentHash: string | null = null;

  for (let i = 0; i < plan.steps.length; i++) {
    const { source, action, message } = plan.steps[i];
    const label = `[${i + 1}/${plan.steps.length}] ${source.hash.substring(0, 7)} ${truncate(firstLine(message), 50)}`;

    if (action === "reuse") {
      logger.step(`${label}: unchanged`);
      commits.push(source);
      rewritten.set(source.hash, source.hash);
      parentHash = source.hash;
      continue;
    }

    const draft: CommitDraft = {
      parentHash,
      treeHash: source.treeHash,
      author: source.author,
      committer: { name: identity.name, email: identity.email, timestamp: clock().getTime() },
      message,
    };

    let hash: string;
    try {
      hash = await store.writeCommit(draft);
    } catch (error) {
      throw new EncodeOrStoreError(`Cannot write rewritten commit for ${source.hash}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    logger.step(`${label}: ${hash.substring(0, 7)}`);

    commits.push({ hash, ...draft });
    rewritten.set(source.hash, hash);
    parentHash = hash;
  }

  if (parentHash === null) {
    throw new EncodeOrStoreError("Rewrite produced no commits");
  }

  return {
    originalTip: plan.originalTip,
    newTip: parentHash,
    commits: rootFirst(commits),
    rewritten,
    dropped: plan.dropped.map((record) => record.hash),
  };
}

function firstLine(message: string): string {
  return message.split("\n", 1)[0];
}
