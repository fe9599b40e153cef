/**
 * Public operations: rewrite, append to and list the history of a remote
 */

import { toCommitSummary } from "./chain.js";
import { executePlan } from "./executor.js";
import { createPlan, findTarget, type RewritePlan } from "./planner.js";
import type { Clock, RepositorySession, Transport } from "./ports.js";
import { publish } from "./publisher.js";
import { walkAncestry, walkBranch } from "./traversal.js";
import { NotABranchError } from "./errors.js";
import type {
  CommitRecord,
  CommitSummary,
  Credentials,
  Identity,
  OperationResult,
  RewritePolicy,
} from "./types.js";
import type { Logger } from "../lib/logger.js";
import { silentLogger } from "../lib/logger.js";
import { randomHex, shortHash } from "../lib/string.js";

export const README_PATH = "README.MD";

/**
 * New message for an amended commit, or a way to derive it from the original
 */
export type MessageSource = string | ((original: CommitRecord) => Promise<string>);

export interface RetconOptions {
  identity: Identity;
  transport: Transport;
  clock?: Clock;
  logger?: Logger;
  /** See PlanOptions.reuseUnchanged */
  reuseUnchanged?: boolean;
  /** Refuse to overwrite a remote branch that moved since the fetch */
  lease?: boolean;
}

export interface Retcon {
  appendReadmeCommit(remoteURL: string, credentials: Credentials, message: string): Promise<string>;
  listRecentCommits(remoteURL: string, credentials: Credentials, max: number): Promise<CommitSummary[]>;
  truncateHistory(remoteURL: string, credentials: Credentials, keep: number): Promise<OperationResult>;
  deleteCommit(remoteURL: string, credentials: Credentials, target: string): Promise<OperationResult>;
  amendCommitMessage(
    remoteURL: string,
    credentials: Credentials,
    target: string,
    message: MessageSource,
  ): Promise<OperationResult>;
  /** Work out a rewrite without writing or pushing anything */
  planRewrite(remoteURL: string, credentials: Credentials, policy: RewritePolicy): Promise<RewritePlan>;
}

export function createRetcon(options: RetconOptions): Retcon {
  const {
    identity,
    transport,
    clock = () => new Date(),
    logger = silentLogger,
    reuseUnchanged = true,
    lease = true,
  } = options;

  async function withSession<T>(
    remoteURL: string,
    credentials: Credentials,
    work: (session: RepositorySession) => Promise<T>,
  ): Promise<T> {
    const session = await transport.fetchFullHistory(remoteURL, credentials);
    try {
      return await work(session);
    } finally {
      await session.dispose();
    }
  }

  async function rewrite(
    remoteURL: string,
    credentials: Credentials,
    resolvePolicy: (history: readonly CommitRecord[]) => Promise<RewritePolicy>,
  ): Promise<OperationResult> {
    return await withSession<OperationResult>(remoteURL, credentials, async (session) => {
      const { branchRef, tip, chain } = await walkBranch(session.store);
      logger.info(`Found ${chain.records.length} commit${chain.records.length === 1 ? "" : "s"} on ${branchRef}`);

      const policy = await resolvePolicy(chain.records);
      const plan = createPlan(chain, policy, { reuseUnchanged });
      if (plan.kind === "noop") {
        logger.info(`Nothing to rewrite: ${plan.reason}`);
        return { status: "noop", tip };
      }

      const result = await executePlan(plan, session.store, { identity, clock, logger });
      if (result.newTip === tip) {
        logger.info("Rewrite left the tip unchanged");
        return { status: "noop", tip };
      }

      await publish(session, {
        branchRef,
        newTip: result.newTip,
        expectedRemoteHash: lease ? tip : undefined,
        logger,
      });

      logger.info(
        `✓ Rewrote ${branchRef}: ${shortHash(tip)} → ${shortHash(result.newTip)} ` +
          `(${result.commits.records.length} kept, ${result.dropped.length} dropped)`,
      );
      return {
        status: "rewritten",
        branchRef,
        originalTip: tip,
        newTip: result.newTip,
        kept: result.commits.records.length,
        dropped: result.dropped,
      };
    });
  }

  return {
    async appendReadmeCommit(remoteURL, credentials, message) {
      return await withSession(remoteURL, credentials, async (session) => {
        const head = await session.store.currentHead();
        if (head.kind !== "branch") {
          throw new NotABranchError(head.hash);
        }

        await session.worktree.writeFile(README_PATH, randomHex(32));
        await session.worktree.stage(README_PATH);
        const hash = await session.worktree.commit(message, identity, clock());
        logger.info(`Created ${shortHash(hash)} on ${head.ref}`);

        await session.push(head.ref, { force: false });
        return hash;
      });
    },

    async listRecentCommits(remoteURL, credentials, max) {
      return await withSession(remoteURL, credentials, async (session) => {
        const head = await session.store.currentHead();
        const chain = await walkAncestry(session.store, head.hash, { limit: max });
        return chain.records.map(toCommitSummary);
      });
    },

    async truncateHistory(remoteURL, credentials, keep) {
      return await rewrite(remoteURL, credentials, async () => ({ type: "truncate", keep }));
    },

    async deleteCommit(remoteURL, credentials, target) {
      return await rewrite(remoteURL, credentials, async () => ({ type: "delete", target }));
    },

    async amendCommitMessage(remoteURL, credentials, target, message) {
      return await rewrite(remoteURL, credentials, async (history) => {
        if (typeof message === "string") {
          return { type: "amend", target, message };
        }
        const original = findTarget(history, target);
        return { type: "amend", target: original.hash, message: await message(original) };
      });
    },

    async planRewrite(remoteURL, credentials, policy) {
      return await withSession(remoteURL, credentials, async (session) => {
        const { chain } = await walkBranch(session.store);
        return createPlan(chain, policy, { reuseUnchanged });
      });
    },
  };
}
