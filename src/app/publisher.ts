/**
 * Move a branch to a rewritten tip and propagate it to the remote
 */

import type { PushOutcome, RepositorySession } from "./ports.js";
import type { Logger } from "../lib/logger.js";
import { silentLogger } from "../lib/logger.js";
import { shortHash } from "../lib/string.js";

export interface PublishOptions {
  branchRef: string;
  newTip: string;
  /**
   * Tip the remote had when it was fetched. When set, the push only
   * succeeds if the remote still points there.
   */
  expectedRemoteHash?: string;
  logger?: Logger;
}

/**
 * Set the local reference, then force-push it under the same name.
 *
 * The local ref moves first: if the push fails the local and remote
 * copies disagree until the next fetch. Push errors propagate as thrown.
 */
export async function publish(session: RepositorySession, options: PublishOptions): Promise<PushOutcome> {
  const { branchRef, newTip, expectedRemoteHash, logger = silentLogger } = options;

  logger.info(`Updating ${branchRef} to ${shortHash(newTip)}...`);
  await session.store.setReference(branchRef, newTip);

  logger.info(`Pushing ${branchRef} to ${session.remoteURL}...`);
  const outcome = await session.push(branchRef, { force: true, expectedRemoteHash });
  if (outcome === "up-to-date") {
    logger.info("Remote already up to date");
  }
  return outcome;
}
