/**
 * Clone, fetch and push over the git CLI
 */

import { createHash } from "node:crypto";
import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import type { PushResult } from "simple-git";
import { AuthError, ConcurrentModificationError, errorMessage, TransportError } from "../app/errors.js";
import type { PushOptions, PushOutcome, RepositorySession, Transport } from "../app/ports.js";
import type { Credentials } from "../app/types.js";
import { exists, makeTempDir, removeDir, writePrivateFile } from "./fs.js";
import { createGit, GitRepository, inheritedEnv } from "./git.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";

export type HostKeyChecking = "yes" | "accept-new" | "no";

export interface GitTransportOptions {
  /** Keep clones here between runs instead of in a throwaway directory */
  cacheDir?: string;
  strictHostKeyChecking?: HostKeyChecking;
  logger?: Logger;
}

const AUTH_FAILURES = [
  /Permission denied/i,
  /Authentication failed/i,
  /could not read Username/i,
  /Host key verification failed/i,
  /invalid format/i, // ssh rejecting the key file itself
];

const LEASE_FAILURES = [/stale info/i, /\(fetch first\)/i];

/**
 * Map a failed git invocation to the error taxonomy
 */
export function classifyGitError(error: unknown, phase: "fetch" | "publish"): Error {
  const message = errorMessage(error).trim();
  if (AUTH_FAILURES.some((pattern) => pattern.test(message))) {
    return new AuthError(message, { cause: error, phase });
  }
  return new TransportError(phase, message, { cause: error });
}

/**
 * Directory name a remote is cached under
 */
export function cacheKey(remoteURL: string): string {
  return createHash("sha256").update(remoteURL).digest("hex");
}

export function sshCommand(keyPath: string | null, strictHostKeyChecking: HostKeyChecking): string {
  const parts = ["ssh", "-o", "BatchMode=yes", "-o", `StrictHostKeyChecking=${strictHostKeyChecking}`];
  if (strictHostKeyChecking === "no") {
    parts.push("-o", "UserKnownHostsFile=/dev/null");
  }
  if (keyPath !== null) {
    parts.push("-i", `'${keyPath.replace(/'/g, "'\\''")}'`, "-o", "IdentitiesOnly=yes");
  }
  return parts.join(" ");
}

/**
 * Whether a porcelain push changed nothing on the remote
 */
export function isUpToDate(result: { pushed: readonly { alreadyUpdated: boolean }[] }): boolean {
  return result.pushed.length > 0 && result.pushed.every((ref) => ref.alreadyUpdated);
}

export class GitTransport implements Transport {
  private readonly cacheDir: string | undefined;
  private readonly strictHostKeyChecking: HostKeyChecking;
  private readonly logger: Logger;

  constructor(options: GitTransportOptions = {}) {
    this.cacheDir = options.cacheDir;
    this.strictHostKeyChecking = options.strictHostKeyChecking ?? "accept-new";
    this.logger = options.logger ?? silentLogger;
  }

  async fetchFullHistory(remoteURL: string, credentials: Credentials): Promise<RepositorySession> {
    const scratch = await makeTempDir("git-retcon");
    try {
      const env = await this.credentialEnv(credentials, scratch);
      const baseDir = this.cacheDir ? join(this.cacheDir, cacheKey(remoteURL)) : join(scratch, "repo");

      if (this.cacheDir && await exists(join(baseDir, ".git"))) {
        await this.update(baseDir, env);
      } else {
        if (this.cacheDir) {
          await mkdir(this.cacheDir, { recursive: true });
        }
        this.logger.info(`Cloning ${remoteURL}...`);
        try {
          await createGit(scratch, env).clone(remoteURL, baseDir);
        } catch (error) {
          throw classifyGitError(error, "fetch");
        }
      }

      return new GitSession(remoteURL, new GitRepository({ baseDir, env }), scratch);
    } catch (error) {
      await removeDir(scratch);
      throw error;
    }
  }

  /**
   * Bring a cached clone level with its remote: force-fetch, then put the
   * remote's default branch back on the checkout
   */
  private async update(baseDir: string, env: Record<string, string>): Promise<void> {
    this.logger.info(`Updating cached clone in ${baseDir}...`);
    const git = createGit(baseDir, env);
    try {
      await git.raw(["fetch", "--force", "--prune", "origin", "+refs/heads/*:refs/remotes/origin/*"]);
      await git.raw(["remote", "set-head", "origin", "--auto"]);

      const remoteHead = (await git.raw(["symbolic-ref", "refs/remotes/origin/HEAD"])).trim();
      const branch = remoteHead.substring("refs/remotes/origin/".length);
      await git.raw(["checkout", "--force", "-B", branch, remoteHead]);
      await git.raw(["reset", "--hard", remoteHead]);
    } catch (error) {
      throw classifyGitError(error, "fetch");
    }
  }

  private async credentialEnv(credentials: Credentials, scratch: string): Promise<Record<string, string>> {
    const env: Record<string, string> = { ...inheritedEnv(), GIT_TERMINAL_PROMPT: "0" };
    switch (credentials.kind) {
      case "ssh": {
        const keyPath = join(scratch, "id_key");
        await writePrivateFile(keyPath, credentials.privateKey);
        env.GIT_SSH_COMMAND = sshCommand(keyPath, this.strictHostKeyChecking);
        break;
      }
      case "ssh-agent":
        env.GIT_SSH_COMMAND = sshCommand(null, this.strictHostKeyChecking);
        break;
      case "none":
        break;
    }
    return env;
  }
}

class GitSession implements RepositorySession {
  constructor(
    readonly remoteURL: string,
    private readonly repository: GitRepository,
    private readonly scratch: string,
  ) {}

  get store(): GitRepository {
    return this.repository;
  }

  get worktree(): GitRepository {
    return this.repository;
  }

  async push(branchRef: string, options: PushOptions): Promise<PushOutcome> {
    const flags: string[] = [];
    if (options.force) {
      flags.push(
        options.expectedRemoteHash ? `--force-with-lease=${branchRef}:${options.expectedRemoteHash}` : "--force",
      );
    }

    let result: PushResult;
    try {
      result = await this.repository.git().push("origin", `${branchRef}:${branchRef}`, flags);
    } catch (error) {
      if (options.expectedRemoteHash && LEASE_FAILURES.some((pattern) => pattern.test(errorMessage(error)))) {
        throw new ConcurrentModificationError(branchRef, options.expectedRemoteHash, { cause: error });
      }
      throw classifyGitError(error, "publish");
    }
    return isUpToDate(result) ? "up-to-date" : "pushed";
  }

  async dispose(): Promise<void> {
    await removeDir(this.scratch);
  }
}
