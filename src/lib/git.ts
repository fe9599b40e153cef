/**
 * Git utilities
 * Object store and worktree backed by the git CLI through simple-git
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { simpleGit, type SimpleGit } from "simple-git";
import { toCommitRecord } from "../app/chain.js";
import { errorMessage, TraversalError } from "../app/errors.js";
import type { ObjectStore, Worktree } from "../app/ports.js";
import type { CommitDraft, CommitRecord, HeadRef, Identity, RawCommit, Signature } from "../app/types.js";

const FIELD = "%x00";
const SHOW_FORMAT = ["%H", "%T", "%P", "%an", "%ae", "%ad", "%cn", "%ce", "%cd", "%B"].join(FIELD);
const HEADER_FIELDS = 9;

/**
 * Parse `git show --date=raw --format=<SHOW_FORMAT>` output
 */
export function parseCommitInfo(output: string): RawCommit {
  const fields = output.split("\0");
  if (fields.length <= HEADER_FIELDS) {
    throw new Error(`Unexpected git show output: ${JSON.stringify(output.substring(0, 200))}`);
  }

  const [hash, tree, parentsLine, authorName, authorEmail, authorDate, committerName, committerEmail, committerDate] =
    fields;
  const body = fields.slice(HEADER_FIELDS).join("\0");

  return {
    hash: hash.trim(),
    treeHash: tree,
    parents: parentsLine ? parentsLine.split(" ") : [],
    author: { name: authorName, email: authorEmail, ...parseRawDate(authorDate) },
    committer: { name: committerName, email: committerEmail, ...parseRawDate(committerDate) },
    message: body.replace(/\n+$/, ""),
  };
}

/**
 * Parse git's raw date format: "1700000000 +0200"
 */
export function parseRawDate(raw: string): { timestamp: number; timezone: string } {
  const match = raw.trim().match(/^(\d+) ([+-]\d{4})$/);
  if (!match) {
    throw new Error(`Invalid raw date: ${raw}`);
  }
  return { timestamp: Number(match[1]) * 1000, timezone: match[2] };
}

/**
 * Format a signature's time for GIT_*_DATE
 */
export function formatRawDate(signature: Signature): string {
  return `@${Math.floor(signature.timestamp / 1000)} ${signature.timezone ?? "+0000"}`;
}

/**
 * Parse identity string "Name <email@example.com>"
 */
export function parseIdentity(
  identity: string,
): Identity {
  const match = identity.match(/^(.+?)\s*<(.+?)>$/);
  if (!match) {
    throw new Error(`Invalid identity format: ${identity}`);
  }
  return {
    name: match[1].trim(),
    email: match[2].trim(),
  };
}

/**
 * Format identity from name and email to "Name <email@example.com>"
 */
export function formatIdentity(name: string, email: string): string {
  return `${name} <${email}>`;
}

/**
 * Environment that makes git record exactly these signatures
 */
export function signatureEnv(author: Signature, committer: Signature): Record<string, string> {
  return {
    GIT_AUTHOR_NAME: author.name,
    GIT_AUTHOR_EMAIL: author.email,
    GIT_AUTHOR_DATE: formatRawDate(author),
    GIT_COMMITTER_NAME: committer.name,
    GIT_COMMITTER_EMAIL: committer.email,
    GIT_COMMITTER_DATE: formatRawDate(committer),
  };
}

export interface GitRepositoryOptions {
  baseDir: string;
  /** Environment for every git invocation (ssh command, prompts off) */
  env?: Record<string, string>;
}

/**
 * A local clone, seen both as an object store and as a worktree
 */
export class GitRepository implements ObjectStore, Worktree {
  readonly baseDir: string;
  private readonly env: Record<string, string>;

  constructor(options: GitRepositoryOptions) {
    this.baseDir = options.baseDir;
    this.env = { ...inheritedEnv(), ...options.env };
  }

  /**
   * simple-git keeps env per instance, so commands that need their own
   * variables get a fresh one
   */
  git(extraEnv: Record<string, string> = {}): SimpleGit {
    return createGit(this.baseDir, { ...this.env, ...extraEnv });
  }

  async currentHead(): Promise<HeadRef> {
    let hash: string;
    try {
      hash = (await this.git().raw(["rev-parse", "--verify", "HEAD^{commit}"])).trim();
    } catch (error) {
      throw new TraversalError(`HEAD does not point at a commit (empty repository?): ${errorMessage(error)}`, {
        cause: error,
      });
    }
    const name = (await this.git().raw(["rev-parse", "--symbolic-full-name", "HEAD"])).trim();
    return name.startsWith("refs/heads/") ? { kind: "branch", ref: name, hash } : { kind: "detached", hash };
  }

  async resolveTip(branchRef: string): Promise<string> {
    return (await this.git().raw(["rev-parse", "--verify", `${branchRef}^{commit}`])).trim();
  }

  async readCommit(hash: string): Promise<CommitRecord> {
    const output = await this.git().raw(["show", "--no-patch", "--date=raw", `--format=${SHOW_FORMAT}`, hash]);
    return toCommitRecord(parseCommitInfo(output));
  }

  async writeCommit(draft: CommitDraft): Promise<string> {
    const args = ["commit-tree", draft.treeHash];
    if (draft.parentHash !== null) {
      args.push("-p", draft.parentHash);
    }
    args.push("-m", draft.message);

    const output = await this.git(signatureEnv(draft.author, draft.committer)).raw(args);
    return output.trim();
  }

  /**
   * Update a branch ref. When it is the checked-out branch, the working
   * tree is reset to match.
   */
  async setReference(branchRef: string, hash: string): Promise<void> {
    await this.git().raw(["update-ref", branchRef, hash]);

    const head = await this.git().raw(["rev-parse", "--symbolic-full-name", "HEAD"]);
    if (head.trim() === branchRef) {
      await this.git().raw(["reset", "--hard", hash]);
    }
  }

  async writeFile(path: string, content: string): Promise<void> {
    const target = join(this.baseDir, path);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content);
  }

  async stage(path: string): Promise<void> {
    await this.git().add(path);
  }

  async commit(message: string, identity: Identity, when: Date): Promise<string> {
    const signature: Signature = { ...identity, timestamp: when.getTime() };
    await this.git(signatureEnv(signature, signature)).raw(["commit", "--no-verify", "-m", message]);
    return (await this.git().raw(["rev-parse", "HEAD"])).trim();
  }
}

/**
 * Variables git needs from the user's environment. simple-git's env()
 * replaces the environment whole and refuses editor, pager and askpass
 * variables, so only these are carried over.
 */
const PASSED_ENV = [
  "PATH",
  "HOME",
  "USER",
  "LOGNAME",
  "LANG",
  "LANGUAGE",
  "LC_ALL",
  "LC_CTYPE",
  "TMPDIR",
  "TEMP",
  "TMP",
  "XDG_CONFIG_HOME",
  "SSH_AUTH_SOCK",
  "HTTP_PROXY",
  "HTTPS_PROXY",
  "NO_PROXY",
  "http_proxy",
  "https_proxy",
  "no_proxy",
  "SystemRoot",
  "USERPROFILE",
  "APPDATA",
];

export function inheritedEnv(source: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const env: Record<string, string> = {};
  for (const key of PASSED_ENV) {
    const value = source[key];
    if (value !== undefined) {
      env[key] = value;
    }
  }
  return env;
}

/**
 * simple-git instance running in `baseDir` with exactly `env`.
 * GIT_SSH_COMMAND carries the credentials, so it is allowed explicitly.
 */
export function createGit(baseDir: string, env: Record<string, string>): SimpleGit {
  return simpleGit({ baseDir, unsafe: { allowUnsafeSshCommand: true } }).env(env);
}
