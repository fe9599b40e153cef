/**
 * CLI workflows for git-retcon
 * These functions can be imported and used programmatically
 */

import { readFile } from "node:fs/promises";
import { loadConfig } from "./config.js";
import { formatCommitsJson, formatCommitsYaml, formatPlanYaml, formatResult } from "./converter.js";
import { errorMessage, InvalidArgumentError, RetconError } from "./errors.js";
import { createRetcon, type MessageSource, type Retcon } from "./operations.js";
import type { Transport } from "./ports.js";
import { CommitHashSchema, KeepSchema, MaxSchema } from "./schema.js";
import type { Config, ConfigFile } from "./schema.js";
import type { z } from "zod";
import type { Credentials, OperationResult, RewritePolicy } from "./types.js";
import { editMessage } from "../lib/editor.js";
import { parseIdentity } from "../lib/git.js";
import { createConsoleLogger, type Logger } from "../lib/logger.js";
import { GitTransport } from "../lib/transport.js";

export const USAGE = `Usage:
  git-retcon log <remote> [--max N] [--json]       List recent commits (newest first)
  git-retcon append <remote> -m <message>          Commit a new README.MD and push
  git-retcon truncate <remote> --keep N            Keep only the newest N commits
  git-retcon delete <remote> <commit>              Remove one commit from history
  git-retcon amend <remote> <commit> -m <message>  Replace a commit's message
  git-retcon amend <remote> <commit> --edit        ...or edit it in $EDITOR

Options:
  --key <path>         Private SSH key for the remote
  --agent              Authenticate with the running ssh-agent
  --committer <ident>  "Name <email>" recorded as committer
  --config <path>      Configuration file (default: .retcon.yml)
  --cache-dir <dir>    Reuse clones between runs
  --dry-run            Show the rewrite plan without pushing
  --no-lease           Overwrite the remote even if it moved since the fetch
  --quiet              Only print results and errors

Examples:
  git-retcon truncate git@example.com:me/notes.git --keep 20
  git-retcon amend git@example.com:me/notes.git 1a2b3c4 -m "Fix typo"`;

const COMMANDS = ["log", "append", "truncate", "delete", "amend"] as const;
type Command = typeof COMMANDS[number];

const VALUE_FLAGS = ["--max", "--keep", "-m", "--message", "--key", "--committer", "--config", "--cache-dir"];
const BOOLEAN_FLAGS = ["--json", "--agent", "--dry-run", "--no-lease", "--quiet", "--edit"];

export interface CliArgs {
  command: Command;
  positionals: string[];
  values: Map<string, string>;
  flags: Set<string>;
}

/**
 * Split argv into command, positionals and flags
 */
export function parseCliArgs(args: string[]): CliArgs {
  const positionals: string[] = [];
  const values = new Map<string, string>();
  const flags = new Set<string>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const [name, inline]: [string, string | undefined] = arg.startsWith("--") && arg.includes("=")
      ? [arg.substring(0, arg.indexOf("=")), arg.substring(arg.indexOf("=") + 1)]
      : [arg, undefined];

    if (VALUE_FLAGS.includes(name)) {
      const value = inline ?? args[++i];
      if (value === undefined) {
        throw new InvalidArgumentError(`Missing value for ${name}`);
      }
      values.set(name === "--message" ? "-m" : name, value);
    } else if (BOOLEAN_FLAGS.includes(name)) {
      flags.add(name);
    } else if (arg.startsWith("-") && arg !== "-") {
      throw new InvalidArgumentError(`Unknown option: ${arg}`);
    } else {
      positionals.push(arg);
    }
  }

  const [command, ...rest] = positionals;
  if (command === undefined) {
    throw new InvalidArgumentError("Missing command");
  }
  if (!isCommand(command)) {
    throw new InvalidArgumentError(`Unknown command: ${command}`);
  }
  return { command, positionals: rest, values, flags };
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

export interface CliDependencies {
  createTransport?: (config: Config, logger: Logger) => Transport;
  logger?: Logger;
  print?: (text: string) => void;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  editMessage?: (initial: string, hint: string[]) => Promise<string>;
}

/**
 * Main CLI entry point
 * Parses arguments and dispatches to the requested operation.
 * Resolves to the process exit code.
 */
export async function main(args: string[], deps: CliDependencies = {}): Promise<number> {
  const print = deps.print ?? ((text: string) => console.log(text));
  let logger = deps.logger ?? createConsoleLogger();

  if (args.includes("--help") || args.includes("-h")) {
    print(USAGE);
    return 0;
  }
  if (args.length === 0) {
    logger.error(`Error: Missing command\n\n${USAGE}`);
    return 1;
  }

  try {
    const cli = parseCliArgs(args);
    if (!deps.logger && cli.flags.has("--quiet")) {
      logger = createConsoleLogger({ quiet: true });
    }

    const config = await loadConfig({
      cwd: deps.cwd,
      env: deps.env,
      configPath: cli.values.get("--config"),
      overrides: configOverrides(cli),
    });

    const [remote, target] = cli.positionals;
    if (remote === undefined) {
      throw new InvalidArgumentError(`Missing <remote> for ${cli.command}\n\n${USAGE}`);
    }

    const credentials = await resolveCredentials(cli, deps.env ?? process.env);
    const transport = deps.createTransport?.(config, logger) ?? new GitTransport({
      cacheDir: config.cacheDir,
      strictHostKeyChecking: config.strictHostKeyChecking,
      logger,
    });
    const retcon = createRetcon({
      identity: config.committer,
      transport,
      logger,
      reuseUnchanged: config.reuseUnchanged,
      lease: config.lease,
    });

    switch (cli.command) {
      case "log": {
        const max = parseWith(MaxSchema, cli.values.get("--max") ?? "0", "--max");
        const commits = await retcon.listRecentCommits(remote, credentials, max);
        print(cli.flags.has("--json") ? formatCommitsJson(commits) : (await formatCommitsYaml(commits)).trimEnd());
        return 0;
      }

      case "append": {
        const message = cli.values.get("-m");
        if (message === undefined) {
          throw new InvalidArgumentError("append needs -m <message>");
        }
        const hash = await retcon.appendReadmeCommit(remote, credentials, message);
        print(hash);
        return 0;
      }

      case "truncate":
      case "delete":
      case "amend": {
        const policy = rewritePolicy(cli, target);
        if (cli.flags.has("--dry-run") && policy.type === "amend" && !cli.values.has("-m")) {
          throw new InvalidArgumentError("--dry-run needs -m with amend");
        }
        if (cli.flags.has("--dry-run")) {
          const plan = await retcon.planRewrite(remote, credentials, policy);
          print((await formatPlanYaml(plan)).trimEnd());
          return 0;
        }

        const result = await runPolicy(retcon, remote, credentials, policy, cli, deps);
        print(formatResult(result));
        return 0;
      }
    }
  } catch (error) {
    if (error instanceof RetconError) {
      logger.error(`error [${error.phase}]: ${error.message}`);
    } else {
      logger.error(`error: ${errorMessage(error)}`);
    }
    return 1;
  }
}

function configOverrides(cli: CliArgs): ConfigFile {
  const overrides: ConfigFile = {};
  const committer = cli.values.get("--committer");
  if (committer !== undefined) {
    try {
      overrides.committer = parseIdentity(committer);
    } catch (error) {
      throw new InvalidArgumentError(errorMessage(error));
    }
  }
  const cacheDir = cli.values.get("--cache-dir");
  if (cacheDir !== undefined) {
    overrides.cacheDir = cacheDir;
  }
  if (cli.flags.has("--no-lease")) {
    overrides.lease = false;
  }
  return overrides;
}

async function resolveCredentials(cli: CliArgs, env: NodeJS.ProcessEnv): Promise<Credentials> {
  const keyPath = cli.values.get("--key");
  if (keyPath !== undefined) {
    try {
      return { kind: "ssh", privateKey: await readFile(keyPath, "utf8") };
    } catch (error) {
      throw new InvalidArgumentError(`Cannot read key ${keyPath}: ${errorMessage(error)}`);
    }
  }
  if (cli.flags.has("--agent")) {
    return { kind: "ssh-agent" };
  }
  if (env.RETCON_SSH_KEY) {
    return { kind: "ssh", privateKey: env.RETCON_SSH_KEY };
  }
  return { kind: "none" };
}

function rewritePolicy(cli: CliArgs, target: string | undefined): RewritePolicy {
  if (cli.command === "truncate") {
    const keep = cli.values.get("--keep") ?? target;
    if (keep === undefined) {
      throw new InvalidArgumentError("truncate needs --keep N");
    }
    return { type: "truncate", keep: parseWith(KeepSchema, keep, "--keep") };
  }

  if (target === undefined) {
    throw new InvalidArgumentError(`${cli.command} needs a <commit>`);
  }
  const hash = parseWith(CommitHashSchema, target, "<commit>");
  if (cli.command === "delete") {
    return { type: "delete", target: hash };
  }

  const message = cli.values.get("-m");
  if (message === undefined && !cli.flags.has("--edit")) {
    throw new InvalidArgumentError("amend needs -m <message> or --edit");
  }
  return { type: "amend", target: hash, message: message ?? "" };
}

async function runPolicy(
  retcon: Retcon,
  remote: string,
  credentials: Credentials,
  policy: RewritePolicy,
  cli: CliArgs,
  deps: CliDependencies,
): Promise<OperationResult> {
  switch (policy.type) {
    case "truncate":
      return await retcon.truncateHistory(remote, credentials, policy.keep);
    case "delete":
      return await retcon.deleteCommit(remote, credentials, policy.target);
    case "amend": {
      const edit = deps.editMessage ?? editMessage;
      const message: MessageSource = cli.values.has("-m")
        ? policy.message
        : async (original) =>
          await edit(original.message, [
            `Editing the message of ${original.hash}.`,
            "Lines starting with '#' are ignored.",
          ]);
      return await retcon.amendCommitMessage(remote, credentials, policy.target, message);
    }
  }
}

function parseWith<T>(schema: z.ZodType<T>, value: string, name: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const reasons = result.error.issues.map((issue) => issue.message).join("; ");
    throw new InvalidArgumentError(`Invalid ${name} "${value}": ${reasons}`);
  }
  return result.data;
}
