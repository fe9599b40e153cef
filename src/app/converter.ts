/**
 * Convert commit summaries and rewrite plans for display
 */

import type { RewritePlan } from "./planner.js";
import type { CommitSummary, OperationResult, RewritePolicy } from "./types.js";
import { formatIdentity } from "../lib/git.js";
import { shortHash } from "../lib/string.js";
import { formatYaml } from "../lib/yaml-prettier.js";

export function formatCommitsJson(commits: CommitSummary[]): string {
  return JSON.stringify(commits, null, 2);
}

/**
 * Commit summaries as YAML, newest first
 */
export async function formatCommitsYaml(commits: CommitSummary[]): Promise<string> {
  return await formatYaml({
    commits: commits.map((commit) => ({
      hash: commit.hash,
      author: formatIdentity(commit.authorName, commit.authorEmail),
      date: new Date(commit.timestampMillis).toISOString(),
      message: commit.message,
    })),
  });
}

export function describePolicy(policy: RewritePolicy): string {
  switch (policy.type) {
    case "truncate":
      return `truncate to ${policy.keep} commit${policy.keep === 1 ? "" : "s"}`;
    case "delete":
      return `delete ${policy.target}`;
    case "amend":
      return `amend message of ${policy.target}`;
  }
}

/**
 * A rewrite plan as YAML, oldest surviving commit first
 */
export async function formatPlanYaml(plan: RewritePlan): Promise<string> {
  if (plan.kind === "noop") {
    return await formatYaml({
      operation: describePolicy(plan.policy),
      result: "nothing to do",
      reason: plan.reason,
    });
  }

  return await formatYaml({
    operation: describePolicy(plan.policy),
    tip: plan.originalTip,
    commits: plan.steps.map((step) => ({
      commit: step.source.hash,
      action: step.action,
      ...(step.changes.length ? { changes: step.changes } : {}),
      message: step.message,
    })),
    dropped: plan.dropped.map((record) => record.hash),
  });
}

export function formatResult(result: OperationResult): string {
  if (result.status === "noop") {
    return `No change; ${shortHash(result.tip)} is still the tip`;
  }
  const dropped = result.dropped.length ? `, dropped ${result.dropped.map(shortHash).join(" ")}` : "";
  return `${result.branchRef}: ${shortHash(result.originalTip)} -> ${shortHash(result.newTip)} ` +
    `(${result.kept} commit${result.kept === 1 ? "" : "s"}${dropped})`;
}
