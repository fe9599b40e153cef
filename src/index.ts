/**
 * git-retcon: rewrite and republish the history of a remote branch
 */

export { createRetcon, README_PATH } from "./app/operations.js";
export type { MessageSource, Retcon, RetconOptions } from "./app/operations.js";
export { createPlan, findTarget } from "./app/planner.js";
export type { Change, CommitPlan, PlanOptions, RewritePlan } from "./app/planner.js";
export { executePlan } from "./app/executor.js";
export type { ExecuteOptions, RewriteResult } from "./app/executor.js";
export { walkAncestry, walkBranch } from "./app/traversal.js";
export type { BranchHistory, WalkOptions } from "./app/traversal.js";
export { publish } from "./app/publisher.js";
export { rootFirst, tipFirst, toCommitRecord, toCommitSummary, toRootFirst, toTipFirst } from "./app/chain.js";
export { loadConfig, DEFAULT_CONFIG } from "./app/config.js";
export type { Config } from "./app/schema.js";
export * from "./app/errors.js";
export type * from "./app/ports.js";
export type * from "./app/types.js";
export { GitRepository } from "./lib/git.js";
export { GitTransport } from "./lib/transport.js";
export { createConsoleLogger, silentLogger } from "./lib/logger.js";
export type { Logger } from "./lib/logger.js";
