import { beforeEach, describe, expect, it } from "vitest";
import { tipFirst } from "../src/app/chain.js";
import {
  AmbiguousCommitError,
  CannotDeleteSoleCommitError,
  CommitNotFoundError,
  InvalidArgumentError,
} from "../src/app/errors.js";
import { createPlan, findTarget } from "../src/app/planner.js";
import type { CommitRecord, TipFirstChain } from "../src/app/types.js";
import { MemoryObjectStore, seedHistory } from "./helpers/memory-repo.js";

function chainOf(rootFirstRecords: CommitRecord[]): TipFirstChain {
  return tipFirst([...rootFirstRecords].reverse());
}

describe("createPlan", () => {
  let history: CommitRecord[];
  let chain: TipFirstChain;

  beforeEach(async () => {
    history = await seedHistory(new MemoryObjectStore(), ["a", "b", "c", "d"]);
    chain = chainOf(history);
  });

  describe("truncate", () => {
    it("keeps the newest commits and makes the oldest survivor the root", () => {
      const plan = createPlan(chain, { type: "truncate", keep: 2 });

      expect(plan.kind).toBe("rewrite");
      if (plan.kind !== "rewrite") return;
      expect(plan.steps.map((step) => step.source.message)).toEqual(["c", "d"]);
      expect(plan.steps.map((step) => step.changes)).toEqual([["root"], ["parent"]]);
      expect(plan.steps.map((step) => step.action)).toEqual(["create", "create"]);
      expect(plan.dropped.map((record) => record.message)).toEqual(["a", "b"]);
      expect(plan.originalTip).toBe(history[3].hash);
    });

    it("is a noop when the history is not longer than keep", () => {
      expect(createPlan(chain, { type: "truncate", keep: 4 })).toMatchObject({
        kind: "noop",
        tip: history[3].hash,
        reason: "History has 4 commits, no more than 4",
      });
      expect(createPlan(chain, { type: "truncate", keep: 10 }).kind).toBe("noop");
    });

    it("rejects keep below one", () => {
      expect(() => createPlan(chain, { type: "truncate", keep: 0 })).toThrow(InvalidArgumentError);
      expect(() => createPlan(chain, { type: "truncate", keep: 1.5 })).toThrow(InvalidArgumentError);
    });
  });

  describe("delete", () => {
    it("drops the target and relinks the commit after it", () => {
      const plan = createPlan(chain, { type: "delete", target: history[1].hash });

      if (plan.kind !== "rewrite") throw new Error("expected a rewrite");
      expect(plan.steps.map((step) => step.source.message)).toEqual(["a", "c", "d"]);
      expect(plan.steps.map((step) => step.action)).toEqual(["reuse", "create", "create"]);
      expect(plan.steps.map((step) => step.changes)).toEqual([[], ["parent"], ["parent"]]);
      expect(plan.dropped).toEqual([history[1]]);
    });

    it("promotes the next commit to root when deleting the root", () => {
      const plan = createPlan(chain, { type: "delete", target: history[0].hash });

      if (plan.kind !== "rewrite") throw new Error("expected a rewrite");
      expect(plan.steps[0].source).toBe(history[1]);
      expect(plan.steps[0].changes).toEqual(["root"]);
    });

    it("reuses every survivor when deleting the tip", () => {
      const plan = createPlan(chain, { type: "delete", target: history[3].hash });

      if (plan.kind !== "rewrite") throw new Error("expected a rewrite");
      expect(plan.steps.map((step) => step.action)).toEqual(["reuse", "reuse", "reuse"]);
    });

    it("refuses to delete the only commit, whatever the target", async () => {
      const [only] = await seedHistory(new MemoryObjectStore(), ["solo"]);
      const single = chainOf([only]);

      expect(() => createPlan(single, { type: "delete", target: only.hash })).toThrow(CannotDeleteSoleCommitError);
      expect(() => createPlan(single, { type: "delete", target: "0000000" })).toThrow(CannotDeleteSoleCommitError);
    });

    it("fails when the target is not in the history", () => {
      expect(() => createPlan(chain, { type: "delete", target: "f".repeat(40) })).toThrow(CommitNotFoundError);
    });
  });

  describe("amend", () => {
    it("replaces only the target message and rebuilds from there", () => {
      const plan = createPlan(chain, { type: "amend", target: history[1].hash, message: "fixed" });

      if (plan.kind !== "rewrite") throw new Error("expected a rewrite");
      expect(plan.steps.map((step) => step.message)).toEqual(["a", "fixed", "c", "d"]);
      expect(plan.steps.map((step) => step.action)).toEqual(["reuse", "create", "create", "create"]);
      expect(plan.steps[1].changes).toEqual(["message"]);
      expect(plan.dropped).toEqual([]);
    });

    it("rebuilds every survivor when reuse is off", () => {
      const plan = createPlan(
        chain,
        { type: "amend", target: history[2].hash, message: "fixed" },
        { reuseUnchanged: false },
      );

      if (plan.kind !== "rewrite") throw new Error("expected a rewrite");
      expect(plan.steps.map((step) => step.action)).toEqual(["create", "create", "create", "create"]);
      expect(plan.steps.map((step) => step.changes)).toEqual([[], ["parent"], ["message", "parent"], ["parent"]]);
    });

    it("is a noop when the message is unchanged", () => {
      const plan = createPlan(chain, { type: "amend", target: history[2].hash, message: "c" });
      expect(plan.kind).toBe("noop");
    });

    it("fails when the target is not in the history", () => {
      expect(() => createPlan(chain, { type: "amend", target: "abcdef0", message: "x" })).toThrow(
        CommitNotFoundError,
      );
    });
  });

  it("rejects an empty chain", () => {
    expect(() => createPlan(tipFirst([]), { type: "truncate", keep: 1 })).toThrow(InvalidArgumentError);
  });
});

describe("findTarget", () => {
  const record = (hash: string): CommitRecord => ({
    hash,
    parentHash: null,
    treeHash: "t",
    author: { name: "A", email: "a@example.com", timestamp: 0 },
    committer: { name: "A", email: "a@example.com", timestamp: 0 },
    message: hash,
  });
  const history = [record("abc1234000000000000000000000000000000000"), record("abc1235000000000000000000000000000000000")];

  it("matches a full hash", () => {
    expect(findTarget(history, history[1].hash)).toBe(history[1]);
  });

  it("matches a unique prefix case-insensitively", () => {
    expect(findTarget(history, "ABC1235")).toBe(history[1]);
  });

  it("rejects short, unknown and ambiguous prefixes", () => {
    expect(() => findTarget(history, "abc123")).toThrow(CommitNotFoundError);

    expect(() => findTarget(history, "abc1230")).toThrow(CommitNotFoundError);

    const twoMatches = [record("1234567aaa"), record("1234567bbb")];
    expect(() => findTarget(twoMatches, "1234567")).toThrow(AmbiguousCommitError);
  });

  it("reports text that is not a hash as not found", () => {
    expect(() => findTarget(history, "HEAD~1")).toThrow("Commit not found in history: HEAD~1");
    expect(() => findTarget(history, "abc")).toThrow(CommitNotFoundError);
  });
});
