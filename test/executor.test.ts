import { describe, expect, it } from "vitest";
import { tipFirst } from "../src/app/chain.js";
import { EncodeOrStoreError } from "../src/app/errors.js";
import { executePlan } from "../src/app/executor.js";
import { createPlan, type RewritePlan } from "../src/app/planner.js";
import type { CommitRecord, RewritePolicy } from "../src/app/types.js";
import { ALICE, MAIN, MemoryObjectStore, REWRITER, seedHistory, steppingClock } from "./helpers/memory-repo.js";

async function setup(messages: string[]) {
  const store = new MemoryObjectStore();
  const history = await seedHistory(store, messages);
  const chain = tipFirst([...history].reverse());
  return { store, history, chain };
}

function rewritePlan(plan: RewritePlan): Extract<RewritePlan, { kind: "rewrite" }> {
  if (plan.kind !== "rewrite") {
    throw new Error(`expected a rewrite, got: ${plan.reason}`);
  }
  return plan;
}

function expectLinked(records: readonly CommitRecord[]) {
  expect(records[0].parentHash).toBeNull();
  for (let i = 1; i < records.length; i++) {
    expect(records[i].parentHash).toBe(records[i - 1].hash);
  }
}

describe("executePlan", () => {
  it("deletes the middle of [a, b, c] and links c to a", async () => {
    const { store, history, chain } = await setup(["a", "b", "c"]);
    const policy: RewritePolicy = { type: "delete", target: history[1].hash };

    const result = await executePlan(rewritePlan(createPlan(chain, policy)), store, {
      identity: REWRITER,
      clock: steppingClock(),
    });

    const [first, second] = result.commits.records;
    expect(result.commits.records).toHaveLength(2);
    expect(first.message).toBe("a");
    expect(second.message).toBe("c");
    expect(second.parentHash).toBe(first.hash);
    expect(first.treeHash).toBe(history[0].treeHash);
    expect(second.treeHash).toBe(history[2].treeHash);
    expect(result.newTip).toBe(second.hash);
    expect(result.dropped).toEqual([history[1].hash]);
  });

  it("copies tree and author verbatim and stamps the rewriting committer", async () => {
    const { store, history, chain } = await setup(["a", "b", "c"]);
    const clock = steppingClock(Date.UTC(2025, 0, 1));

    const result = await executePlan(
      rewritePlan(createPlan(chain, { type: "truncate", keep: 2 })),
      store,
      { identity: REWRITER, clock },
    );

    const [root, tip] = result.commits.records;
    expect(root.author).toEqual(history[1].author);
    expect(root.author.name).toBe(ALICE.name);
    expect(root.committer).toEqual({ ...REWRITER, timestamp: Date.UTC(2025, 0, 1) });
    expect(tip.committer).toEqual({ ...REWRITER, timestamp: Date.UTC(2025, 0, 1) + 1000 });
    expect(tip.treeHash).toBe(history[2].treeHash);
    expectLinked(result.commits.records);
  });

  it("writes every survivor through the store and leaves the ref alone", async () => {
    const { store, history, chain } = await setup(["a", "b", "c", "d"]);

    const result = await executePlan(
      rewritePlan(createPlan(chain, { type: "truncate", keep: 3 })),
      store,
      { identity: REWRITER, clock: steppingClock() },
    );

    expect(store.written.map((record) => record.hash)).toEqual(result.commits.records.map((record) => record.hash));
    expect(store.refs.get(MAIN)).toBe(history[3].hash);
  });

  it("keeps hashes below an amended commit and changes every hash from it to the tip", async () => {
    const { store, history, chain } = await setup(["a", "b", "c", "d"]);

    const result = await executePlan(
      rewritePlan(createPlan(chain, { type: "amend", target: history[1].hash, message: "fixed" })),
      store,
      { identity: REWRITER, clock: steppingClock() },
    );

    const rebuilt = result.commits.records;
    expect(rebuilt.map((record) => record.message)).toEqual(["a", "fixed", "c", "d"]);
    expect(rebuilt[0].hash).toBe(history[0].hash);
    for (let i = 1; i < 4; i++) {
      expect(rebuilt[i].hash).not.toBe(history[i].hash);
      expect(rebuilt[i].treeHash).toBe(history[i].treeHash);
    }
    expect(result.rewritten.get(history[0].hash)).toBe(history[0].hash);
    expect(result.rewritten.get(history[3].hash)).toBe(result.newTip);
    expectLinked(rebuilt);
  });

  it("re-encodes the untouched root too when reuse is off", async () => {
    const { store, history, chain } = await setup(["a", "b", "c"]);
    const plan = createPlan(chain, { type: "amend", target: history[1].hash, message: "fixed" }, {
      reuseUnchanged: false,
    });

    const result = await executePlan(rewritePlan(plan), store, { identity: REWRITER, clock: steppingClock() });

    expect(result.commits.records[0].hash).not.toBe(history[0].hash);
    expect(result.commits.records[0].message).toBe("a");
    expect(store.written).toHaveLength(3);
  });

  it("stops at the first failed write and wraps the cause", async () => {
    const { store, history, chain } = await setup(["a", "b", "c", "d"]);
    store.failOnWrite = 2;

    const run = executePlan(
      rewritePlan(createPlan(chain, { type: "truncate", keep: 3 })),
      store,
      { identity: REWRITER, clock: steppingClock() },
    );

    await expect(run).rejects.toBeInstanceOf(EncodeOrStoreError);
    await expect(run).rejects.toMatchObject({ phase: "write" });
    expect(store.written).toHaveLength(1);
    expect(store.refs.get(MAIN)).toBe(history[3].hash);
  });
});
