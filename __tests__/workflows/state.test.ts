import { describe, it, expect } from "vitest";
import {
  StateInvariantError,
  WorkflowStateStore,
  canonicalize,
  chatStateSchema,
  createChatState,
  requireRun,
} from "../../src/mastra/workflows/state";
import { intentRecord } from "../helpers/scripted-reasoner";

function createStore(maxIterations = 3) {
  return WorkflowStateStore.create(
    {
      query: "show me the rules",
      kind: "INFO",
      originalIntent: intentRecord("INFO"),
      maxIterations,
    },
    () => new Date("2025-06-01T00:00:00.000Z"),
  );
}

describe("WorkflowStateStore", () => {
  it("overwrites entities per role and keeps the other roles", () => {
    const store = createStore();

    store.mergeEntities({ rule_list: ["a"], rule: { id: "rule-001" } });
    store.mergeEntities({ rule_list: ["b", "c"] });

    expect(store.snapshot().entities).toEqual({
      rule_list: ["b", "c"],
      rule: { id: "rule-001" },
    });
  });

  it("appends tool calls and validation errors in order", () => {
    const store = createStore();

    store.recordToolCall({
      tool: "list_automation_rules",
      parameters: {},
      outcome: { ok: true, data: [] },
      summary: "Found 0 automation rules",
      repeated: false,
    });
    store.addValidationError("first");
    store.addValidationError("second");

    const snapshot = store.snapshot();
    expect(snapshot.toolsCalled).toEqual([
      {
        tool: "list_automation_rules",
        parameters: {},
        outcome: { ok: true, data: [] },
        summary: "Found 0 automation rules",
        repeated: false,
        at: "2025-06-01T00:00:00.000Z",
      },
    ]);
    expect(snapshot.validationErrors).toEqual(["first", "second"]);
  });

  it("returns snapshots that do not alias internal state", () => {
    const store = createStore();
    store.mergeEntities({ rule: { id: "rule-001" } });

    const snapshot = store.snapshot();
    snapshot.validationErrors.push("tampered");
    snapshot.entities.rule = "tampered";

    expect(store.snapshot().validationErrors).toEqual([]);
    expect(store.snapshot().entities.rule).toEqual({ id: "rule-001" });
  });

  it("allows the final response to be written once", () => {
    const store = createStore();
    expect(store.finalResponse).toBeNull();

    store.setFinalResponse("done");

    expect(() => store.setFinalResponse("again")).toThrow(StateInvariantError);
    expect(store.finalResponse).toBe("done");
  });

  it("never counts past the iteration budget", () => {
    const store = createStore(2);

    expect(store.beginIteration()).toBe(1);
    expect(store.beginIteration()).toBe(2);
    expect(store.budgetExhausted).toBe(true);
    expect(() => store.beginIteration()).toThrow(StateInvariantError);
    expect(store.iterationCount).toBe(2);
  });

  it("rejects a non-positive budget", () => {
    expect(() => createStore(0)).toThrow("maxIterations must be a positive integer, got 0");
  });

  it("hands out a decision only once", () => {
    const store = createStore();
    store.setDecision({ nextAction: "respond", reasoning: "enough data" });

    expect(store.consumeDecision()).toEqual({ nextAction: "respond", reasoning: "enough data" });
    expect(store.consumeDecision()).toBeNull();
  });

  it("spots repeated calls regardless of key order", () => {
    const store = createStore();
    store.recordToolCall({
      tool: "update_condition",
      parameters: { rule_id: "rule-001", condition_parameters: { maxFrequencyMHz: 3700, minFrequencyMHz: 3300 } },
      outcome: { ok: true, data: null },
      summary: "updated",
      repeated: false,
    });

    expect(
      store.hasCalled("update_condition", {
        condition_parameters: { minFrequencyMHz: 3300, maxFrequencyMHz: 3700 },
        rule_id: "rule-001",
      }),
    ).toBe(true);
    expect(store.hasCalled("update_action", { rule_id: "rule-001" })).toBe(false);
  });

  it("starts complete and can be marked incomplete", () => {
    const store = createStore();
    expect(store.hasCompleted).toBe(true);

    store.markIncomplete();

    expect(store.snapshot().hasCompleted).toBe(false);
  });
});

describe("WorkflowStateStore restore", () => {
  it("continues from a snapshot without sharing it", () => {
    const first = createStore();
    first.beginIteration();
    first.appendMessage("assistant", "respond: enough data");
    const snapshot = first.snapshot();

    const restored = new WorkflowStateStore(snapshot);
    restored.beginIteration();
    restored.addValidationError("late");

    expect(restored.iterationCount).toBe(2);
    expect(snapshot.iterationCount).toBe(1);
    expect(snapshot.validationErrors).toEqual([]);
    expect(restored.snapshot().messages.map((message) => message.content)).toEqual([
      "respond: enough data",
    ]);
  });

  it("rejects a restored state with a broken budget", () => {
    const snapshot = { ...createStore().snapshot(), maxIterations: 1.5 };

    expect(() => new WorkflowStateStore(snapshot)).toThrow(
      "maxIterations must be a positive integer, got 1.5",
    );
  });
});

describe("chat state", () => {
  it("starts empty and passes its own schema", () => {
    const state = createChatState();

    expect(chatStateSchema.parse(state)).toEqual(state);
    expect(() => requireRun(state)).toThrow(StateInvariantError);
  });

  it("accepts a prepared sub-workflow state", () => {
    const run = createStore().snapshot();
    const state = { ...createChatState(), query: run.query, run };

    expect(chatStateSchema.parse(state).run).toEqual(run);
    expect(requireRun(state)).toBe(run);
  });
});

describe("canonicalize", () => {
  it("sorts nested keys", () => {
    expect(canonicalize({ b: 1, a: { d: 2, c: [3, { f: 4, e: 5 }] } })).toBe(
      '{"a":{"c":[3,{"e":5,"f":4}],"d":2},"b":1}',
    );
  });
});
