import { describe, it, expect } from "vitest";
import {
  emptyInitialAnalysis,
  type InitialAnalysis,
  type IntentLabel,
  type PlannerDecision,
  type ReasonerRole,
} from "../../src/mastra/agents/reasoner";
import { createIntentRouter } from "../../src/mastra/assistant";
import {
  ReasonerOutputError,
  ReasonerUnavailableError,
  WorkflowCancelledError,
} from "../../src/mastra/errors";
import { InMemoryRuleBackend, loadSeedRules } from "../../src/mastra/tools/in-memory-backend";
import { DEGRADED_RESPONSE, ERROR_RESPONSE } from "../../src/mastra/workflows/responses";
import { RecordingLogger } from "../helpers/recording-logger";
import {
  ScriptedReasoner,
  fail,
  intentRecord,
  ok,
  type ReasonerScript,
} from "../helpers/scripted-reasoner";

const knowledge = { schema: "SCHEMA TEXT", rfSpectrum: "RF TEXT" };

function analysis(overrides: Partial<InitialAnalysis> = {}): InitialAnalysis {
  return { ...emptyInitialAnalysis(), ...overrides };
}

function decision(value: PlannerDecision) {
  return ok(value);
}

function setup(script: ReasonerScript, onInfer?: (role: ReasonerRole) => void) {
  const reasoner = new ScriptedReasoner(script, onInfer);
  const backend = new InMemoryRuleBackend({ seed: loadSeedRules() });
  const logger = new RecordingLogger();
  const router = createIntentRouter({
    config: { maxIterations: { CREATE: 8, UPDATE: 8, INFO: 5 } },
    reasoner,
    backend,
    knowledge,
    logger,
  });
  return { reasoner, backend, logger, router };
}

describe("IntentRouter scenarios", () => {
  it("creates a rule with a condition and an action", async () => {
    const { router, backend, reasoner } = setup({
      initial_analysis: [ok(analysis({ requiresRfKnowledge: true }))],
      classify: [ok(intentRecord("CREATE"))],
      plan: [
        decision({
          nextAction: "call_tool",
          tool: "create_rule_condition_action",
          parameters: {
            name: "Mid-band 5G",
            condition_type: "signalDetection",
            condition_parameters: { minFrequencyMHz: 3400, maxFrequencyMHz: 3600, signalType: "5G" },
            action_type: "userNotification",
            action_parameters: { message: "5G seen in mid-band" },
          },
          reasoning: "rule with condition and action",
        }),
      ],
      respond_summary: [ok("Created 'Mid-band 5G'.")],
    });

    const outcome = await router.route("Notify me when 5G appears between 3400 and 3600 MHz");

    expect(outcome.result).toEqual({
      status: "completed",
      intent: "CREATE",
      response: "Created 'Mid-band 5G'.",
    });
    const rules = await backend.listAutomationRules();
    expect(rules.map((rule) => rule.name)).toContain("Mid-band 5G");
    expect(reasoner.roles).toEqual([
      "initial_analysis",
      "classify",
      "plan",
      "respond_summary",
    ]);
  });

  it("updates a rule named in the request", async () => {
    const { router, backend } = setup({
      initial_analysis: [ok(analysis({ requiresDatabaseQueries: true }))],
      classify: [ok(intentRecord("UPDATE"))],
      plan: [
        decision({
          nextAction: "call_tool",
          tool: "list_automation_rules",
          parameters: {},
          reasoning: "find the rule id",
        }),
        decision({
          nextAction: "call_tool",
          tool: "activate_automation_rule",
          parameters: { rule_id: "rule-003" },
          reasoning: "activate it",
        }),
      ],
      respond_summary: [ok("Energy Threshold Alert is active.")],
    });

    const outcome = await router.route("Turn on the Energy Threshold Alert");

    expect(outcome.result).toMatchObject({ status: "completed", intent: "UPDATE" });
    expect((await backend.getAutomationRule("rule-003")).isEnabled).toBe(true);
  });

  it("answers questions about stored rules", async () => {
    const { router, reasoner } = setup({
      initial_analysis: [ok(analysis({ requiresDatabaseQueries: true }))],
      classify: [ok(intentRecord("INFO"))],
      plan: [
        decision({
          nextAction: "call_tool",
          tool: "list_conditions_for_rule",
          parameters: { rule_id: "rule-001" },
          reasoning: "read conditions",
        }),
        decision({ nextAction: "respond", reasoning: "have the condition" }),
      ],
      respond_summary: [ok("5G Monitor watches 3400-3600 MHz for 5G.")],
    });

    const outcome = await router.route("What does the 5G Monitor watch?");

    expect(outcome.result).toEqual({
      status: "completed",
      intent: "INFO",
      response: "5G Monitor watches 3400-3600 MHz for 5G.",
    });
    expect(reasoner.inputsFor("plan")[0]).toMatchObject({
      kind: "INFO",
      iteration: 1,
      maxIterations: 5,
    });
  });

  it("answers general questions from knowledge text without tools", async () => {
    const { router, reasoner } = setup({
      initial_analysis: [ok(analysis({ requiresRfKnowledge: true }))],
      classify: [ok(intentRecord("GENERIC"))],
      respond_generic: [ok("TDOA locates an emitter from arrival time differences.")],
    });

    const outcome = await router.route("What is TDOA?");

    expect(outcome.result).toEqual({
      status: "completed",
      intent: "GENERIC",
      response: "TDOA locates an emitter from arrival time differences.",
    });
    expect(reasoner.roles).toEqual(["initial_analysis", "classify", "respond_generic"]);
    expect(reasoner.inputsFor("respond_generic")[0]).toEqual({
      query: "What is TDOA?",
      knowledge: "SCHEMA TEXT\n\nRF TEXT",
    });
  });

  it("rejects unrelated requests with the fixed error text", async () => {
    const { router, reasoner, logger } = setup({
      initial_analysis: [ok(analysis())],
      classify: [ok(intentRecord("UNKNOWN", 0.2))],
    });

    const outcome = await router.route("Book me a flight to Lisbon");

    expect(outcome.result).toEqual({
      status: "rejected",
      intent: "UNKNOWN",
      response: ERROR_RESPONSE,
    });
    expect(outcome.state?.run).toBeNull();
    expect(reasoner.roles).toEqual(["initial_analysis", "classify"]);
    expect(logger.messages("info")).toEqual(["Intent classified", "Request finished"]);
  });
});

describe("IntentRouter dispatch", () => {
  const followUps: Record<IntentLabel, ReasonerScript> = {
    CREATE: {
      plan: [decision({ nextAction: "respond", reasoning: "nothing to create" })],
      respond_summary: [ok("create")],
    },
    UPDATE: {
      plan: [decision({ nextAction: "respond", reasoning: "nothing to update" })],
      respond_summary: [ok("update")],
    },
    INFO: {
      plan: [decision({ nextAction: "respond", reasoning: "nothing to read" })],
      respond_summary: [ok("info")],
    },
    GENERIC: { respond_generic: [ok("generic")] },
    UNKNOWN: {},
  };

  it.each(["CREATE", "UPDATE", "INFO", "GENERIC", "UNKNOWN"] as const)(
    "runs exactly one handler for %s",
    async (label) => {
      const { router, reasoner } = setup({
        initial_analysis: [ok(analysis())],
        classify: [ok(intentRecord(label))],
        ...followUps[label],
      });

      const outcome = await router.route("some request");

      expect(outcome.result).toMatchObject({
        status: label === "UNKNOWN" ? "rejected" : "completed",
        intent: label,
      });
      expect(outcome.state?.run?.kind ?? null).toBe(
        label === "CREATE" || label === "UPDATE" || label === "INFO" ? label : null,
      );
      const sawPlanner = reasoner.roles.includes("plan");
      const sawGeneric = reasoner.roles.includes("respond_generic");
      expect(sawPlanner).toBe(label === "CREATE" || label === "UPDATE" || label === "INFO");
      expect(sawGeneric).toBe(label === "GENERIC");
    },
  );

  it("picks knowledge text from the analysis flags", async () => {
    const { router, reasoner } = setup({
      initial_analysis: [ok(analysis({ requiresRfKnowledge: true }))],
      classify: [ok(intentRecord("UNKNOWN"))],
    });

    await router.route("what is a QPSK signal?");

    expect(reasoner.inputsFor("classify")[0]).toMatchObject({ knowledge: "RF TEXT" });
  });

  it("continues with an empty analysis when analysis fails", async () => {
    const { router, reasoner, logger } = setup({
      initial_analysis: [fail(new ReasonerUnavailableError("analysis model down"))],
      classify: [ok(intentRecord("UNKNOWN"))],
    });

    const outcome = await router.route("hello?");

    expect(outcome.result).toEqual({
      status: "rejected",
      intent: "UNKNOWN",
      response: ERROR_RESPONSE,
    });
    expect(reasoner.inputsFor("classify")[0]).toMatchObject({
      analysis: emptyInitialAnalysis(),
      knowledge: "",
    });
    expect(logger.messages("warn")).toContain("Initial analysis failed, continuing without it");
  });

  it("treats malformed classification as UNKNOWN", async () => {
    const { router } = setup({
      initial_analysis: [ok(analysis())],
      classify: [fail(new ReasonerOutputError("classify output did not match its schema"))],
    });

    const outcome = await router.route("???");

    expect(outcome.intent).toMatchObject({ intent: "UNKNOWN", confidence: 0 });
    expect(outcome.result).toEqual({
      status: "rejected",
      intent: "UNKNOWN",
      response: ERROR_RESPONSE,
    });
  });

  it("fails the request when the classifier is unavailable", async () => {
    const { router } = setup({
      initial_analysis: [ok(analysis())],
      classify: [fail(new ReasonerUnavailableError("classifier down"))],
    });

    const outcome = await router.route("list my rules");

    expect(outcome.intent).toBeNull();
    expect(outcome.result).toEqual({
      status: "failed",
      intent: null,
      response: DEGRADED_RESPONSE,
      errorCode: "reasoner_unavailable",
    });
    expect(outcome.state?.failure).toEqual({
      code: "reasoner_unavailable",
      message: "classifier down",
    });
  });

  it("fails the request when the generic responder is unavailable", async () => {
    const { router } = setup({
      initial_analysis: [ok(analysis())],
      classify: [ok(intentRecord("GENERIC"))],
      respond_generic: [fail(new ReasonerUnavailableError("responder down"))],
    });

    const outcome = await router.route("what is PDOA?");

    expect(outcome.result).toEqual({
      status: "failed",
      intent: "GENERIC",
      response: DEGRADED_RESPONSE,
      errorCode: "reasoner_unavailable",
    });
  });

  it("marks a generic answer incomplete when the responder output is unusable", async () => {
    const { router } = setup({
      initial_analysis: [ok(analysis())],
      classify: [ok(intentRecord("GENERIC"))],
      respond_generic: [fail(new ReasonerOutputError("no text"))],
    });

    const outcome = await router.route("what is PDOA?");

    expect(outcome.result).toEqual({
      status: "incomplete",
      intent: "GENERIC",
      response: "[INCOMPLETE] I could not put together an answer to that question.",
    });
  });

  it("passes the analysis and classification turns to the sub-workflow", async () => {
    const { router, reasoner } = setup({
      initial_analysis: [ok(analysis())],
      classify: [ok(intentRecord("INFO"))],
      plan: [decision({ nextAction: "respond", reasoning: "nothing to do" })],
      respond_summary: [ok("ok")],
    });

    await router.route("list rules");

    const [planInput] = reasoner.inputsFor("plan");
    expect(planInput).toMatchObject({
      messages: [
        { role: "user", content: "list rules" },
        { role: "assistant" },
        { role: "assistant", content: "intent: INFO (confidence 0.9) looks like INFO" },
      ],
    });
  });
});

describe("IntentRouter cancellation", () => {
  it("does not start a run when the signal is already aborted", async () => {
    const { router, reasoner, logger } = setup({});
    const controller = new AbortController();
    controller.abort();

    const outcome = await router.route("list rules", { signal: controller.signal });

    expect(outcome).toEqual({ intent: null, result: { status: "cancelled" }, state: null });
    expect(reasoner.calls).toHaveLength(0);
    expect(logger.messages("info")).toEqual(["Request cancelled"]);
  });

  it("stops before dispatch when cancelled during classification", async () => {
    const controller = new AbortController();
    const { router, reasoner, backend } = setup(
      {
        initial_analysis: [ok(analysis())],
        classify: [ok(intentRecord("UPDATE"))],
      },
      (role) => {
        if (role === "classify") controller.abort();
      },
    );
    const before = backend.snapshot();

    const outcome = await router.route("turn off rule-002", { signal: controller.signal });

    expect(outcome.result).toEqual({ status: "cancelled" });
    expect(reasoner.roles).toEqual(["initial_analysis", "classify"]);
    expect(backend.snapshot()).toEqual(before);
  });
});

describe("IntentRouter.handle", () => {
  it("returns the response text", async () => {
    const { router } = setup({
      initial_analysis: [ok(analysis())],
      classify: [ok(intentRecord("UNKNOWN"))],
    });

    await expect(router.handle("tell me a joke")).resolves.toBe(ERROR_RESPONSE);
  });

  it("throws WorkflowCancelledError instead of returning text when cancelled", async () => {
    const { router, reasoner } = setup({});
    const controller = new AbortController();
    controller.abort();

    await expect(
      router.handle("list rules", { signal: controller.signal }),
    ).rejects.toBeInstanceOf(WorkflowCancelledError);
    expect(reasoner.calls).toHaveLength(0);
  });
});
