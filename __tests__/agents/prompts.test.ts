import { describe, it, expect } from "vitest";
import {
  buildClassificationPrompt,
  buildGenericPrompt,
  buildPlannerPrompt,
  buildSummaryPrompt,
  formatToolHistory,
} from "../../src/mastra/agents/prompts";
import { emptyInitialAnalysis } from "../../src/mastra/agents/reasoner";
import { infoToolRegistry } from "../../src/mastra/tools/info-tools";
import type { ToolCallRecord } from "../../src/mastra/workflows/state";

const history: ToolCallRecord[] = [
  {
    tool: "get_automation_rule",
    parameters: { rule_id: "rule-009" },
    outcome: { ok: false, error: { code: "not_found", message: "Rule with id 'rule-009' not found" } },
    summary: "get_automation_rule failed (not_found): Rule with id 'rule-009' not found",
    repeated: false,
    at: "2025-06-01T00:00:00.000Z",
  },
  {
    tool: "list_automation_rules",
    parameters: {},
    outcome: { ok: true, data: [] },
    summary: "Found 0 automation rules",
    repeated: true,
    at: "2025-06-01T00:00:01.000Z",
  },
];

describe("formatToolHistory", () => {
  it("numbers calls and shows their outcome", () => {
    expect(formatToolHistory(history)).toBe(
      [
        '1. get_automation_rule {"rule_id":"rule-009"} → failed: not_found',
        "   get_automation_rule failed (not_found): Rule with id 'rule-009' not found",
        "2. list_automation_rules {} → ok (repeated)",
        "   Found 0 automation rules",
      ].join("\n"),
    );
  });
});

describe("buildPlannerPrompt", () => {
  const prompt = buildPlannerPrompt({
    kind: "INFO",
    query: "what does rule-009 do?",
    messages: [],
    catalog: infoToolRegistry.renderCatalog(),
    toolsCalled: history,
    entities: {},
    validationErrors: ["get_automation_rule failed (not_found): Rule with id 'rule-009' not found"],
    iteration: 2,
    maxIterations: 5,
  });

  it("includes the catalog and the errors to fix", () => {
    expect(prompt).toContain(`[AVAILABLE TOOLS]\n${infoToolRegistry.renderCatalog()}`);
    expect(prompt).toContain(
      "[ERRORS TO FIX]\n- get_automation_rule failed (not_found): Rule with id 'rule-009' not found",
    );
  });

  it("states the remaining budget", () => {
    expect(prompt).toContain("Step 2 of 5 (3 left after this one).");
  });

  it("marks empty sections", () => {
    expect(prompt).toContain("[CONVERSATION]\n(none)");
  });
});

describe("other prompts", () => {
  it("lists detected entities for classification", () => {
    const analysis = emptyInitialAnalysis();
    analysis.detectedEntities.signalTypes.push("LTE");
    analysis.detectedEntities.frequencyRanges.push("700-900 MHz");

    const prompt = buildClassificationPrompt({ query: "watch LTE", analysis, knowledge: "" });

    expect(prompt).toContain("[DETECTED ENTITIES]\n700-900 MHz, LTE");
    expect(prompt).toContain("[KNOWLEDGE]\n(none)");
  });

  it("tells the summary when the workflow did not finish", () => {
    const prompt = buildSummaryPrompt({
      kind: "UPDATE",
      query: "disable the night watch",
      toolsCalled: [],
      entities: {},
      validationErrors: [],
      completed: false,
    });

    expect(prompt.endsWith(
      "The workflow ran out of steps or could not finish. Say clearly what was and was not done.",
    )).toBe(true);
  });

  it("puts the knowledge after the request for generic answers", () => {
    expect(buildGenericPrompt({ query: "What is CW?", knowledge: "RF TEXT" })).toBe(
      "[USER REQUEST]\nWhat is CW?\n\n[KNOWLEDGE]\nRF TEXT",
    );
  });
});
