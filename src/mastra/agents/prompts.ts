import type { ToolCallRecord, WorkflowKind } from "../workflows/state";
import type { ReasonerInputs } from "./reasoner";

/**
 * Reasoner 역할별 프롬프트 빌더
 *
 * 에이전트 instructions는 고정이고, 요청마다 바뀌는 내용(질의, 도구 카탈로그,
 * 누적 결과, 검증 에러)은 여기서 섹션 단위로 조립합니다.
 */

const KIND_GUIDANCE: Record<WorkflowKind, string> = {
  CREATE: `Create exactly what the user asked for in one call when possible:
- rule + condition + action → create_rule_condition_action
- rule + condition → create_rule_condition
- rule + action → create_rule_action
- bare rule → create_automation_rule
If the user gives no frequency range, omit it (the full 10-6000 MHz span is used).`,
  UPDATE: `Find the target rule first. If the request names a rule instead of giving its id,
call list_automation_rules, then use the id of the matching rule.
Then call exactly one of activate_automation_rule, deactivate_automation_rule,
update_condition or update_action.`,
  INFO: `Gather only the data needed to answer. Start with list_automation_rules unless
the user already gave a rule id, then fetch conditions or actions per rule as needed.
Respond as soon as the gathered data answers the question.`,
};

function section(title: string, body: string): string {
  return `[${title}]\n${body.trim() || "(none)"}`;
}

export function formatToolHistory(records: ToolCallRecord[]): string {
  return records
    .map((record, index) => {
      const status = record.outcome.ok ? "ok" : `failed: ${record.outcome.error.code}`;
      const repeat = record.repeated ? " (repeated)" : "";
      return `${index + 1}. ${record.tool} ${JSON.stringify(record.parameters)} → ${status}${repeat}\n   ${record.summary}`;
    })
    .join("\n");
}

export function buildAnalysisPrompt(input: ReasonerInputs["initial_analysis"]): string {
  return [
    section("USER REQUEST", input.query),
    "Decide which background knowledge is needed and list the RF entities mentioned.",
  ].join("\n\n");
}

export function buildClassificationPrompt(input: ReasonerInputs["classify"]): string {
  const detected = input.analysis.detectedEntities;
  const mentioned = [
    ...detected.frequencyRanges,
    ...detected.signalTypes,
    ...detected.conditionTypes,
    ...detected.actionTypes,
  ];
  return [
    section("USER REQUEST", input.query),
    section("DETECTED ENTITIES", mentioned.join(", ")),
    section("KNOWLEDGE", input.knowledge),
    "Classify the request as CREATE, UPDATE, INFO, GENERIC or UNKNOWN.",
  ].join("\n\n");
}

export function buildPlannerPrompt(input: ReasonerInputs["plan"]): string {
  const remaining = input.maxIterations - input.iteration;
  return [
    section("USER REQUEST", input.query),
    section("WORKFLOW", `${input.kind}\n${KIND_GUIDANCE[input.kind]}`),
    section("AVAILABLE TOOLS", input.catalog),
    section("TOOLS CALLED", formatToolHistory(input.toolsCalled)),
    section("RESULTS SO FAR", JSON.stringify(input.entities, null, 2)),
    section("ERRORS TO FIX", input.validationErrors.map((e) => `- ${e}`).join("\n")),
    section(
      "CONVERSATION",
      input.messages.map((m) => `${m.role}: ${m.content}`).join("\n"),
    ),
    `Step ${input.iteration} of ${input.maxIterations} (${remaining} left after this one).`,
    `Reply with next_action "call_tool" plus tool_name and parameters, or "respond" when done.`,
  ].join("\n\n");
}

export function buildSummaryPrompt(input: ReasonerInputs["respond_summary"]): string {
  const status = input.completed
    ? "The workflow finished."
    : "The workflow ran out of steps or could not finish. Say clearly what was and was not done.";
  return [
    section("USER REQUEST", input.query),
    section("WORKFLOW", input.kind),
    section("TOOLS CALLED", formatToolHistory(input.toolsCalled)),
    section("RESULTS", JSON.stringify(input.entities, null, 2)),
    section("ERRORS", input.validationErrors.map((e) => `- ${e}`).join("\n")),
    status,
  ].join("\n\n");
}

export function buildGenericPrompt(input: ReasonerInputs["respond_generic"]): string {
  return [section("USER REQUEST", input.query), section("KNOWLEDGE", input.knowledge)].join(
    "\n\n",
  );
}
