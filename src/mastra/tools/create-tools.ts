import { createTool } from "@mastra/core/tools";
import { createdRuleSchema, type CreatedRule } from "./backend";
import { listAutomationRulesTool, summarizeRuleList } from "./info-tools";
import {
  ToolRegistry,
  registerTool,
  requireBackend,
  type EntityPatch,
} from "./registry";
import {
  TIME_WINDOW_MESSAGE,
  actionFieldsSchema,
  conditionFieldsSchema,
  hasValidTimeWindow,
  ruleFieldsSchema,
} from "./rule-schemas";

const timeWindow = { message: TIME_WINDOW_MESSAGE, path: ["end_time"] };

const RULE_HINTS = [
  "name (string, required)",
  "description (string, optional)",
  "is_enabled (boolean, default false)",
  "max_executions (positive integer, optional)",
  "start_time / end_time (ISO datetime, optional, start before end)",
];

const CONDITION_HINTS = [
  "condition_type: signalDetection | spectralEnergy",
  "condition_parameters.minFrequencyMHz / maxFrequencyMHz (10-6000, default full span, min < max)",
  "condition_parameters.signalType (signalDetection): Energy | 5G | LTE | QPSK | CW | PCMPM | CPM | CPMFM | BPSK | SOQPSK",
  "condition_parameters.threshold_dBm (spectralEnergy): -150 to 150",
  "condition_description (string, optional)",
];

const ACTION_HINTS = [
  "action_type: frequencyScanRequest | geolocationRequest | userNotification",
  "action_parameters.sensorIds (frequencyScanRequest: 1+, geolocationRequest: 2+)",
  "action_parameters.algorithm (geolocationRequest): TDOA | PDOA",
  "action_parameters.message (userNotification, non-empty)",
  "action_description (string, optional)",
];

function createdEntities(created: CreatedRule): EntityPatch {
  const patch: EntityPatch = { rule: created.rule };
  if (created.condition) patch.condition = created.condition;
  if (created.action) patch.action = created.action;
  return patch;
}

export function summarizeCreated(created: CreatedRule): string {
  const parts = [`Created rule '${created.rule.name}' with ID ${created.rule.id}`];
  if (created.condition) {
    parts.push(`${created.condition.conditionType} condition ${created.condition.id}`);
  }
  if (created.action) {
    parts.push(`${created.action.actionType} action ${created.action.id}`);
  }
  return parts.join(", ");
}

export const createAutomationRuleTool = createTool({
  id: "create_automation_rule",
  description: "Create a rule with no condition or action attached.",
  inputSchema: ruleFieldsSchema.refine(hasValidTimeWindow, timeWindow),
  outputSchema: createdRuleSchema,
  execute: async (rule, { requestContext }) =>
    requireBackend(requestContext).createAutomationRule(rule),
});

export const createRuleConditionTool = createTool({
  id: "create_rule_condition",
  description: "Create a rule together with one trigger condition.",
  inputSchema: ruleFieldsSchema
    .and(conditionFieldsSchema)
    .refine(hasValidTimeWindow, timeWindow),
  outputSchema: createdRuleSchema,
  execute: async (fields, { requestContext }) =>
    requireBackend(requestContext).createRuleWithCondition(fields, fields),
});

export const createRuleActionTool = createTool({
  id: "create_rule_action",
  description: "Create a rule together with one action.",
  inputSchema: ruleFieldsSchema.and(actionFieldsSchema).refine(hasValidTimeWindow, timeWindow),
  outputSchema: createdRuleSchema,
  execute: async (fields, { requestContext }) =>
    requireBackend(requestContext).createRuleWithAction(fields, fields),
});

export const createRuleConditionActionTool = createTool({
  id: "create_rule_condition_action",
  description: "Create a rule with one condition and one action in a single call.",
  inputSchema: ruleFieldsSchema
    .and(conditionFieldsSchema)
    .and(actionFieldsSchema)
    .refine(hasValidTimeWindow, timeWindow),
  outputSchema: createdRuleSchema,
  execute: async (fields, { requestContext }) =>
    requireBackend(requestContext).createRuleWithConditionAndAction(fields, fields, fields),
});

/** 규칙 생성 도구 (CREATE). 중복 이름 확인용 목록 조회 포함 */
export const createToolRegistry = new ToolRegistry("CREATE", [
  registerTool({
    tool: listAutomationRulesTool,
    parameterHints: ["(no parameters)"],
    example: {},
    accumulate: (rules) => ({ rule_list: rules }),
    summarize: summarizeRuleList,
  }),
  registerTool({
    tool: createAutomationRuleTool,
    parameterHints: RULE_HINTS,
    example: { name: "Night Watch", is_enabled: false },
    accumulate: createdEntities,
    summarize: summarizeCreated,
  }),
  registerTool({
    tool: createRuleConditionTool,
    parameterHints: [...RULE_HINTS, ...CONDITION_HINTS],
    example: {
      name: "5G Band Watch",
      condition_type: "signalDetection",
      condition_parameters: { minFrequencyMHz: 3300, maxFrequencyMHz: 3800, signalType: "5G" },
    },
    accumulate: createdEntities,
    summarize: summarizeCreated,
  }),
  registerTool({
    tool: createRuleActionTool,
    parameterHints: [...RULE_HINTS, ...ACTION_HINTS],
    example: {
      name: "Ops Alert",
      action_type: "userNotification",
      action_parameters: { message: "Check the spectrum dashboard" },
    },
    accumulate: createdEntities,
    summarize: summarizeCreated,
  }),
  registerTool({
    tool: createRuleConditionActionTool,
    parameterHints: [...RULE_HINTS, ...CONDITION_HINTS, ...ACTION_HINTS],
    example: {
      name: "LTE Locator",
      is_enabled: true,
      condition_type: "signalDetection",
      condition_parameters: { minFrequencyMHz: 700, maxFrequencyMHz: 900, signalType: "LTE" },
      action_type: "geolocationRequest",
      action_parameters: { algorithm: "TDOA", sensorIds: ["sensor-01", "sensor-02"] },
    },
    accumulate: createdEntities,
    summarize: summarizeCreated,
  }),
]);

/** 규칙을 실제로 만드는 도구 (완료 판정용) */
export const CREATION_TOOLS: ReadonlySet<string> = new Set([
  createAutomationRuleTool.id,
  createRuleConditionTool.id,
  createRuleActionTool.id,
  createRuleConditionActionTool.id,
]);
