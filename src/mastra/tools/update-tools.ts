import { createTool } from "@mastra/core/tools";
import { z } from "zod";
import {
  entityUpdateSchema,
  ruleActionSchema,
  ruleConditionSchema,
  ruleStatusChangeSchema,
  type AutomationRule,
  type RuleStatusChange,
} from "./backend";
import { listAutomationRulesTool, summarizeRuleList } from "./info-tools";
import {
  ToolRegistry,
  registerTool,
  requireBackend,
  type EntityPatch,
} from "./registry";
import {
  ACTION_TYPES,
  CONDITION_TYPES,
  actionPatchSchema,
  conditionPatchSchema,
  ruleIdSchema,
} from "./rule-schemas";

/**
 * 질의에 이름(또는 ID)이 언급된 규칙을 찾습니다.
 * 긴 이름을 먼저 비교해 "LTE"와 "LTE Detector" 같은 겹침을 피합니다.
 */
export function findRuleMentionedIn(
  query: string,
  rules: AutomationRule[],
): AutomationRule | undefined {
  const normalized = query.toLowerCase();
  const byNameLength = [...rules].sort((a, b) => b.name.length - a.name.length);
  return (
    byNameLength.find((rule) => normalized.includes(rule.name.toLowerCase())) ??
    rules.find((rule) => normalized.includes(rule.id.toLowerCase()))
  );
}

const RULE_ID_HINTS = ["rule_id (string, required)"];

const ruleIdParameters = z.object({ rule_id: ruleIdSchema });

export const activateAutomationRuleTool = createTool({
  id: "activate_automation_rule",
  description: "Enable a rule so it starts monitoring; resets its conditions' satisfied state.",
  inputSchema: ruleIdParameters,
  outputSchema: ruleStatusChangeSchema,
  execute: async ({ rule_id }, { requestContext }) =>
    requireBackend(requestContext).activateAutomationRule(rule_id),
});

export const deactivateAutomationRuleTool = createTool({
  id: "deactivate_automation_rule",
  description: "Disable a rule without deleting its configuration.",
  inputSchema: ruleIdParameters,
  outputSchema: ruleStatusChangeSchema,
  execute: async ({ rule_id }, { requestContext }) =>
    requireBackend(requestContext).deactivateAutomationRule(rule_id),
});

export const updateConditionTool = createTool({
  id: "update_condition",
  description:
    "Change a rule's condition. Without condition_id the rule's first condition is updated. Only the given fields change.",
  inputSchema: z.object({
    rule_id: ruleIdSchema,
    condition_id: z.string().optional(),
    condition_type: z.enum(CONDITION_TYPES).optional(),
    condition_parameters: conditionPatchSchema.optional(),
    condition_description: z.string().optional(),
  }),
  outputSchema: entityUpdateSchema(ruleConditionSchema),
  execute: async (parameters, { requestContext }) =>
    requireBackend(requestContext).updateCondition({
      ruleId: parameters.rule_id,
      conditionId: parameters.condition_id,
      conditionType: parameters.condition_type,
      parameters: parameters.condition_parameters,
      description: parameters.condition_description,
    }),
});

export const updateActionTool = createTool({
  id: "update_action",
  description:
    "Change a rule's action. Without action_id the rule's first action is updated. Only the given fields change.",
  inputSchema: z.object({
    rule_id: ruleIdSchema,
    action_id: z.string().optional(),
    action_type: z.enum(ACTION_TYPES).optional(),
    action_parameters: actionPatchSchema.optional(),
    action_description: z.string().optional(),
  }),
  outputSchema: entityUpdateSchema(ruleActionSchema),
  execute: async (parameters, { requestContext }) =>
    requireBackend(requestContext).updateAction({
      ruleId: parameters.rule_id,
      actionId: parameters.action_id,
      actionType: parameters.action_type,
      parameters: parameters.action_parameters,
      description: parameters.action_description,
    }),
});

const summarizeStatus = (change: RuleStatusChange) => change.message;

/** 규칙 변경 도구 (UPDATE) */
export const updateToolRegistry = new ToolRegistry("UPDATE", [
  // 목록 조회 후 질의에 언급된 규칙을 target_rule로 기록
  registerTool({
    tool: listAutomationRulesTool,
    parameterHints: [
      "(no parameters)",
      "Call this first when the request names a rule instead of giving its id.",
    ],
    example: {},
    accumulate: (rules, { query }) => {
      const patch: EntityPatch = { rule_list: rules };
      const target = findRuleMentionedIn(query, rules);
      if (target) patch.target_rule = target;
      return patch;
    },
    summarize: summarizeRuleList,
  }),
  registerTool({
    tool: activateAutomationRuleTool,
    parameterHints: RULE_ID_HINTS,
    example: { rule_id: "rule-003" },
    accumulate: (change) => ({ rule: change }),
    summarize: summarizeStatus,
  }),
  registerTool({
    tool: deactivateAutomationRuleTool,
    parameterHints: RULE_ID_HINTS,
    example: { rule_id: "rule-001" },
    accumulate: (change) => ({ rule: change }),
    summarize: summarizeStatus,
  }),
  registerTool({
    tool: updateConditionTool,
    parameterHints: [
      "rule_id (string, required)",
      "condition_id (string, optional)",
      "condition_type: signalDetection | spectralEnergy (optional)",
      "condition_parameters: any of minFrequencyMHz, maxFrequencyMHz, signalType, threshold_dBm",
      "condition_description (string, optional)",
    ],
    example: {
      rule_id: "rule-002",
      condition_parameters: { minFrequencyMHz: 700, maxFrequencyMHz: 2700 },
    },
    accumulate: (update) => ({ condition: update.entity }),
    summarize: (update) =>
      update.changes.length > 0
        ? `Updated condition ${update.entity.id}: ${update.changes.join(", ")}`
        : `Condition ${update.entity.id} unchanged`,
  }),
  registerTool({
    tool: updateActionTool,
    parameterHints: [
      "rule_id (string, required)",
      "action_id (string, optional)",
      "action_type: frequencyScanRequest | geolocationRequest | userNotification (optional)",
      "action_parameters: any of message, sensorIds, algorithm",
      "action_description (string, optional)",
    ],
    example: {
      rule_id: "rule-001",
      action_parameters: { message: "5G activity near the east gate" },
    },
    accumulate: (update) => ({ action: update.entity }),
    summarize: (update) =>
      update.changes.length > 0
        ? `Updated action ${update.entity.id}: ${update.changes.join(", ")}`
        : `Action ${update.entity.id} unchanged`,
  }),
]);

/** 변경이 실제로 일어난 도구 (완료 판정용) */
export const MUTATING_UPDATE_TOOLS: ReadonlySet<string> = new Set([
  activateAutomationRuleTool.id,
  deactivateAutomationRuleTool.id,
  updateConditionTool.id,
  updateActionTool.id,
]);
