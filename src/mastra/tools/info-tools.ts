import { createTool } from "@mastra/core/tools";
import { z } from "zod";
import {
  automationRuleSchema,
  ruleActionSchema,
  ruleConditionSchema,
  type AutomationRule,
} from "./backend";
import { ToolRegistry, registerTool, requireBackend } from "./registry";
import { ruleIdSchema } from "./rule-schemas";

const ruleIdParameters = z.object({ rule_id: ruleIdSchema });

export function summarizeRuleList(rules: AutomationRule[]): string {
  if (rules.length === 0) return "Found 0 automation rules";
  const names = rules
    .map((rule) => `${rule.name} (${rule.id}, ${rule.isEnabled ? "enabled" : "disabled"})`)
    .join(", ");
  return `Found ${rules.length} automation rules: ${names}`;
}

export const listAutomationRulesTool = createTool({
  id: "list_automation_rules",
  description: "List every automation rule with its id, name and enabled state.",
  inputSchema: z.object({}),
  outputSchema: z.array(automationRuleSchema),
  execute: async (_input, { requestContext }) =>
    requireBackend(requestContext).listAutomationRules(),
});

export const getAutomationRuleTool = createTool({
  id: "get_automation_rule",
  description: "Get one automation rule by id.",
  inputSchema: ruleIdParameters,
  outputSchema: automationRuleSchema,
  execute: async ({ rule_id }, { requestContext }) =>
    requireBackend(requestContext).getAutomationRule(rule_id),
});

export const listConditionsForRuleTool = createTool({
  id: "list_conditions_for_rule",
  description: "List the trigger conditions attached to a rule.",
  inputSchema: ruleIdParameters,
  outputSchema: z.array(ruleConditionSchema),
  execute: async ({ rule_id }, { requestContext }) =>
    requireBackend(requestContext).listConditionsForRule(rule_id),
});

export const listActionsForRuleTool = createTool({
  id: "list_actions_for_rule",
  description: "List the actions a rule performs when its conditions are met.",
  inputSchema: ruleIdParameters,
  outputSchema: z.array(ruleActionSchema),
  execute: async ({ rule_id }, { requestContext }) =>
    requireBackend(requestContext).listActionsForRule(rule_id),
});

const RULE_ID_HINTS = ["rule_id (string, required)"];

/** 조회 전용 도구 (INFO) */
export const infoToolRegistry = new ToolRegistry("INFO", [
  registerTool({
    tool: listAutomationRulesTool,
    parameterHints: ["(no parameters)"],
    example: {},
    accumulate: (rules) => ({ rule_list: rules }),
    summarize: summarizeRuleList,
  }),
  registerTool({
    tool: getAutomationRuleTool,
    parameterHints: RULE_ID_HINTS,
    example: { rule_id: "rule-001" },
    accumulate: (rule) => ({ rule }),
    summarize: (rule) =>
      `Retrieved rule '${rule.name}' (${rule.id}), ${rule.isEnabled ? "enabled" : "disabled"}`,
  }),
  registerTool({
    tool: listConditionsForRuleTool,
    parameterHints: RULE_ID_HINTS,
    example: { rule_id: "rule-001" },
    accumulate: (conditions) => ({ condition_list: conditions }),
    summarize: (conditions) => `Found ${conditions.length} conditions`,
  }),
  registerTool({
    tool: listActionsForRuleTool,
    parameterHints: RULE_ID_HINTS,
    example: { rule_id: "rule-001" },
    accumulate: (actions) => ({ action_list: actions }),
    summarize: (actions) => `Found ${actions.length} actions`,
  }),
]);
