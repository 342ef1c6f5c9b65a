import { z } from "zod";
import {
  ACTION_TYPES,
  CONDITION_TYPES,
  GEOLOCATION_ALGORITHMS,
  SIGNAL_TYPES,
  type ActionFields,
  type ActionPatch,
  type ActionType,
  type ConditionFields,
  type ConditionPatch,
  type ConditionType,
  type RuleFields,
} from "./rule-schemas";

/**
 * ToolBackend: 자동화 규칙 저장소 계약
 *
 * 도구 하나당 메서드 하나. 검증된 파라미터만 받으며,
 * 실패는 ToolBackendError(not_found | constraint_violation | backend_unavailable)로 throw합니다.
 * 엔진은 이 에러를 tools_called에 데이터로 기록하고 재시도하지 않습니다.
 *
 * 엔티티 스키마는 도구의 outputSchema와 seed 파일 검증에 함께 쓰입니다.
 */

export const automationRuleSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().optional(),
  isEnabled: z.boolean(),
  createdAt: z.string(),
  updatedAt: z.string().optional(),
  lastTriggeredAt: z.number().optional(),
  maxExecutions: z.number().int().optional(),
  executionsRemaining: z.number().int().optional(),
  startTime: z.string().optional(),
  endTime: z.string().optional(),
});

export type AutomationRule = z.infer<typeof automationRuleSchema>;

export const ruleConditionSchema = z.object({
  id: z.string(),
  ruleId: z.string(),
  conditionType: z.enum(CONDITION_TYPES),
  parameters: z.object({
    minFrequencyMHz: z.number().optional(),
    maxFrequencyMHz: z.number().optional(),
    signalType: z.enum(SIGNAL_TYPES).optional(),
    threshold_dBm: z.number().optional(),
  }),
  description: z.string().optional(),
  isSatisfied: z.boolean(),
  satisfiedAt: z.number().nullable().optional(),
  createdAt: z.number(),
  updatedAt: z.number(),
});

export type RuleCondition = z.infer<typeof ruleConditionSchema>;

export const ruleActionSchema = z.object({
  id: z.string(),
  ruleId: z.string(),
  actionType: z.enum(ACTION_TYPES),
  parameters: z.object({
    message: z.string().optional(),
    sensorIds: z.array(z.string()).optional(),
    algorithm: z.enum(GEOLOCATION_ALGORITHMS).optional(),
  }),
  description: z.string().optional(),
  createdAt: z.number(),
  updatedAt: z.number(),
});

export type RuleAction = z.infer<typeof ruleActionSchema>;

export const createdRuleSchema = z.object({
  rule: automationRuleSchema,
  condition: ruleConditionSchema.optional(),
  action: ruleActionSchema.optional(),
});

export type CreatedRule = z.infer<typeof createdRuleSchema>;

export const ruleStatusChangeSchema = z.object({
  ruleId: z.string(),
  ruleName: z.string(),
  status: z.enum(["activated", "already_active", "deactivated", "already_inactive"]),
  message: z.string(),
});

export type RuleStatusChange = z.infer<typeof ruleStatusChangeSchema>;

/** 변경된 항목 설명(changes)이 빈 배열이면 변경 없음 */
export function entityUpdateSchema<T extends z.ZodType>(entity: T) {
  return z.object({
    ruleId: z.string(),
    entity,
    changes: z.array(z.string()),
  });
}

export interface EntityUpdate<T> {
  ruleId: string;
  entity: T;
  changes: string[];
}

export interface ConditionUpdateInput {
  ruleId: string;
  conditionId?: string;
  conditionType?: ConditionType;
  parameters?: ConditionPatch;
  description?: string;
}

export interface ActionUpdateInput {
  ruleId: string;
  actionId?: string;
  actionType?: ActionType;
  parameters?: ActionPatch;
  description?: string;
}

export interface ToolBackend {
  listAutomationRules(): Promise<AutomationRule[]>;
  getAutomationRule(ruleId: string): Promise<AutomationRule>;
  listConditionsForRule(ruleId: string): Promise<RuleCondition[]>;
  listActionsForRule(ruleId: string): Promise<RuleAction[]>;

  createAutomationRule(rule: RuleFields): Promise<CreatedRule>;
  createRuleWithCondition(
    rule: RuleFields,
    condition: ConditionFields,
  ): Promise<CreatedRule>;
  createRuleWithAction(rule: RuleFields, action: ActionFields): Promise<CreatedRule>;
  createRuleWithConditionAndAction(
    rule: RuleFields,
    condition: ConditionFields,
    action: ActionFields,
  ): Promise<CreatedRule>;

  activateAutomationRule(ruleId: string): Promise<RuleStatusChange>;
  deactivateAutomationRule(ruleId: string): Promise<RuleStatusChange>;
  updateCondition(input: ConditionUpdateInput): Promise<EntityUpdate<RuleCondition>>;
  updateAction(input: ActionUpdateInput): Promise<EntityUpdate<RuleAction>>;
}

const BACKEND_METHODS = [
  "listAutomationRules",
  "getAutomationRule",
  "listConditionsForRule",
  "listActionsForRule",
  "createAutomationRule",
  "createRuleWithCondition",
  "createRuleWithAction",
  "createRuleWithConditionAndAction",
  "activateAutomationRule",
  "deactivateAutomationRule",
  "updateCondition",
  "updateAction",
] as const satisfies ReadonlyArray<keyof ToolBackend>;

/** RequestContext에서 꺼낸 값이 ToolBackend인지 확인 */
export function isToolBackend(value: unknown): value is ToolBackend {
  if (typeof value !== "object" || value === null) return false;
  return BACKEND_METHODS.every((method) => typeof Reflect.get(value, method) === "function");
}
