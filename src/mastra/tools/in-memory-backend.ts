import { randomUUID } from "node:crypto";
import { readFileSync } from "node:fs";
import { z } from "zod";
import { ToolBackendError } from "../errors";
import { resolveDataFile } from "../paths";
import {
  automationRuleSchema,
  ruleActionSchema,
  ruleConditionSchema,
  type ActionUpdateInput,
  type AutomationRule,
  type ConditionUpdateInput,
  type CreatedRule,
  type EntityUpdate,
  type RuleAction,
  type RuleCondition,
  type RuleStatusChange,
  type ToolBackend,
} from "./backend";
import {
  BAND_ORDER_MESSAGE,
  TIME_WINDOW_MESSAGE,
  hasValidTimeWindow,
  type ActionFields,
  type ConditionFields,
  type RuleFields,
} from "./rule-schemas";

// ─── Seed ───

const seedSchema = z.object({
  rules: z.array(automationRuleSchema),
  conditions: z.array(ruleConditionSchema),
  actions: z.array(ruleActionSchema),
});

export interface RuleStoreSnapshot {
  rules: AutomationRule[];
  conditions: RuleCondition[];
  actions: RuleAction[];
}

/** seed-rules.json을 읽어 검증된 스냅샷으로 반환 */
export function loadSeedRules(): RuleStoreSnapshot {
  const path = resolveDataFile(import.meta.url, "src/mastra/tools", "seed-rules.json");
  const raw: unknown = JSON.parse(readFileSync(path, "utf8"));
  return seedSchema.parse(raw);
}

// ─── Backend ───

export interface InMemoryRuleBackendOptions {
  seed?: RuleStoreSnapshot;
  generateId?: () => string;
  now?: () => Date;
}

/**
 * 프로세스 메모리 기반 규칙 저장소
 *
 * 기본 ToolBackend 구현. 인스턴스마다 seed의 깊은 복사본을 가지므로
 * 테스트 간 상태가 공유되지 않습니다. 반환값도 복사본입니다.
 */
export class InMemoryRuleBackend implements ToolBackend {
  private rules: AutomationRule[];
  private conditions: RuleCondition[];
  private actions: RuleAction[];
  private readonly generateId: () => string;
  private readonly now: () => Date;

  constructor(options: InMemoryRuleBackendOptions = {}) {
    const seed = structuredClone(
      options.seed ?? { rules: [], conditions: [], actions: [] },
    );
    this.rules = seed.rules;
    this.conditions = seed.conditions;
    this.actions = seed.actions;
    this.generateId = options.generateId ?? randomUUID;
    this.now = options.now ?? (() => new Date());
  }

  snapshot(): RuleStoreSnapshot {
    return structuredClone({
      rules: this.rules,
      conditions: this.conditions,
      actions: this.actions,
    });
  }

  async listAutomationRules(): Promise<AutomationRule[]> {
    return structuredClone(this.rules);
  }

  async getAutomationRule(ruleId: string): Promise<AutomationRule> {
    return structuredClone(this.requireRule(ruleId));
  }

  async listConditionsForRule(ruleId: string): Promise<RuleCondition[]> {
    this.requireRule(ruleId);
    return structuredClone(this.conditions.filter((c) => c.ruleId === ruleId));
  }

  async listActionsForRule(ruleId: string): Promise<RuleAction[]> {
    this.requireRule(ruleId);
    return structuredClone(this.actions.filter((a) => a.ruleId === ruleId));
  }

  async createAutomationRule(rule: RuleFields): Promise<CreatedRule> {
    const created = { rule: this.buildRule(rule) };
    this.rules.push(created.rule);
    return structuredClone(created);
  }

  async createRuleWithCondition(
    rule: RuleFields,
    condition: ConditionFields,
  ): Promise<CreatedRule> {
    const newRule = this.buildRule(rule);
    const newCondition = this.buildCondition(newRule.id, condition);
    this.rules.push(newRule);
    this.conditions.push(newCondition);
    return structuredClone({ rule: newRule, condition: newCondition });
  }

  async createRuleWithAction(
    rule: RuleFields,
    action: ActionFields,
  ): Promise<CreatedRule> {
    const newRule = this.buildRule(rule);
    const newAction = this.buildAction(newRule.id, action);
    this.rules.push(newRule);
    this.actions.push(newAction);
    return structuredClone({ rule: newRule, action: newAction });
  }

  async createRuleWithConditionAndAction(
    rule: RuleFields,
    condition: ConditionFields,
    action: ActionFields,
  ): Promise<CreatedRule> {
    const newRule = this.buildRule(rule);
    const newCondition = this.buildCondition(newRule.id, condition);
    const newAction = this.buildAction(newRule.id, action);
    this.rules.push(newRule);
    this.conditions.push(newCondition);
    this.actions.push(newAction);
    return structuredClone({
      rule: newRule,
      condition: newCondition,
      action: newAction,
    });
  }

  async activateAutomationRule(ruleId: string): Promise<RuleStatusChange> {
    const rule = this.requireRule(ruleId);
    if (rule.isEnabled) {
      return {
        ruleId,
        ruleName: rule.name,
        status: "already_active",
        message: `Rule '${rule.name}' (ID: ${ruleId}) is already activated.`,
      };
    }

    rule.isEnabled = true;
    rule.updatedAt = this.now().toISOString();
    // 활성화 시 조건 충족 상태 초기화
    for (const condition of this.conditions) {
      if (condition.ruleId !== ruleId) continue;
      condition.isSatisfied = false;
      condition.satisfiedAt = null;
    }

    return {
      ruleId,
      ruleName: rule.name,
      status: "activated",
      message: `Rule '${rule.name}' (ID: ${ruleId}) is now monitoring its conditions.`,
    };
  }

  async deactivateAutomationRule(ruleId: string): Promise<RuleStatusChange> {
    const rule = this.requireRule(ruleId);
    if (!rule.isEnabled) {
      return {
        ruleId,
        ruleName: rule.name,
        status: "already_inactive",
        message: `Rule '${rule.name}' (ID: ${ruleId}) is already deactivated.`,
      };
    }

    rule.isEnabled = false;
    rule.updatedAt = this.now().toISOString();

    return {
      ruleId,
      ruleName: rule.name,
      status: "deactivated",
      message: `Rule '${rule.name}' (ID: ${ruleId}) was deactivated; its configuration is kept.`,
    };
  }

  async updateCondition(
    input: ConditionUpdateInput,
  ): Promise<EntityUpdate<RuleCondition>> {
    this.requireRule(input.ruleId);
    const candidates = this.conditions.filter((c) => c.ruleId === input.ruleId);
    const target = this.pickTarget(candidates, input.conditionId, "Condition", input.ruleId);

    const parameters = { ...target.parameters, ...definedEntries(input.parameters ?? {}) };
    if (
      parameters.minFrequencyMHz !== undefined &&
      parameters.maxFrequencyMHz !== undefined &&
      parameters.minFrequencyMHz >= parameters.maxFrequencyMHz
    ) {
      throw new ToolBackendError("constraint_violation", BAND_ORDER_MESSAGE);
    }

    const changes: string[] = [];
    if (input.conditionType && input.conditionType !== target.conditionType) {
      target.conditionType = input.conditionType;
      changes.push(`conditionType -> ${input.conditionType}`);
    }
    for (const [key, value] of Object.entries(definedEntries(input.parameters ?? {}))) {
      changes.push(`${key} -> ${String(value)}`);
    }
    target.parameters = parameters;
    if (input.description) {
      target.description = input.description;
      changes.push("description updated");
    }
    target.updatedAt = this.epochSeconds();

    return { ruleId: input.ruleId, entity: structuredClone(target), changes };
  }

  async updateAction(input: ActionUpdateInput): Promise<EntityUpdate<RuleAction>> {
    this.requireRule(input.ruleId);
    const candidates = this.actions.filter((a) => a.ruleId === input.ruleId);
    const target = this.pickTarget(candidates, input.actionId, "Action", input.ruleId);

    const actionType = input.actionType ?? target.actionType;
    const parameters = { ...target.parameters, ...definedEntries(input.parameters ?? {}) };
    if (actionType === "geolocationRequest" && (parameters.sensorIds?.length ?? 0) < 2) {
      throw new ToolBackendError(
        "constraint_violation",
        "geolocationRequest requires at least 2 sensors",
      );
    }

    const changes: string[] = [];
    if (input.actionType && input.actionType !== target.actionType) {
      target.actionType = input.actionType;
      changes.push(`actionType -> ${input.actionType}`);
    }
    for (const [key, value] of Object.entries(definedEntries(input.parameters ?? {}))) {
      changes.push(
        key === "message" ? "message updated" : `${key} -> ${formatValue(value)}`,
      );
    }
    target.parameters = parameters;
    if (input.description) {
      target.description = input.description;
      changes.push("description updated");
    }
    target.updatedAt = this.epochSeconds();

    return { ruleId: input.ruleId, entity: structuredClone(target), changes };
  }

  // ─── helpers ───

  private requireRule(ruleId: string): AutomationRule {
    const rule = this.rules.find((r) => r.id === ruleId);
    if (!rule) {
      throw new ToolBackendError("not_found", `Rule with id '${ruleId}' not found`);
    }
    return rule;
  }

  private pickTarget<T extends { id: string }>(
    candidates: T[],
    id: string | undefined,
    label: "Condition" | "Action",
    ruleId: string,
  ): T {
    if (candidates.length === 0) {
      throw new ToolBackendError(
        "not_found",
        `No ${label.toLowerCase()}s found for rule '${ruleId}'`,
      );
    }
    // id 미지정 시 첫 번째 항목 갱신
    if (!id) return candidates[0];
    const target = candidates.find((c) => c.id === id);
    if (!target) {
      throw new ToolBackendError(
        "not_found",
        `${label} with id '${id}' not found for rule '${ruleId}'`,
      );
    }
    return target;
  }

  private buildRule(fields: RuleFields): AutomationRule {
    if (!hasValidTimeWindow(fields)) {
      throw new ToolBackendError("constraint_violation", TIME_WINDOW_MESSAGE);
    }
    const timestamp = this.now().toISOString();
    const rule: AutomationRule = {
      id: this.generateId(),
      name: fields.name,
      description: fields.description,
      isEnabled: fields.is_enabled,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    if (fields.max_executions !== undefined) {
      rule.maxExecutions = fields.max_executions;
      rule.executionsRemaining = fields.max_executions;
    }
    if (fields.start_time) rule.startTime = fields.start_time;
    if (fields.end_time) rule.endTime = fields.end_time;
    return rule;
  }

  private buildCondition(ruleId: string, fields: ConditionFields): RuleCondition {
    const timestamp = this.epochSeconds();
    return {
      id: this.generateId(),
      ruleId,
      conditionType: fields.condition_type,
      parameters: { ...fields.condition_parameters },
      description: fields.condition_description,
      isSatisfied: false,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
  }

  private buildAction(ruleId: string, fields: ActionFields): RuleAction {
    const timestamp = this.epochSeconds();
    return {
      id: this.generateId(),
      ruleId,
      actionType: fields.action_type,
      parameters: { ...fields.action_parameters },
      description: fields.action_description,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
  }

  private epochSeconds(): number {
    return this.now().getTime() / 1000;
  }
}

/** undefined 값을 가진 키 제거 (부분 업데이트 병합용) */
function definedEntries<T extends object>(patch: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key in patch) {
    if (patch[key] !== undefined) result[key] = patch[key];
  }
  return result;
}

function formatValue(value: unknown): string {
  return Array.isArray(value) ? `[${value.join(", ")}]` : String(value);
}
