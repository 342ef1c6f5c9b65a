import { describe, it, expect } from "vitest";
import { ToolBackendError } from "../../src/mastra/errors";
import { InMemoryRuleBackend, loadSeedRules } from "../../src/mastra/tools/in-memory-backend";

const FIXED_NOW = new Date("2025-06-01T12:00:00.000Z");

function createBackend(ids: string[] = []) {
  let next = 0;
  return new InMemoryRuleBackend({
    seed: loadSeedRules(),
    generateId: () => ids[next++] ?? `id-${next}`,
    now: () => FIXED_NOW,
  });
}

describe("loadSeedRules", () => {
  it("loads three rules with one condition and one action each", () => {
    const seed = loadSeedRules();

    expect(seed.rules.map((rule) => rule.name)).toEqual([
      "5G Monitor",
      "LTE Detector",
      "Energy Threshold Alert",
    ]);
    expect(seed.conditions.map((condition) => condition.ruleId)).toEqual([
      "rule-001",
      "rule-002",
      "rule-003",
    ]);
    expect(seed.actions).toHaveLength(3);
  });
});

describe("InMemoryRuleBackend", () => {
  it("keeps instances isolated from each other", async () => {
    const first = createBackend();
    const second = createBackend();

    await first.deactivateAutomationRule("rule-001");

    expect((await first.getAutomationRule("rule-001")).isEnabled).toBe(false);
    expect((await second.getAutomationRule("rule-001")).isEnabled).toBe(true);
  });

  it("reports unknown rules as not_found", async () => {
    const backend = createBackend();

    await expect(backend.getAutomationRule("rule-999")).rejects.toBeInstanceOf(ToolBackendError);
    await expect(backend.listConditionsForRule("rule-999")).rejects.toMatchObject({
      code: "not_found",
      message: "Rule with id 'rule-999' not found",
    });
  });

  it("resets condition satisfaction when a rule is activated", async () => {
    const backend = createBackend();

    const change = await backend.activateAutomationRule("rule-003");
    const [condition] = await backend.listConditionsForRule("rule-003");

    expect(change).toEqual({
      ruleId: "rule-003",
      ruleName: "Energy Threshold Alert",
      status: "activated",
      message: "Rule 'Energy Threshold Alert' (ID: rule-003) is now monitoring its conditions.",
    });
    expect(condition.isSatisfied).toBe(false);
    expect(condition.satisfiedAt).toBeNull();
    expect((await backend.getAutomationRule("rule-003")).updatedAt).toBe(
      "2025-06-01T12:00:00.000Z",
    );
  });

  it("reports rules that are already in the requested state", async () => {
    const backend = createBackend();

    expect((await backend.activateAutomationRule("rule-001")).status).toBe("already_active");
    const change = await backend.deactivateAutomationRule("rule-003");
    expect(change.status).toBe("already_inactive");
    expect(change.message).toBe(
      "Rule 'Energy Threshold Alert' (ID: rule-003) is already deactivated.",
    );
  });

  it("creates a rule with a condition and an action", async () => {
    const backend = createBackend(["rule-new", "cond-new", "act-new"]);

    const created = await backend.createRuleWithConditionAndAction(
      { name: "Ops Watch", is_enabled: true },
      {
        condition_type: "signalDetection",
        condition_parameters: { minFrequencyMHz: 700, maxFrequencyMHz: 900, signalType: "LTE" },
      },
      {
        action_type: "userNotification",
        action_parameters: { message: "LTE seen" },
      },
    );

    expect(created.rule).toMatchObject({ id: "rule-new", name: "Ops Watch", isEnabled: true });
    expect(created.condition).toMatchObject({
      id: "cond-new",
      ruleId: "rule-new",
      isSatisfied: false,
      parameters: { minFrequencyMHz: 700, maxFrequencyMHz: 900, signalType: "LTE" },
    });
    expect(created.action).toMatchObject({ id: "act-new", ruleId: "rule-new" });
    expect(await backend.listAutomationRules()).toHaveLength(4);
  });

  it("copies max_executions into the remaining count", async () => {
    const backend = createBackend(["rule-limited"]);

    const { rule } = await backend.createAutomationRule({
      name: "Limited",
      is_enabled: false,
      max_executions: 3,
    });

    expect(rule.maxExecutions).toBe(3);
    expect(rule.executionsRemaining).toBe(3);
  });

  it("refuses a time window that ends before it starts", async () => {
    const backend = createBackend();

    await expect(
      backend.createAutomationRule({
        name: "Backwards",
        is_enabled: false,
        start_time: "2025-02-01T00:00:00Z",
        end_time: "2025-01-01T00:00:00Z",
      }),
    ).rejects.toMatchObject({ code: "constraint_violation" });
    expect(await backend.listAutomationRules()).toHaveLength(3);
  });

  it("updates only the given condition fields", async () => {
    const backend = createBackend();

    const update = await backend.updateCondition({
      ruleId: "rule-002",
      parameters: { minFrequencyMHz: 700 },
    });

    expect(update.changes).toEqual(["minFrequencyMHz -> 700"]);
    expect(update.entity.id).toBe("cond-002");
    expect(update.entity.parameters).toEqual({
      minFrequencyMHz: 700,
      maxFrequencyMHz: 2100,
      signalType: "LTE",
    });
  });

  it("re-checks the merged frequency band", async () => {
    const backend = createBackend();

    await expect(
      backend.updateCondition({ ruleId: "rule-002", parameters: { minFrequencyMHz: 2500 } }),
    ).rejects.toMatchObject({
      code: "constraint_violation",
      message: "minFrequencyMHz must be less than maxFrequencyMHz",
    });
    const [condition] = await backend.listConditionsForRule("rule-002");
    expect(condition.parameters.minFrequencyMHz).toBe(1800);
  });

  it("reports a missing condition id for the rule", async () => {
    const backend = createBackend();

    await expect(
      backend.updateCondition({ ruleId: "rule-001", conditionId: "cond-002" }),
    ).rejects.toMatchObject({
      code: "not_found",
      message: "Condition with id 'cond-002' not found for rule 'rule-001'",
    });
  });

  it("describes action changes", async () => {
    const backend = createBackend();

    const update = await backend.updateAction({
      ruleId: "rule-001",
      parameters: { message: "Mid-band 5G activity" },
      description: "night shift alert",
    });

    expect(update.changes).toEqual(["message updated", "description updated"]);
    expect(update.entity.parameters.message).toBe("Mid-band 5G activity");
  });

  it("requires two sensors when switching an action to geolocation", async () => {
    const backend = createBackend();

    await expect(
      backend.updateAction({
        ruleId: "rule-002",
        actionType: "geolocationRequest",
        parameters: { sensorIds: ["sensor-01"] },
      }),
    ).rejects.toMatchObject({ code: "constraint_violation" });
  });

  it("lists sensors in action change descriptions", async () => {
    const backend = createBackend();

    const update = await backend.updateAction({
      ruleId: "rule-003",
      parameters: { sensorIds: ["sensor-04", "sensor-05"] },
    });

    expect(update.changes).toEqual(["sensorIds -> [sensor-04, sensor-05]"]);
  });
});
