import { z } from "zod";
import type { ToolCallRecord, TurnMessage, WorkflowKind } from "../workflows/state";
import type { EntityPatch } from "../tools/registry";

/**
 * Reasoner: LLM 추론 계약
 *
 * 역할(role)마다 입력/출력 타입이 고정됩니다. 구현체는 다음 두 에러만 throw합니다.
 * - ReasonerOutputError: 구조화 출력이 스키마와 맞지 않음 (호출자가 안전한 기본값 사용)
 * - ReasonerUnavailableError: 모델 호출 자체 실패 (요청 단위로 치명적)
 */

export const INTENT_LABELS = ["CREATE", "UPDATE", "INFO", "GENERIC", "UNKNOWN"] as const;
export type IntentLabel = (typeof INTENT_LABELS)[number];

// ─── Initial analysis ───

export const initialAnalysisSchema = z.object({
  requiresSchemaKnowledge: z
    .boolean()
    .describe("The request concerns rule/condition/action structure or fields"),
  requiresRfKnowledge: z
    .boolean()
    .describe("The request concerns frequencies, signal types or RF concepts"),
  requiresDatabaseQueries: z
    .boolean()
    .describe("Answering needs stored rules to be read or changed"),
  detectedEntities: z.object({
    frequencyRanges: z.array(z.string()),
    signalTypes: z.array(z.string()),
    actionTypes: z.array(z.string()),
    conditionTypes: z.array(z.string()),
    tableReferences: z.array(z.string()),
  }),
});

export type InitialAnalysis = z.infer<typeof initialAnalysisSchema>;

export function emptyInitialAnalysis(): InitialAnalysis {
  return {
    requiresSchemaKnowledge: false,
    requiresRfKnowledge: false,
    requiresDatabaseQueries: false,
    detectedEntities: {
      frequencyRanges: [],
      signalTypes: [],
      actionTypes: [],
      conditionTypes: [],
      tableReferences: [],
    },
  };
}

// ─── Classification ───

/**
 * Classifier structured output
 * intent는 자유 문자열로 받고 normalizeIntentRecord()에서 라벨로 좁힙니다.
 */
export const classificationOutputSchema = z.object({
  intent: z.string().describe("One of CREATE, UPDATE, INFO, GENERIC, UNKNOWN"),
  confidence: z.number().describe("0.0 to 1.0"),
  reasoning: z.string(),
  keyIndicators: z.array(z.string()).default([]),
  entities: z.record(z.string(), z.unknown()).default({}),
});

export type ClassificationOutput = z.infer<typeof classificationOutputSchema>;

/** 정규화된 분류 결과. 라우터 상태에 그대로 저장됩니다 */
export const intentRecordSchema = z.object({
  intent: z.enum(INTENT_LABELS),
  confidence: z.number().min(0).max(1),
  reasoning: z.string(),
  keyIndicators: z.array(z.string()),
  entities: z.record(z.string(), z.unknown()),
});

export type IntentRecord = z.infer<typeof intentRecordSchema>;

function isIntentLabel(value: string): value is IntentLabel {
  return INTENT_LABELS.some((label) => label === value);
}

/** 알 수 없는 라벨은 UNKNOWN, confidence는 [0, 1]로 고정 */
export function normalizeIntentRecord(output: ClassificationOutput): IntentRecord {
  const label = output.intent.trim().toUpperCase();
  const confidence = Number.isFinite(output.confidence) ? output.confidence : 0;
  return {
    intent: isIntentLabel(label) ? label : "UNKNOWN",
    confidence: Math.min(1, Math.max(0, confidence)),
    reasoning: output.reasoning,
    keyIndicators: output.keyIndicators,
    entities: output.entities,
  };
}

// ─── Planning ───

export const plannerOutputSchema = z.object({
  next_action: z.enum(["call_tool", "respond"]),
  tool_name: z.string().optional().describe("Required when next_action is call_tool"),
  parameters: z.record(z.string(), z.unknown()).optional(),
  reasoning: z.string(),
});

export type PlannerOutput = z.infer<typeof plannerOutputSchema>;

export const plannerDecisionSchema = z.discriminatedUnion("nextAction", [
  z.object({
    nextAction: z.literal("call_tool"),
    tool: z.string(),
    parameters: z.record(z.string(), z.unknown()),
    reasoning: z.string(),
  }),
  z.object({
    nextAction: z.literal("respond"),
    reasoning: z.string(),
  }),
]);

export type PlannerDecision = z.infer<typeof plannerDecisionSchema>;

/** call_tool인데 tool_name이 없으면 null (출력 불량) */
export function toPlannerDecision(output: PlannerOutput): PlannerDecision | null {
  if (output.next_action === "respond") {
    return { nextAction: "respond", reasoning: output.reasoning };
  }
  const tool = output.tool_name?.trim();
  if (!tool) return null;
  return {
    nextAction: "call_tool",
    tool,
    parameters: output.parameters ?? {},
    reasoning: output.reasoning,
  };
}

// ─── Responses ───

export const responseOutputSchema = z.object({
  response: z.string(),
});

// ─── Role map ───

export interface ReasonerInputs {
  initial_analysis: { query: string };
  classify: { query: string; analysis: InitialAnalysis; knowledge: string };
  plan: {
    kind: WorkflowKind;
    query: string;
    messages: TurnMessage[];
    catalog: string;
    toolsCalled: ToolCallRecord[];
    entities: EntityPatch;
    validationErrors: string[];
    iteration: number;
    maxIterations: number;
  };
  respond_generic: { query: string; knowledge: string };
  respond_summary: {
    kind: WorkflowKind;
    query: string;
    toolsCalled: ToolCallRecord[];
    entities: EntityPatch;
    validationErrors: string[];
    completed: boolean;
  };
}

export interface ReasonerOutputs {
  initial_analysis: InitialAnalysis;
  classify: IntentRecord;
  plan: PlannerDecision;
  respond_generic: string;
  respond_summary: string;
}

export type ReasonerRole = keyof ReasonerInputs;

export interface InferOptions {
  signal?: AbortSignal;
}

export interface Reasoner {
  infer<R extends ReasonerRole>(
    role: R,
    input: ReasonerInputs[R],
    options?: InferOptions,
  ): Promise<ReasonerOutputs[R]>;
}
