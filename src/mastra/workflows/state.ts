import { z } from "zod";
import {
  initialAnalysisSchema,
  intentRecordSchema,
  plannerDecisionSchema,
  type IntentRecord,
  type PlannerDecision,
} from "../agents/reasoner";
import { TOOL_FAILURE_CODES } from "../errors";
import { entityPatchSchema, type EntityPatch } from "../tools/registry";

/**
 * Workflow 상태 스키마
 *
 * chatWorkflow와 모든 sub-workflow가 같은 stateSchema를 공유합니다.
 * Mastra는 setState() 값을 최상위 키 단위로 병합하므로 step은 항상 전체 상태를 씁니다.
 *
 * sub-workflow 상태(run)는 필드마다 병합 규칙이 다릅니다.
 * - messages / toolsCalled / validationErrors: append-only
 * - entities: 역할(role)별 덮어쓰기
 * - decision: executor가 한 번 소비하면 null
 * - finalResponse: write-once
 * - iterationCount: 플래너 호출마다 +1, maxIterations를 넘지 않음
 */

export const WORKFLOW_KINDS = ["CREATE", "UPDATE", "INFO"] as const;
export type WorkflowKind = (typeof WORKFLOW_KINDS)[number];

export const turnMessageSchema = z.object({
  role: z.enum(["user", "assistant", "system"]),
  content: z.string(),
  at: z.string(),
});

export type TurnMessage = z.infer<typeof turnMessageSchema>;

/** 도구 실행 결과 (tools_called 기록용) */
export const toolOutcomeSchema = z.discriminatedUnion("ok", [
  z.object({ ok: z.literal(true), data: z.unknown() }),
  z.object({
    ok: z.literal(false),
    error: z.object({ code: z.enum(TOOL_FAILURE_CODES), message: z.string() }),
  }),
]);

export const toolCallRecordSchema = z.object({
  tool: z.string(),
  parameters: z.record(z.string(), z.unknown()),
  outcome: toolOutcomeSchema,
  summary: z.string(),
  /** 같은 도구/같은 파라미터의 반복 호출 */
  repeated: z.boolean(),
  at: z.string(),
});

export type ToolCallRecord = z.infer<typeof toolCallRecordSchema>;

export const subWorkflowStateSchema = z.object({
  query: z.string(),
  kind: z.enum(WORKFLOW_KINDS),
  originalIntent: intentRecordSchema,
  maxIterations: z.number().int().positive(),
  messages: z.array(turnMessageSchema),
  iterationCount: z.number().int().nonnegative(),
  toolsCalled: z.array(toolCallRecordSchema),
  entities: entityPatchSchema,
  decision: plannerDecisionSchema.nullable(),
  validationErrors: z.array(z.string()),
  hasCompleted: z.boolean(),
  finalResponse: z.string().nullable(),
});

export type WorkflowState = z.infer<typeof subWorkflowStateSchema>;

/** 요청 단위 실패 (Reasoner 사용 불가 등) */
export const requestFailureSchema = z.object({
  code: z.string(),
  message: z.string(),
});

export const chatStateSchema = z.object({
  query: z.string(),
  /** 라우터 단계의 대화 기록 (분석/분류 결과) */
  messages: z.array(turnMessageSchema),
  analysis: initialAnalysisSchema.nullable(),
  intent: intentRecordSchema.nullable(),
  run: subWorkflowStateSchema.nullable(),
  failure: requestFailureSchema.nullable(),
});

export type ChatState = z.infer<typeof chatStateSchema>;

export function createChatState(): ChatState {
  return {
    query: "",
    messages: [],
    analysis: null,
    intent: null,
    run: null,
    failure: null,
  };
}

export function turnMessage(
  role: TurnMessage["role"],
  content: string,
  now: () => Date = () => new Date(),
): TurnMessage {
  return { role, content, at: now().toISOString() };
}

export interface WorkflowStateInit {
  query: string;
  kind: WorkflowKind;
  originalIntent: IntentRecord;
  maxIterations: number;
  messages?: TurnMessage[];
}

export class StateInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StateInvariantError";
  }
}

/** sub-workflow step에서 호출. prepare step 이전이면 invariant 위반 */
export function requireRun(state: ChatState): WorkflowState {
  if (!state.run) {
    throw new StateInvariantError("sub-workflow state was not prepared");
  }
  return state.run;
}

/**
 * WorkflowState를 규칙에 맞게만 바꾸는 래퍼
 *
 * step마다 state.run에서 복원하고, 끝나면 snapshot()을 setState()로 돌려줍니다.
 */
export class WorkflowStateStore {
  private readonly state: WorkflowState;
  private readonly now: () => Date;

  constructor(state: WorkflowState, now: () => Date = () => new Date()) {
    if (!Number.isInteger(state.maxIterations) || state.maxIterations < 1) {
      throw new StateInvariantError(
        `maxIterations must be a positive integer, got ${state.maxIterations}`,
      );
    }
    this.state = structuredClone(state);
    this.now = now;
  }

  static create(init: WorkflowStateInit, now?: () => Date): WorkflowStateStore {
    return new WorkflowStateStore(
      {
        query: init.query,
        kind: init.kind,
        originalIntent: init.originalIntent,
        maxIterations: init.maxIterations,
        messages: init.messages ?? [],
        iterationCount: 0,
        toolsCalled: [],
        entities: {},
        decision: null,
        validationErrors: [],
        hasCompleted: true,
        finalResponse: null,
      },
      now,
    );
  }

  get query(): string {
    return this.state.query;
  }

  get kind(): WorkflowKind {
    return this.state.kind;
  }

  get iterationCount(): number {
    return this.state.iterationCount;
  }

  get maxIterations(): number {
    return this.state.maxIterations;
  }

  get budgetExhausted(): boolean {
    return this.state.iterationCount >= this.state.maxIterations;
  }

  get hasCompleted(): boolean {
    return this.state.hasCompleted;
  }

  get finalResponse(): string | null {
    return this.state.finalResponse;
  }

  appendMessage(role: TurnMessage["role"], content: string): void {
    this.state.messages.push(turnMessage(role, content, this.now));
  }

  /** 플래너 호출 직전에 호출. 새 iteration 번호를 반환 */
  beginIteration(): number {
    if (this.budgetExhausted) {
      throw new StateInvariantError(
        `iteration budget of ${this.state.maxIterations} already spent`,
      );
    }
    this.state.iterationCount += 1;
    return this.state.iterationCount;
  }

  setDecision(decision: PlannerDecision): void {
    this.state.decision = structuredClone(decision);
  }

  consumeDecision(): PlannerDecision | null {
    const decision = this.state.decision;
    this.state.decision = null;
    return decision;
  }

  /** 같은 도구를 같은 파라미터로 이미 호출했는지 */
  hasCalled(tool: string, parameters: Record<string, unknown>): boolean {
    const key = canonicalize(parameters);
    return this.state.toolsCalled.some(
      (record) => record.tool === tool && canonicalize(record.parameters) === key,
    );
  }

  recordToolCall(record: Omit<ToolCallRecord, "at">): void {
    this.state.toolsCalled.push({ ...structuredClone(record), at: this.now().toISOString() });
  }

  /** 역할별 덮어쓰기. patch에 없는 역할은 유지 */
  mergeEntities(patch: EntityPatch): void {
    for (const [role, value] of Object.entries(patch)) {
      if (value === undefined) continue;
      this.state.entities = { ...this.state.entities, [role]: structuredClone(value) };
    }
  }

  addValidationError(message: string): void {
    this.state.validationErrors.push(message);
  }

  markIncomplete(): void {
    this.state.hasCompleted = false;
  }

  setFinalResponse(text: string): void {
    if (this.state.finalResponse !== null) {
      throw new StateInvariantError("finalResponse is write-once");
    }
    this.state.finalResponse = text;
  }

  /** 깊은 복사본. 호출자가 수정해도 내부 상태에 영향 없음 */
  snapshot(): WorkflowState {
    return structuredClone(this.state);
  }
}

/** 키 순서와 무관한 파라미터 비교 키 */
export function canonicalize(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([key, inner]) => [key, sortKeys(inner)]),
    );
  }
  return value;
}
