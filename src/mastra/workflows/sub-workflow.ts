import { createWorkflow } from "@mastra/core/workflows";
import { intentRecordSchema } from "../agents/reasoner";
import type { SubWorkflowDefinition, WorkflowDeps } from "./definitions";
import { handlerResultSchema, loopSignalSchema } from "./schemas";
import { chatStateSchema, type ChatState } from "./state";
import { createExecuteStep } from "./steps/executor";
import { createPlanStep, createPrepareStep, stepPrefix } from "./steps/planner";
import { createRespondStep, createSettleStep } from "./steps/responder";

/**
 * 루프 종료 판단
 *
 * 완료 가드가 판정을 내렸거나 iteration 예산을 다 쓰면 더 계획하지 않습니다.
 * 가드를 먼저 확인하므로 마지막 iteration에서 성공한 변경도 완료로 처리됩니다.
 */
function loopSettled(definition: SubWorkflowDefinition, state: ChatState): boolean {
  const run = state.run;
  if (!run) return true;
  if (definition.completionGuard?.(run)) return true;
  return run.iterationCount >= run.maxIterations;
}

/**
 * Sub-workflow (CREATE / UPDATE / INFO)
 *
 * prepare → dountil(plan → execute) → settle → respond
 *
 * plan/execute 한 쌍이 iteration 하나입니다.
 * 취소는 Mastra run의 abortSignal이 step마다 전달되어 처리되고,
 * 도구 실패와 파라미터 검증 실패는 state에 데이터로 남습니다.
 */
export function createSubWorkflow(definition: SubWorkflowDefinition, deps: WorkflowDeps) {
  const prefix = stepPrefix(definition);

  const planExecuteWorkflow = createWorkflow({
    id: `${prefix}-plan-execute`,
    inputSchema: loopSignalSchema,
    outputSchema: loopSignalSchema,
    stateSchema: chatStateSchema,
  })
    .then(createPlanStep(definition, deps))
    .then(createExecuteStep(definition, deps))
    .commit();

  return createWorkflow({
    id: `${prefix}-workflow`,
    inputSchema: intentRecordSchema,
    outputSchema: handlerResultSchema,
    stateSchema: chatStateSchema,
  })
    .then(createPrepareStep(definition, deps))
    .dountil(
      planExecuteWorkflow,
      async ({ inputData, state }) =>
        inputData.phase !== "plan" || loopSettled(definition, state),
    )
    .then(createSettleStep(definition, deps))
    .then(createRespondStep(definition, deps))
    .commit();
}
