import { createStep, createWorkflow } from "@mastra/core/workflows";
import type { SubWorkflowDefinition, WorkflowDeps } from "./definitions";
import { DEGRADED_RESPONSE } from "./responses";
import {
  chatInputSchema,
  chatOutputSchema,
  handlerResultSchema,
  type HandlerResult,
} from "./schemas";
import { chatStateSchema, type WorkflowKind } from "./state";
import { createClassifyIntentStep } from "./steps/classify-intent";
import { errorResponseStep } from "./steps/error-response";
import { createGenericResponseStep } from "./steps/generic-response";
import { createInitialAnalysisStep } from "./steps/initial-analysis";
import { createSubWorkflow } from "./sub-workflow";

/** 요청 종료 로그를 남기고 분기 결과에 분류 라벨을 붙입니다 */
function createFinalizeStep({ logger }: WorkflowDeps) {
  return createStep({
    id: "finalize-response",
    inputSchema: handlerResultSchema,
    outputSchema: chatOutputSchema,
    stateSchema: chatStateSchema,
    execute: async ({ inputData, state }) => {
      const intent = state.intent?.intent ?? null;
      logger.info("Request finished", { intent, status: inputData.status });
      return { ...inputData, intent };
    },
  });
}

/**
 * Chat Workflow
 *
 * initial-analysis → classify-intent → .branch(의도 라벨) → finalize-response
 *
 * - CREATE / UPDATE / INFO: sub-workflow (plan/execute 루프)
 * - GENERIC: 도구 없이 단일 응답
 * - UNKNOWN: 고정 에러 응답 (분류 단계 Reasoner 장애 시 degraded 응답)
 *
 * 규칙 저장소는 run.start()의 requestContext로, 대화 기록은 workflow state로 전달됩니다.
 * Sub-workflow끼리는 서로 호출하지 않습니다.
 */
export function createChatWorkflow(
  deps: WorkflowDeps,
  definitions: Record<WorkflowKind, SubWorkflowDefinition>,
) {
  const createWorkflowStep = createSubWorkflow(definitions.CREATE, deps);
  const updateWorkflowStep = createSubWorkflow(definitions.UPDATE, deps);
  const infoWorkflowStep = createSubWorkflow(definitions.INFO, deps);

  return createWorkflow({
    id: "chat-workflow",
    inputSchema: chatInputSchema,
    outputSchema: chatOutputSchema,
    stateSchema: chatStateSchema,
  })
    .then(createInitialAnalysisStep(deps))
    .then(createClassifyIntentStep(deps))
    .branch([
      [async ({ inputData }) => inputData.intent === "CREATE", createWorkflowStep],
      [async ({ inputData }) => inputData.intent === "UPDATE", updateWorkflowStep],
      [async ({ inputData }) => inputData.intent === "INFO", infoWorkflowStep],
      [async ({ inputData }) => inputData.intent === "GENERIC", createGenericResponseStep(deps)],
      [async ({ inputData }) => inputData.intent === "UNKNOWN", errorResponseStep],
    ])
    .map(async ({ inputData }): Promise<HandlerResult> => {
      // .branch() 출력: 실행된 분기의 step-id를 키로 결과 반환
      const result =
        inputData["create-workflow"] ??
        inputData["update-workflow"] ??
        inputData["info-workflow"] ??
        inputData["generic-response"] ??
        inputData["error-response"];

      return result ?? { status: "failed", response: DEGRADED_RESPONSE };
    })
    .then(createFinalizeStep(deps))
    .commit();
}

export type ChatWorkflow = ReturnType<typeof createChatWorkflow>;
