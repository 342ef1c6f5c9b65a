import { createStep } from "@mastra/core/workflows";
import { ReasonerOutputError, ReasonerUnavailableError } from "../../errors";
import type { SubWorkflowDefinition, WorkflowDeps } from "../definitions";
import { DEGRADED_RESPONSE, markIncomplete } from "../responses";
import { handlerResultSchema, loopSignalSchema } from "../schemas";
import { WorkflowStateStore, chatStateSchema, requireRun, type WorkflowState } from "../state";
import { stepPrefix } from "./planner";

/** 요약 생성 실패 시 도구 기록만으로 만든 응답 */
function fallbackSummary(state: WorkflowState): string {
  if (state.toolsCalled.length === 0) {
    return "No action could be taken for this request.";
  }
  return [
    "Here is what was done:",
    ...state.toolsCalled.map((record) => `- ${record.summary}`),
  ].join("\n");
}

/**
 * 루프가 plan 단계에서 멈췄을 때 그 이유를 기록합니다.
 * 완료 가드를 먼저 보고, 가드가 침묵하면 iteration 예산 소진입니다.
 */
export function createSettleStep(
  definition: SubWorkflowDefinition,
  { logger, now }: WorkflowDeps,
) {
  const kind = definition.kind;
  return createStep({
    id: `${stepPrefix(definition)}-settle`,
    inputSchema: loopSignalSchema,
    outputSchema: loopSignalSchema,
    stateSchema: chatStateSchema,
    execute: async ({ inputData, state, setState }) => {
      if (inputData.phase !== "plan") return inputData;

      const store = new WorkflowStateStore(requireRun(state), now);
      const verdict = definition.completionGuard?.(store.snapshot());
      if (verdict) {
        logger.info("Completion guard fired", { kind, reason: verdict.reason });
        if (!verdict.completed) store.markIncomplete();
        store.appendMessage("system", verdict.reason);
      } else {
        logger.warn("Iteration budget exhausted, forcing response", {
          kind,
          iteration: store.iterationCount,
        });
        store.markIncomplete();
      }

      await setState({ ...state, run: store.snapshot() });
      return { phase: "respond" as const };
    },
  });
}

/**
 * RESPONDING
 *
 * 도구 기록을 요약해 최종 응답을 한 번만 씁니다.
 * 요약 출력이 비거나 깨지면 도구 요약 목록으로 대체합니다.
 */
export function createRespondStep(
  definition: SubWorkflowDefinition,
  { reasoner, logger, now }: WorkflowDeps,
) {
  const kind = definition.kind;
  return createStep({
    id: `${stepPrefix(definition)}-respond`,
    inputSchema: loopSignalSchema,
    outputSchema: handlerResultSchema,
    stateSchema: chatStateSchema,
    execute: async ({ inputData, state, setState, abortSignal }) => {
      if (inputData.phase === "failed") {
        return {
          status: "failed" as const,
          response: DEGRADED_RESPONSE,
          errorCode: state.failure?.code ?? "reasoner_unavailable",
        };
      }

      const store = new WorkflowStateStore(requireRun(state), now);
      store.consumeDecision();
      const snapshot = store.snapshot();

      let text = "";
      try {
        text = await reasoner.infer(
          "respond_summary",
          {
            kind,
            query: snapshot.query,
            toolsCalled: snapshot.toolsCalled,
            entities: snapshot.entities,
            validationErrors: snapshot.validationErrors,
            completed: snapshot.hasCompleted,
          },
          { signal: abortSignal },
        );
      } catch (error) {
        if (abortSignal.aborted) throw error;
        if (error instanceof ReasonerUnavailableError) {
          logger.error("Reasoner unavailable, aborting sub-workflow", {
            kind,
            phase: "respond",
            error: error.message,
          });
          await setState({
            ...state,
            run: store.snapshot(),
            failure: { code: error.code, message: error.message },
          });
          return { status: "failed" as const, response: DEGRADED_RESPONSE, errorCode: error.code };
        }
        if (!(error instanceof ReasonerOutputError)) throw error;
        logger.warn("Summary output unusable, using fallback text", {
          kind,
          error: error.message,
        });
      }

      let response = text.trim() || fallbackSummary(snapshot);
      if (!snapshot.hasCompleted) {
        logger.warn("Sub-workflow ended incomplete", {
          kind,
          iteration: snapshot.iterationCount,
        });
        response = markIncomplete(response);
      }
      store.setFinalResponse(response);
      store.appendMessage("assistant", response);

      await setState({ ...state, run: store.snapshot() });
      return {
        status: snapshot.hasCompleted ? ("completed" as const) : ("incomplete" as const),
        response,
      };
    },
  });
}
