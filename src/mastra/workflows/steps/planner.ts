import { createStep } from "@mastra/core/workflows";
import { intentRecordSchema, type PlannerDecision } from "../../agents/reasoner";
import { ReasonerOutputError, ReasonerUnavailableError } from "../../errors";
import type { SubWorkflowDefinition, WorkflowDeps } from "../definitions";
import { loopSignalSchema, type LoopSignal } from "../schemas";
import { WorkflowStateStore, chatStateSchema, requireRun } from "../state";

export function stepPrefix(definition: SubWorkflowDefinition): string {
  return definition.kind.toLowerCase();
}

/** sub-workflow 진입: 분류 결과와 라우터 대화 기록으로 state.run 초기화 */
export function createPrepareStep(
  definition: SubWorkflowDefinition,
  { logger, now }: WorkflowDeps,
) {
  return createStep({
    id: `${stepPrefix(definition)}-prepare`,
    inputSchema: intentRecordSchema,
    outputSchema: loopSignalSchema,
    stateSchema: chatStateSchema,
    execute: async ({ inputData, state, setState }) => {
      const store = WorkflowStateStore.create(
        {
          query: state.query,
          kind: definition.kind,
          originalIntent: inputData,
          maxIterations: definition.maxIterations,
          messages: state.messages,
        },
        now,
      );
      logger.debug("Sub-workflow started", {
        kind: definition.kind,
        maxIterations: definition.maxIterations,
      });
      await setState({ ...state, run: store.snapshot() });
      return { phase: "plan" as const };
    },
  });
}

function describeDecision(decision: PlannerDecision): string {
  if (decision.nextAction === "respond") return `respond: ${decision.reasoning}`;
  return `call ${decision.tool} ${JSON.stringify(decision.parameters)}: ${decision.reasoning}`;
}

/**
 * PLANNING
 *
 * iteration을 하나 쓰고 다음 행동(도구 호출 / 응답)을 정합니다.
 * 플래너 출력이 깨지면 미완료로 표시하고 응답 단계로 보냅니다.
 * Reasoner를 쓸 수 없으면 state.failure를 남기고 failed로 루프를 끝냅니다.
 */
export function createPlanStep(
  definition: SubWorkflowDefinition,
  { reasoner, logger, now }: WorkflowDeps,
) {
  const kind = definition.kind;
  return createStep({
    id: `${stepPrefix(definition)}-plan`,
    inputSchema: loopSignalSchema,
    outputSchema: loopSignalSchema,
    stateSchema: chatStateSchema,
    execute: async ({ inputData, state, setState, abortSignal }) => {
      if (inputData.phase !== "plan") return inputData;

      const store = new WorkflowStateStore(requireRun(state), now);
      const iteration = store.beginIteration();
      const snapshot = store.snapshot();
      logger.debug("Entering PLANNING", { kind, iteration });

      let decision: PlannerDecision;
      try {
        decision = await reasoner.infer(
          "plan",
          {
            kind,
            query: snapshot.query,
            messages: snapshot.messages,
            catalog: definition.registry.renderCatalog(),
            toolsCalled: snapshot.toolsCalled,
            entities: snapshot.entities,
            validationErrors: snapshot.validationErrors,
            iteration,
            maxIterations: snapshot.maxIterations,
          },
          { signal: abortSignal },
        );
      } catch (error) {
        if (abortSignal.aborted) throw error;
        if (error instanceof ReasonerUnavailableError) {
          logger.error("Reasoner unavailable, aborting sub-workflow", {
            kind,
            phase: "plan",
            error: error.message,
          });
          await setState({
            ...state,
            run: store.snapshot(),
            failure: { code: error.code, message: error.message },
          });
          return { phase: "failed" as const };
        }
        if (!(error instanceof ReasonerOutputError)) throw error;
        logger.warn("Planner output unusable, forcing response", {
          kind,
          iteration,
          error: error.message,
        });
        store.markIncomplete();
        store.addValidationError(`Planner output could not be used: ${error.message}`);
        decision = {
          nextAction: "respond",
          reasoning: "Sorry, the next step could not be planned.",
        };
      }

      store.setDecision(decision);
      store.appendMessage("assistant", describeDecision(decision));
      logger.info("Planner decided", {
        kind,
        iteration,
        nextAction: decision.nextAction,
        tool: decision.nextAction === "call_tool" ? decision.tool : undefined,
      });

      await setState({ ...state, run: store.snapshot() });
      const next: LoopSignal["phase"] = decision.nextAction === "call_tool" ? "execute" : "respond";
      return { phase: next };
    },
  });
}
