import { createStep } from "@mastra/core/workflows";
import { ToolBackendError, describeError, type ToolFailureCode } from "../../errors";
import { formatValidationError } from "../../tools/registry";
import type { SubWorkflowDefinition, WorkflowDeps } from "../definitions";
import { loopSignalSchema } from "../schemas";
import { WorkflowStateStore, chatStateSchema, requireRun } from "../state";
import { stepPrefix } from "./planner";

function toToolFailure(error: unknown): { code: ToolFailureCode; message: string } {
  if (error instanceof ToolBackendError) {
    return { code: error.code, message: error.message };
  }
  return { code: "backend_unavailable", message: describeError(error) };
}

/**
 * EXECUTING
 *
 * 플래너가 고른 도구 하나를 검증 후 실행하고 항상 PLANNING으로 돌아갑니다.
 * 파라미터 검증 실패와 도구 실패는 validationErrors에 기록될 뿐 루프를 끝내지 않습니다.
 * 규칙 저장소는 requestContext로 도구에 전달됩니다.
 */
export function createExecuteStep(
  definition: SubWorkflowDefinition,
  { logger, now }: WorkflowDeps,
) {
  const kind = definition.kind;
  return createStep({
    id: `${stepPrefix(definition)}-execute`,
    inputSchema: loopSignalSchema,
    outputSchema: loopSignalSchema,
    stateSchema: chatStateSchema,
    execute: async ({ inputData, state, setState, requestContext, abortSignal }) => {
      if (inputData.phase !== "execute") return inputData;

      const store = new WorkflowStateStore(requireRun(state), now);
      const decision = store.consumeDecision();
      const save = async () => {
        await setState({ ...state, run: store.snapshot() });
        return { phase: "plan" as const };
      };
      if (decision?.nextAction !== "call_tool") return save();

      const validation = await definition.registry.validate(decision.tool, decision.parameters);
      if (!validation.ok) {
        const message = formatValidationError(validation.error);
        logger.warn("Tool call rejected, returning to planner", {
          kind,
          tool: decision.tool,
          error: message,
        });
        store.addValidationError(message);
        return save();
      }

      const { call } = validation;
      const repeated = store.hasCalled(call.name, call.parameters);
      if (repeated) {
        logger.warn("Repeated identical tool call", { kind, tool: call.name });
      }

      try {
        const result = await call.run({ query: store.query, requestContext, abortSignal });
        store.recordToolCall({
          tool: call.name,
          parameters: call.parameters,
          outcome: { ok: true, data: result.data },
          summary: result.summary,
          repeated,
        });
        store.mergeEntities(result.entities);
        logger.info("Tool succeeded", { kind, tool: call.name, summary: result.summary });
      } catch (error) {
        if (abortSignal.aborted) throw error;
        const failure = toToolFailure(error);
        const summary = `${call.name} failed (${failure.code}): ${failure.message}`;
        store.recordToolCall({
          tool: call.name,
          parameters: call.parameters,
          outcome: { ok: false, error: failure },
          summary,
          repeated,
        });
        store.addValidationError(summary);
        logger.warn("Tool failed", { kind, tool: call.name, code: failure.code });
      }

      return save();
    },
  });
}
