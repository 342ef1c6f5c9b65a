import { createStep } from "@mastra/core/workflows";
import { intentRecordSchema } from "../../agents/reasoner";
import { ReasonerOutputError, ReasonerUnavailableError } from "../../errors";
import type { WorkflowDeps } from "../definitions";
import { DEGRADED_RESPONSE, markIncomplete } from "../responses";
import { handlerResultSchema } from "../schemas";
import { chatStateSchema } from "../state";

/**
 * GENERIC 분기: 도구 없이 지식 텍스트만으로 한 번 응답
 */
export function createGenericResponseStep({ reasoner, knowledge, logger }: WorkflowDeps) {
  return createStep({
    id: "generic-response",
    inputSchema: intentRecordSchema,
    outputSchema: handlerResultSchema,
    stateSchema: chatStateSchema,
    execute: async ({ state, setState, abortSignal }) => {
      try {
        const text = await reasoner.infer(
          "respond_generic",
          { query: state.query, knowledge: `${knowledge.schema}\n\n${knowledge.rfSpectrum}` },
          { signal: abortSignal },
        );
        if (text.trim()) return { status: "completed" as const, response: text.trim() };
        logger.warn("Generic response was empty");
      } catch (error) {
        if (abortSignal.aborted) throw error;
        if (error instanceof ReasonerUnavailableError) {
          logger.error("Reasoner unavailable during generic response", {
            error: error.message,
          });
          await setState({ ...state, failure: { code: error.code, message: error.message } });
          return { status: "failed" as const, response: DEGRADED_RESPONSE, errorCode: error.code };
        }
        if (!(error instanceof ReasonerOutputError)) throw error;
        logger.warn("Generic response output unusable", { error: error.message });
      }
      return {
        status: "incomplete" as const,
        response: markIncomplete("I could not put together an answer to that question."),
      };
    },
  });
}
