import { createStep } from "@mastra/core/workflows";
import { emptyInitialAnalysis, initialAnalysisSchema } from "../../agents/reasoner";
import { ReasonerOutputError, ReasonerUnavailableError } from "../../errors";
import type { WorkflowDeps } from "../definitions";
import { chatInputSchema } from "../schemas";
import { chatStateSchema, turnMessage } from "../state";

/**
 * Step 1: 초기 분석
 *
 * 어떤 지식 텍스트가 분류에 필요한지 판단합니다.
 * 분석은 보조 단계이므로 Reasoner 에러가 나도 빈 분석으로 계속 진행합니다.
 * 요청 원문과 대화 기록은 여기서 state에 올라갑니다.
 */
export function createInitialAnalysisStep({ reasoner, logger, now }: WorkflowDeps) {
  return createStep({
    id: "initial-analysis",
    inputSchema: chatInputSchema,
    outputSchema: initialAnalysisSchema,
    stateSchema: chatStateSchema,
    execute: async ({ inputData, state, setState, abortSignal }) => {
      const query = inputData.message;
      const messages = [...state.messages, turnMessage("user", query, now)];

      let analysis = emptyInitialAnalysis();
      try {
        analysis = await reasoner.infer("initial_analysis", { query }, { signal: abortSignal });
        logger.debug("Initial analysis complete", {
          schema: analysis.requiresSchemaKnowledge,
          rf: analysis.requiresRfKnowledge,
          database: analysis.requiresDatabaseQueries,
        });
      } catch (error) {
        if (abortSignal.aborted) throw error;
        if (
          !(error instanceof ReasonerOutputError) &&
          !(error instanceof ReasonerUnavailableError)
        ) {
          throw error;
        }
        logger.warn("Initial analysis failed, continuing without it", {
          error: error.message,
        });
        messages.push(turnMessage("system", `Initial analysis unavailable: ${error.message}`, now));
      }
      messages.push(turnMessage("assistant", `analysis: ${JSON.stringify(analysis)}`, now));

      await setState({ ...state, query, messages, analysis });
      return analysis;
    },
  });
}
