import { createStep } from "@mastra/core/workflows";
import {
  initialAnalysisSchema,
  intentRecordSchema,
  normalizeIntentRecord,
  type InitialAnalysis,
  type IntentRecord,
} from "../../agents/reasoner";
import { ReasonerOutputError, ReasonerUnavailableError } from "../../errors";
import type { KnowledgeBase } from "../../knowledge";
import type { WorkflowDeps } from "../definitions";
import { chatStateSchema, turnMessage } from "../state";

/**
 * 분석 플래그에 따라 분류기에 줄 지식 텍스트를 고릅니다.
 * 규칙 구조나 DB 조회가 필요하면 스키마, RF 개념이 필요하면 RF 문서.
 */
export function selectKnowledge(analysis: InitialAnalysis, knowledge: KnowledgeBase): string {
  const sections: string[] = [];
  if (analysis.requiresSchemaKnowledge || analysis.requiresDatabaseQueries) {
    sections.push(knowledge.schema);
  }
  if (analysis.requiresRfKnowledge) {
    sections.push(knowledge.rfSpectrum);
  }
  return sections.join("\n\n");
}

function unknownIntent(reasoning: string): IntentRecord {
  return { intent: "UNKNOWN", confidence: 0, reasoning, keyIndicators: [], entities: {} };
}

/**
 * Step 2: 의도 분류
 *
 * 출력이 깨지면 UNKNOWN으로 처리합니다 (ERROR 응답 경로).
 * Reasoner를 쓸 수 없으면 state.failure를 남기고 UNKNOWN 분기로 보냅니다.
 * 이 경우 state.intent는 null로 남습니다.
 */
export function createClassifyIntentStep({ reasoner, knowledge, logger, now }: WorkflowDeps) {
  return createStep({
    id: "classify-intent",
    inputSchema: initialAnalysisSchema,
    outputSchema: intentRecordSchema,
    stateSchema: chatStateSchema,
    execute: async ({ inputData, state, setState, abortSignal }) => {
      let intent: IntentRecord;
      try {
        const raw = await reasoner.infer(
          "classify",
          {
            query: state.query,
            analysis: inputData,
            knowledge: selectKnowledge(inputData, knowledge),
          },
          { signal: abortSignal },
        );
        // Reasoner 구현과 무관하게 라벨/confidence 범위를 보장
        intent = normalizeIntentRecord(raw);
      } catch (error) {
        if (abortSignal.aborted) throw error;
        if (error instanceof ReasonerUnavailableError) {
          logger.error("Reasoner unavailable during classification", { error: error.message });
          await setState({
            ...state,
            failure: { code: error.code, message: error.message },
          });
          return unknownIntent(`Classification failed: ${error.message}`);
        }
        if (!(error instanceof ReasonerOutputError)) throw error;
        logger.warn("Classification output unusable, treating as UNKNOWN", {
          error: error.message,
        });
        intent = unknownIntent(`Classification failed: ${error.message}`);
      }

      logger.info("Intent classified", {
        intent: intent.intent,
        confidence: intent.confidence,
      });
      await setState({
        ...state,
        intent,
        messages: [
          ...state.messages,
          turnMessage(
            "assistant",
            `intent: ${intent.intent} (confidence ${intent.confidence}) ${intent.reasoning}`,
            now,
          ),
        ],
      });
      return intent;
    },
  });
}
