import { createStep } from "@mastra/core/workflows";
import { intentRecordSchema } from "../../agents/reasoner";
import { DEGRADED_RESPONSE, ERROR_RESPONSE } from "../responses";
import { handlerResultSchema } from "../schemas";
import { chatStateSchema } from "../state";

/**
 * UNKNOWN 분기: Reasoner/도구 호출 없이 고정 응답
 *
 * 분류 단계에서 Reasoner를 쓸 수 없었다면 rejected 대신 degraded 응답.
 */
export const errorResponseStep = createStep({
  id: "error-response",
  inputSchema: intentRecordSchema,
  outputSchema: handlerResultSchema,
  stateSchema: chatStateSchema,
  execute: async ({ state }) => {
    if (state.failure) {
      return {
        status: "failed" as const,
        response: DEGRADED_RESPONSE,
        errorCode: state.failure.code,
      };
    }
    return { status: "rejected" as const, response: ERROR_RESPONSE };
  },
});
