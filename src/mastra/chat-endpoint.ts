import type { Mastra } from "@mastra/core/mastra";
import { describeError } from "./errors";
import type { Logger } from "./logger";
import type { ToolBackend } from "./tools/backend";
import { createRuleRequestContext } from "./tools/registry";
import { cancelRunOnAbort } from "./workflows/intent-router";
import { chatInputSchema, chatOutputSchema, type ChatOutput } from "./workflows/schemas";
import { createChatState } from "./workflows/state";

export type ChatReply =
  | { code: 200; body: ChatOutput }
  | { code: 400 | 500; body: { status: "error"; error: string } }
  | { code: 504; body: { status: "cancelled" } };

export interface ChatRequestDeps {
  backend: ToolBackend;
  logger: Logger;
  timeoutMs?: number;
  /** 클라이언트 연결 종료 등 외부 취소 */
  signal?: AbortSignal;
}

function requestSignal({ timeoutMs, signal }: ChatRequestDeps): AbortSignal | undefined {
  const signals: AbortSignal[] = [];
  if (signal) signals.push(signal);
  if (timeoutMs !== undefined) signals.push(AbortSignal.timeout(timeoutMs));
  return signals.length > 0 ? AbortSignal.any(signals) : undefined;
}

/**
 * POST /chat 본문 처리
 *
 * Mastra에 등록된 chatWorkflow로 run을 만들어 실행합니다.
 * 취소되면 504, workflow 실패는 500입니다.
 */
export async function handleChatRequest(
  mastra: Mastra,
  body: unknown,
  deps: ChatRequestDeps,
): Promise<ChatReply> {
  const { backend, logger } = deps;

  const parsed = chatInputSchema.safeParse(body);
  if (!parsed.success) {
    return {
      code: 400,
      body: {
        status: "error",
        error: parsed.error.issues.map((issue) => issue.message).join("; "),
      },
    };
  }

  const signal = requestSignal(deps);
  if (signal?.aborted) {
    logger.info("Request cancelled before start");
    return { code: 504, body: { status: "cancelled" } };
  }

  try {
    const workflow = mastra.getWorkflow("chatWorkflow");
    const run = await workflow.createRun();
    const dispose = cancelRunOnAbort(signal, run, logger);
    const result = await run
      .start({
        inputData: parsed.data,
        initialState: createChatState(),
        requestContext: createRuleRequestContext(backend),
      })
      .finally(dispose);

    if (result.status === "success") {
      const output = chatOutputSchema.safeParse(result.result);
      if (output.success) return { code: 200, body: output.data };
      logger.error("[/chat] Unexpected workflow output", { error: output.error.message });
      return { code: 500, body: { status: "error", error: "Unexpected workflow output" } };
    }
    if (signal?.aborted) {
      logger.info("Request cancelled", { runId: run.runId });
      return { code: 504, body: { status: "cancelled" } };
    }
    const error = result.status === "failed" ? describeError(result.error) : result.status;
    logger.error("[/chat] Workflow did not succeed", { status: result.status, error });
    return { code: 500, body: { status: "error", error } };
  } catch (error) {
    logger.error("[/chat] Error", { error: describeError(error) });
    return { code: 500, body: { status: "error", error: describeError(error) } };
  }
}
