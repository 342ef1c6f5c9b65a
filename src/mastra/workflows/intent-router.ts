import type { IntentRecord } from "../agents/reasoner";
import { WorkflowCancelledError, describeError } from "../errors";
import type { Logger } from "../logger";
import type { ToolBackend } from "../tools/backend";
import { createRuleRequestContext } from "../tools/registry";
import type { ChatWorkflow } from "./chat-workflow";
import type { ChatOutput } from "./schemas";
import { createChatState, type ChatState } from "./state";

export type RouteResult = ChatOutput | { status: "cancelled" };

export interface RouteOutcome {
  /** 분류 전에 끝났으면 null */
  intent: IntentRecord | null;
  result: RouteResult;
  /** 요청이 끝난 시점의 workflow state (취소 전에 시작하지 못했으면 null) */
  state: ChatState | null;
}

export interface RouteOptions {
  signal?: AbortSignal;
}

export interface HandleOptions extends RouteOptions {
  timeoutMs?: number;
}

export interface IntentRouterDeps {
  workflow: ChatWorkflow;
  backend: ToolBackend;
  logger: Logger;
}

interface CancellableRun {
  cancel(): Promise<void>;
}

/**
 * 외부 AbortSignal을 Mastra run 취소로 연결합니다.
 * 반환된 함수로 리스너를 해제합니다.
 */
export function cancelRunOnAbort(
  signal: AbortSignal | undefined,
  run: CancellableRun,
  logger: Logger,
): () => void {
  if (!signal) return () => {};
  const onAbort = () => {
    run.cancel().catch((error: unknown) => {
      logger.error("Failed to cancel workflow run", { error: describeError(error) });
    });
  };
  signal.addEventListener("abort", onAbort, { once: true });
  return () => signal.removeEventListener("abort", onAbort);
}

/**
 * Intent Router
 *
 * chatWorkflow run 하나로 요청 하나를 처리합니다.
 * 분석 → 분류 → 라벨별 분기는 workflow 그래프가 담당하고,
 * 라우터는 요청마다 새 state와 규칙 저장소 requestContext를 만들어 넘깁니다.
 */
export class IntentRouter {
  private readonly deps: IntentRouterDeps;

  constructor(deps: IntentRouterDeps) {
    this.deps = deps;
  }

  get workflow(): ChatWorkflow {
    return this.deps.workflow;
  }

  async route(query: string, options: RouteOptions = {}): Promise<RouteOutcome> {
    const { workflow, backend, logger } = this.deps;
    const { signal } = options;

    if (signal?.aborted) {
      logger.info("Request cancelled", { intent: undefined });
      return { intent: null, result: { status: "cancelled" }, state: null };
    }

    const run = await workflow.createRun();
    const dispose = cancelRunOnAbort(signal, run, logger);
    try {
      const result = await run.start({
        inputData: { message: query },
        initialState: createChatState(),
        requestContext: createRuleRequestContext(backend),
        outputOptions: { includeState: true },
      });
      const state = result.state ?? null;
      const intent = state?.intent ?? null;

      if (result.status === "success") {
        return { intent, result: result.result, state };
      }
      if (signal?.aborted) {
        logger.info("Request cancelled", { intent: intent?.intent });
        return { intent, result: { status: "cancelled" }, state };
      }
      if (result.status === "failed") throw result.error;
      throw new Error(`chat workflow ended with status '${result.status}'`);
    } finally {
      dispose();
    }
  }

  /** 응답 텍스트만 반환. 취소된 요청은 WorkflowCancelledError */
  async handle(query: string, options: HandleOptions = {}): Promise<string> {
    const signals: AbortSignal[] = [];
    if (options.signal) signals.push(options.signal);
    if (options.timeoutMs !== undefined) signals.push(AbortSignal.timeout(options.timeoutMs));
    const signal = signals.length > 0 ? AbortSignal.any(signals) : undefined;

    const outcome = await this.route(query, { signal });
    if (outcome.result.status === "cancelled") {
      throw new WorkflowCancelledError();
    }
    return outcome.result.response;
  }
}
