import type { Agent } from "@mastra/core/agent";
import type { z } from "zod";
import { ReasonerOutputError, ReasonerUnavailableError, describeError } from "../errors";
import type { Logger } from "../logger";
import {
  buildAnalysisPrompt,
  buildClassificationPrompt,
  buildGenericPrompt,
  buildPlannerPrompt,
  buildSummaryPrompt,
} from "./prompts";
import {
  classificationOutputSchema,
  initialAnalysisSchema,
  normalizeIntentRecord,
  plannerOutputSchema,
  toPlannerDecision,
  type InferOptions,
  type Reasoner,
  type ReasonerInputs,
  type ReasonerOutputs,
  type ReasonerRole,
} from "./reasoner";

type RoleHandlers = {
  [R in ReasonerRole]: (
    input: ReasonerInputs[R],
    options: InferOptions,
  ) => Promise<ReasonerOutputs[R]>;
};

export interface MastraReasonerAgents {
  analyzer: Agent;
  classifier: Agent;
  planner: Agent;
  responder: Agent;
}

/**
 * Mastra Agent 기반 Reasoner
 *
 * 구조화 출력은 structuredOutput으로 요청한 뒤 같은 zod 스키마로 다시 검증합니다.
 * 모델 호출 실패는 ReasonerUnavailableError, 스키마 불일치는 ReasonerOutputError.
 * 요청이 취소된 경우에는 원래 에러를 그대로 던집니다.
 */
export class MastraReasoner implements Reasoner {
  private readonly handlers: RoleHandlers;

  constructor(
    agents: MastraReasonerAgents,
    private readonly logger: Logger,
  ) {
    this.handlers = {
      initial_analysis: async (input, { signal }) => {
        const result = await this.call("initial_analysis", signal, () =>
          agents.analyzer.generate(buildAnalysisPrompt(input), {
            structuredOutput: { schema: initialAnalysisSchema },
            abortSignal: signal,
          }),
        );
        return parseOutput("initial_analysis", initialAnalysisSchema, result.object);
      },
      classify: async (input, { signal }) => {
        const result = await this.call("classify", signal, () =>
          agents.classifier.generate(buildClassificationPrompt(input), {
            structuredOutput: { schema: classificationOutputSchema },
            abortSignal: signal,
          }),
        );
        return normalizeIntentRecord(
          parseOutput("classify", classificationOutputSchema, result.object),
        );
      },
      plan: async (input, { signal }) => {
        const result = await this.call("plan", signal, () =>
          agents.planner.generate(buildPlannerPrompt(input), {
            structuredOutput: { schema: plannerOutputSchema },
            abortSignal: signal,
          }),
        );
        const decision = toPlannerDecision(
          parseOutput("plan", plannerOutputSchema, result.object),
        );
        if (!decision) {
          throw new ReasonerOutputError("plan output chose call_tool without a tool_name");
        }
        return decision;
      },
      respond_generic: async (input, { signal }) => {
        const result = await this.call("respond_generic", signal, () =>
          agents.responder.generate(buildGenericPrompt(input), { abortSignal: signal }),
        );
        return result.text;
      },
      respond_summary: async (input, { signal }) => {
        const result = await this.call("respond_summary", signal, () =>
          agents.responder.generate(buildSummaryPrompt(input), { abortSignal: signal }),
        );
        return result.text;
      },
    };
  }

  infer<R extends ReasonerRole>(
    role: R,
    input: ReasonerInputs[R],
    options: InferOptions = {},
  ): Promise<ReasonerOutputs[R]> {
    return this.handlers[role](input, options);
  }

  private async call<T>(
    role: ReasonerRole,
    signal: AbortSignal | undefined,
    generate: () => Promise<T>,
  ): Promise<T> {
    const startedAt = Date.now();
    try {
      const result = await generate();
      this.logger.debug("Reasoner call finished", { role, ms: Date.now() - startedAt });
      return result;
    } catch (error) {
      if (signal?.aborted) throw error;
      this.logger.error("Reasoner call failed", { role, error: describeError(error) });
      throw new ReasonerUnavailableError(`${role} call failed: ${describeError(error)}`, {
        cause: error,
      });
    }
  }
}

function parseOutput<T>(role: ReasonerRole, schema: z.ZodType<T>, value: unknown): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const paths = parsed.error.issues.map((issue) => issue.path.map(String).join(".") || "(root)");
    throw new ReasonerOutputError(`${role} output did not match its schema at ${paths.join(", ")}`);
  }
  return parsed.data;
}
