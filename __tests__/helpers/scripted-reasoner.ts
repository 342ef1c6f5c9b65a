import type {
  InferOptions,
  IntentLabel,
  IntentRecord,
  Reasoner,
  ReasonerInputs,
  ReasonerOutputs,
  ReasonerRole,
} from "../../src/mastra/agents/reasoner";

export type ScriptStep<R extends ReasonerRole> =
  | { output: ReasonerOutputs[R] }
  | { error: Error };

export type ReasonerScript = { [R in ReasonerRole]?: Array<ScriptStep<R>> };

export interface RecordedCall {
  role: ReasonerRole;
  input: unknown;
  signal?: AbortSignal;
}

export function ok<T>(output: T): { output: T } {
  return { output };
}

export function fail(error: Error): { error: Error } {
  return { error };
}

export function intentRecord(intent: IntentLabel, confidence = 0.9): IntentRecord {
  return {
    intent,
    confidence,
    reasoning: `looks like ${intent}`,
    keyIndicators: [],
    entities: {},
  };
}

/**
 * 역할별로 미리 정한 출력을 순서대로 돌려주는 Reasoner
 * 스크립트가 바닥나면 에러를 던져 테스트가 예상 밖 호출을 잡아냅니다.
 */
export class ScriptedReasoner implements Reasoner {
  readonly calls: RecordedCall[] = [];

  constructor(
    private readonly script: ReasonerScript,
    private readonly onInfer?: (role: ReasonerRole) => void,
  ) {}

  get roles(): ReasonerRole[] {
    return this.calls.map((call) => call.role);
  }

  inputsFor<R extends ReasonerRole>(role: R): unknown[] {
    return this.calls.filter((call) => call.role === role).map((call) => call.input);
  }

  async infer<R extends ReasonerRole>(
    role: R,
    input: ReasonerInputs[R],
    options: InferOptions = {},
  ): Promise<ReasonerOutputs[R]> {
    this.calls.push({ role, input, signal: options.signal });
    this.onInfer?.(role);

    const queue: Array<ScriptStep<R>> | undefined = this.script[role];
    const step = queue?.shift();
    if (!step) {
      throw new Error(`No scripted output left for role '${role}'`);
    }
    if ("error" in step) throw step.error;
    return step.output;
  }
}
