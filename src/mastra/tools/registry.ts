import { RequestContext } from "@mastra/core/request-context";
import {
  isValidationError,
  noopObserve,
  type Tool,
  type ToolExecutionContext,
} from "@mastra/core/tools";
import { z } from "zod";
import { ToolBackendError } from "../errors";
import { isToolBackend, type ToolBackend } from "./backend";

/**
 * Tool Registry
 *
 * 워크플로우 종류(CREATE/UPDATE/INFO)마다 닫힌 도구 목록을 가집니다.
 * 도구 자체는 createTool()로 만든 Mastra Tool이고, 레지스트리 항목은 여기에
 * 플래너 프롬프트용 힌트, 엔티티 누적 규칙, 결과 요약을 덧붙입니다.
 * validate()는 도구의 inputSchema만 사용하며 백엔드에 접근하지 않습니다.
 */

/** 누적 엔티티. 역할별로 최신 결과만 유지 (덮어쓰기) */
export const entityPatchSchema = z.object({
  rule_list: z.unknown().optional(),
  rule: z.unknown().optional(),
  condition: z.unknown().optional(),
  action: z.unknown().optional(),
  condition_list: z.unknown().optional(),
  action_list: z.unknown().optional(),
  target_rule: z.unknown().optional(),
});

export type EntityPatch = z.infer<typeof entityPatchSchema>;

// ─── RequestContext ───

/** 도구가 규칙 저장소를 찾는 RequestContext 키 */
export const RULE_BACKEND_KEY = "ruleBackend";

export function createRuleRequestContext(backend: ToolBackend): RequestContext {
  const requestContext = new RequestContext();
  requestContext.set(RULE_BACKEND_KEY, backend);
  return requestContext;
}

/** 도구 execute 안에서 호출. 저장소가 없으면 backend_unavailable */
export function requireBackend(requestContext: RequestContext<unknown>): ToolBackend {
  const backend = requestContext.get(RULE_BACKEND_KEY);
  if (!isToolBackend(backend)) {
    throw new ToolBackendError(
      "backend_unavailable",
      "No rule backend is attached to this request",
    );
  }
  return backend;
}

// ─── Entries ───

export type RuleTool<P, R, TId extends string = string> = Tool<
  P,
  R,
  unknown,
  unknown,
  ToolExecutionContext<unknown, unknown, unknown>,
  TId,
  unknown
>;

export interface AccumulateContext<P> {
  parameters: P;
  query: string;
}

export interface RuleToolEntry<P, R, TId extends string> {
  tool: RuleTool<P, R, TId>;
  /** 플래너 프롬프트용 파라미터 설명 */
  parameterHints: string[];
  example: Record<string, unknown>;
  accumulate(result: R, context: AccumulateContext<P>): EntityPatch;
  summarize(result: R): string;
}

export interface ToolRunContext {
  query: string;
  requestContext: RequestContext<unknown>;
  abortSignal?: AbortSignal;
}

export interface ToolRunResult {
  data: unknown;
  summary: string;
  entities: EntityPatch;
}

export interface ValidatedCall {
  name: string;
  parameters: Record<string, unknown>;
  run(context: ToolRunContext): Promise<ToolRunResult>;
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export interface ToolValidationError {
  tool: string;
  issues: ValidationIssue[];
}

export type ValidationResult =
  | { ok: true; call: ValidatedCall }
  | { ok: false; error: ToolValidationError };

export interface RegisteredTool {
  name: string;
  description: string;
  parameterHints: string[];
  example: Record<string, unknown>;
  bind(raw: unknown): Promise<ValidationResult>;
}

type IssuePath = ReadonlyArray<PropertyKey | { key: PropertyKey }> | undefined;

function formatPath(path: IssuePath): string {
  return (path ?? [])
    .map((segment) => (typeof segment === "object" ? String(segment.key) : String(segment)))
    .join(".");
}

function toParameterRecord(value: unknown): Record<string, unknown> {
  if (typeof value !== "object" || value === null) return {};
  return Object.fromEntries(Object.entries(value));
}

/**
 * 파라미터 타입 P를 클로저 안에 가두어 RegisteredTool로 변환합니다.
 * 레지스트리는 서로 다른 P를 가진 도구를 한 배열에 담을 수 있습니다.
 */
export function registerTool<P, R, TId extends string>(
  entry: RuleToolEntry<P, R, TId>,
): RegisteredTool {
  const { tool } = entry;
  const schema = tool.inputSchema;
  if (!schema) {
    throw new Error(`Tool '${tool.id}' has no inputSchema`);
  }

  return {
    name: tool.id,
    description: tool.description,
    parameterHints: entry.parameterHints,
    example: entry.example,
    async bind(raw) {
      const result = await schema["~standard"].validate(raw ?? {});
      if (result.issues) {
        return {
          ok: false,
          error: {
            tool: tool.id,
            issues: result.issues.map((issue) => ({
              path: formatPath(issue.path),
              message: issue.message,
            })),
          },
        };
      }

      const parameters = result.value;
      return {
        ok: true,
        call: {
          name: tool.id,
          parameters: toParameterRecord(parameters),
          async run({ query, requestContext, abortSignal }) {
            if (!tool.execute) {
              throw new ToolBackendError("backend_unavailable", `${tool.id} cannot be executed`);
            }
            const output = await tool.execute(parameters, {
              requestContext,
              abortSignal,
              observe: noopObserve,
            });
            if (isValidationError(output)) {
              throw new ToolBackendError("backend_unavailable", output.message);
            }
            if (output === undefined) {
              throw new ToolBackendError("backend_unavailable", `${tool.id} returned no result`);
            }
            return {
              data: output,
              summary: entry.summarize(output),
              entities: entry.accumulate(output, { parameters, query }),
            };
          },
        },
      };
    },
  };
}

export class ToolRegistry {
  private readonly tools: ReadonlyMap<string, RegisteredTool>;

  constructor(
    readonly kind: string,
    tools: RegisteredTool[],
  ) {
    const map = new Map<string, RegisteredTool>();
    for (const tool of tools) {
      if (map.has(tool.name)) {
        throw new Error(`Duplicate tool '${tool.name}' in ${kind} registry`);
      }
      map.set(tool.name, tool);
    }
    this.tools = map;
  }

  get names(): string[] {
    return [...this.tools.keys()];
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  async validate(toolName: string, parameters: unknown): Promise<ValidationResult> {
    const tool = this.tools.get(toolName);
    if (!tool) {
      return {
        ok: false,
        error: {
          tool: toolName,
          issues: [
            {
              path: "",
              message: `Unknown tool '${toolName}'. Available tools: ${this.names.join(", ")}`,
            },
          ],
        },
      };
    }
    return tool.bind(parameters);
  }

  /** 플래너 프롬프트에 넣을 도구 카탈로그 */
  renderCatalog(): string {
    return [...this.tools.values()]
      .map((tool) =>
        [
          `- ${tool.name}: ${tool.description}`,
          ...tool.parameterHints.map((hint) => `    ${hint}`),
          `    example: ${JSON.stringify(tool.example)}`,
        ].join("\n"),
      )
      .join("\n");
  }
}

/** 검증 에러를 플래너에게 돌려줄 한 줄 메시지로 변환 */
export function formatValidationError(error: ToolValidationError): string {
  const details = error.issues
    .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
    .join("; ");
  return `${error.tool} rejected: ${details}`;
}
