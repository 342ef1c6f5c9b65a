import type { Reasoner } from "../agents/reasoner";
import type { AppConfig } from "../config";
import type { KnowledgeBase } from "../knowledge";
import type { Logger } from "../logger";
import { CREATION_TOOLS, createToolRegistry } from "../tools/create-tools";
import { infoToolRegistry } from "../tools/info-tools";
import type { ToolRegistry } from "../tools/registry";
import { MUTATING_UPDATE_TOOLS, updateToolRegistry } from "../tools/update-tools";
import type { WorkflowKind, WorkflowState } from "./state";

/**
 * 완료 가드 판정
 * 플래너를 부르지 않고 바로 응답 단계로 갈 때 반환합니다.
 */
export interface CompletionVerdict {
  completed: boolean;
  reason: string;
}

export type CompletionGuard = (state: WorkflowState) => CompletionVerdict | null;

export interface SubWorkflowDefinition {
  kind: WorkflowKind;
  registry: ToolRegistry;
  maxIterations: number;
  completionGuard?: CompletionGuard;
}

/** step 팩토리가 공유하는 의존성. 규칙 저장소는 RequestContext로 전달됩니다 */
export interface WorkflowDeps {
  reasoner: Reasoner;
  knowledge: KnowledgeBase;
  logger: Logger;
  now?: () => Date;
}

function succeeded(state: WorkflowState, tools: ReadonlySet<string>): boolean {
  return state.toolsCalled.some((call) => call.outcome.ok && tools.has(call.tool));
}

/** 규칙이 하나라도 생성되면 응답 */
export const creationGuard: CompletionGuard = (state) =>
  succeeded(state, CREATION_TOOLS)
    ? { completed: true, reason: "The rule has been created." }
    : null;

/**
 * 변경이 성공했으면 응답.
 * 규칙 목록은 받았는데 질의에서 대상 규칙을 찾지 못했으면 미완료로 응답.
 */
export const updateGuard: CompletionGuard = (state) => {
  if (succeeded(state, MUTATING_UPDATE_TOOLS)) {
    return { completed: true, reason: "The requested update has been applied." };
  }
  if (state.entities.rule_list !== undefined && state.entities.target_rule === undefined) {
    return {
      completed: false,
      reason: "Unable to find the rule named in the request among the stored rules.",
    };
  }
  return null;
};

export function createWorkflowDefinitions(
  maxIterations: AppConfig["maxIterations"],
): Record<WorkflowKind, SubWorkflowDefinition> {
  return {
    CREATE: {
      kind: "CREATE",
      registry: createToolRegistry,
      maxIterations: maxIterations.CREATE,
      completionGuard: creationGuard,
    },
    UPDATE: {
      kind: "UPDATE",
      registry: updateToolRegistry,
      maxIterations: maxIterations.UPDATE,
      completionGuard: updateGuard,
    },
    INFO: {
      kind: "INFO",
      registry: infoToolRegistry,
      maxIterations: maxIterations.INFO,
    },
  };
}
