import type { Agent } from "@mastra/core/agent";
import { createAnalyzerAgent, createClassifierAgent } from "./agents/classifier-agent";
import { createFinalResponserAgent } from "./agents/final-responser/agent";
import { MastraReasoner } from "./agents/mastra-reasoner";
import { createPlannerAgent } from "./agents/planner/agent";
import type { Reasoner } from "./agents/reasoner";
import type { AppConfig } from "./config";
import type { KnowledgeBase } from "./knowledge";
import type { Logger } from "./logger";
import type { ToolBackend } from "./tools/backend";
import { createWorkflowDefinitions } from "./workflows/definitions";
import { createChatWorkflow } from "./workflows/chat-workflow";
import { IntentRouter } from "./workflows/intent-router";

export interface RuleAssistantAgents {
  analyzerAgent: Agent;
  classifierAgent: Agent;
  plannerAgent: Agent;
  finalResponserAgent: Agent;
}

export function createAgents(models: AppConfig["models"]): RuleAssistantAgents {
  return {
    analyzerAgent: createAnalyzerAgent(models.classifier),
    classifierAgent: createClassifierAgent(models.classifier),
    plannerAgent: createPlannerAgent(models.planner),
    finalResponserAgent: createFinalResponserAgent(models.responder),
  };
}

export function createMastraReasoner(agents: RuleAssistantAgents, logger: Logger): Reasoner {
  return new MastraReasoner(
    {
      analyzer: agents.analyzerAgent,
      classifier: agents.classifierAgent,
      planner: agents.plannerAgent,
      responder: agents.finalResponserAgent,
    },
    logger,
  );
}

export interface IntentRouterOptions {
  config: Pick<AppConfig, "maxIterations">;
  reasoner: Reasoner;
  backend: ToolBackend;
  knowledge: KnowledgeBase;
  logger: Logger;
  now?: () => Date;
}

/**
 * 요청 간에 공유되는 것은 레지스트리, 지식 텍스트, 에이전트 설정뿐.
 * 같은 chatWorkflow 인스턴스를 Mastra에 등록하고 라우터도 이것으로 실행합니다.
 */
export function createIntentRouter(options: IntentRouterOptions): IntentRouter {
  const workflow = createChatWorkflow(
    {
      reasoner: options.reasoner,
      knowledge: options.knowledge,
      logger: options.logger,
      now: options.now,
    },
    createWorkflowDefinitions(options.config.maxIterations),
  );
  return new IntentRouter({ workflow, backend: options.backend, logger: options.logger });
}
