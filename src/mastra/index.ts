import { Mastra } from "@mastra/core/mastra";
import { registerApiRoute } from "@mastra/core/server";
import { LibSQLStore } from "@mastra/libsql";
import {
  DefaultExporter,
  Observability,
  SensitiveDataFilter,
} from "@mastra/observability";
import { PostgresStore } from "@mastra/pg";

import { createAgents, createIntentRouter, createMastraReasoner } from "./assistant";
import { handleChatRequest } from "./chat-endpoint";
import { loadConfig, type AppConfig } from "./config";
import { DEFAULT_KNOWLEDGE } from "./knowledge";
import { createLogger } from "./logger";
import { InMemoryRuleBackend, loadSeedRules } from "./tools/in-memory-backend";

/**
 * DATABASE_URL이 있으면 Postgres, 없으면 메모리 LibSQL에 실행 기록을 남깁니다.
 * 규칙 데이터 자체는 ToolBackend(기본: 메모리 저장소)가 관리합니다.
 */
function createStorage(config: AppConfig) {
  if (config.databaseUrl) {
    return new PostgresStore({
      id: "mastra",
      connectionString: config.databaseUrl,
    });
  }
  return new LibSQLStore({
    id: "mastra-storage",
    url: ":memory:",
  });
}

/**
 * Mastra 인스턴스 초기화
 *
 * - Agent: analyzer/classifier(분류), planner(sub-workflow 계획), final-responser(응답)
 * - chatWorkflow: 분석 → 분류 → CREATE/UPDATE/INFO/GENERIC/UNKNOWN 분기
 * - POST /chat: 등록된 chatWorkflow run 하나로 요청 처리 (REQUEST_TIMEOUT_MS 초과 시 취소)
 */
export function initializeMastra(config: AppConfig = loadConfig()): Mastra {
  const logger = createLogger("Mastra", config.logLevel);
  const agents = createAgents(config.models);
  const backend = new InMemoryRuleBackend({ seed: loadSeedRules() });
  const router = createIntentRouter({
    config,
    reasoner: createMastraReasoner(agents, logger),
    backend,
    knowledge: DEFAULT_KNOWLEDGE,
    logger,
  });

  return new Mastra({
    agents: { ...agents },
    workflows: {
      chatWorkflow: router.workflow,
    },
    storage: createStorage(config),
    logger,
    observability: new Observability({
      configs: {
        default: {
          serviceName: "rf-rule-assistant",
          exporters: [new DefaultExporter()],
          spanOutputProcessors: [new SensitiveDataFilter()],
        },
      },
    }),
    server: {
      apiRoutes: [
        registerApiRoute("/chat", {
          method: "POST",
          handler: async (c) => {
            let body: unknown;
            try {
              body = await c.req.json();
            } catch {
              return c.json({ status: "error", error: "Request body must be JSON" }, 400);
            }

            const reply = await handleChatRequest(c.get("mastra"), body, {
              backend,
              logger,
              timeoutMs: config.requestTimeoutMs,
              signal: c.req.raw.signal,
            });
            return c.json(reply.body, reply.code);
          },
        }),
      ],
    },
  });
}

export const mastra = initializeMastra();
