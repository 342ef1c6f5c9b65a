import { z } from "zod";
import { ConfigError } from "./errors";

/** 로그 레벨 (PinoLogger가 받는 값) */
export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const iterationLimit = z.coerce.number().int().min(1).max(50);

/**
 * 환경변수 스키마
 *
 * 반복 상한 기본값은 워크플로우 종류별로 다릅니다.
 * CREATE/UPDATE는 규칙 조회 → 변경의 2단계가 흔해서 여유를 두고, INFO는 5회.
 */
const envSchema = z.object({
  CLASSIFIER_MODEL: z.string().min(1).default("anthropic/claude-haiku-4-5"),
  PLANNER_MODEL: z.string().min(1).default("anthropic/claude-sonnet-4-5"),
  RESPONDER_MODEL: z.string().min(1).default("anthropic/claude-haiku-4-5"),
  CREATE_MAX_ITERATIONS: iterationLimit.default(8),
  UPDATE_MAX_ITERATIONS: iterationLimit.default(8),
  INFO_MAX_ITERATIONS: iterationLimit.default(5),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  DATABASE_URL: z.string().min(1).optional(),
});

export interface AppConfig {
  models: {
    classifier: string;
    planner: string;
    responder: string;
  };
  maxIterations: {
    CREATE: number;
    UPDATE: number;
    INFO: number;
  };
  requestTimeoutMs?: number;
  logLevel: LogLevel;
  databaseUrl?: string;
}

/**
 * 환경변수를 검증하여 AppConfig로 변환합니다.
 * 빈 문자열은 미설정으로 취급합니다 (.env의 `KEY=` 형태).
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );
  const parsed = envSchema.safeParse(present);

  if (!parsed.success) {
    const keys = [
      ...new Set(parsed.error.issues.map((issue) => issue.path.map(String).join("."))),
    ];
    throw new ConfigError(`Invalid configuration: ${keys.join(", ")}`);
  }

  const values = parsed.data;
  return {
    models: {
      classifier: values.CLASSIFIER_MODEL,
      planner: values.PLANNER_MODEL,
      responder: values.RESPONDER_MODEL,
    },
    maxIterations: {
      CREATE: values.CREATE_MAX_ITERATIONS,
      UPDATE: values.UPDATE_MAX_ITERATIONS,
      INFO: values.INFO_MAX_ITERATIONS,
    },
    requestTimeoutMs: values.REQUEST_TIMEOUT_MS,
    logLevel: values.LOG_LEVEL,
    databaseUrl: values.DATABASE_URL,
  };
}
