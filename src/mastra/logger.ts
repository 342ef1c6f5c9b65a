import type { IMastraLogger } from "@mastra/core/logger";
import { PinoLogger } from "@mastra/loggers";
import type { LogLevel } from "./config";

/**
 * 엔진/라우터가 사용하는 로거 인터페이스
 *
 * Mastra 인스턴스와 같은 PinoLogger를 공유하지만,
 * 테스트에서 기록용 로거를 주입할 수 있도록 필요한 메서드만 요구합니다.
 */
export type Logger = Pick<IMastraLogger, "debug" | "info" | "warn" | "error">;

export function createLogger(name: string, level: LogLevel = "info"): PinoLogger {
  return new PinoLogger({ name, level });
}
