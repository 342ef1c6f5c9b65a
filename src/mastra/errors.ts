/**
 * 도메인 에러 계층
 *
 * 모든 에러는 안정적인 `code`를 가지며, 엔진은 이 code로 제어 흐름을 결정합니다.
 * - ReasonerUnavailableError: 요청 단위 치명적 실패 (고정 degraded 응답)
 * - ReasonerOutputError: 구조화 출력 불량 → 안전한 기본값으로 대체
 * - ToolBackendError: 데이터로 기록 (tools_called), 제어 흐름 예외 아님
 * - WorkflowCancelledError: handle() 경계에서만 throw
 */
export class RuleAssistantError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ReasonerUnavailableError extends RuleAssistantError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("reasoner_unavailable", message, options);
  }
}

export class ReasonerOutputError extends RuleAssistantError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("reasoner_output_invalid", message, options);
  }
}

export const TOOL_FAILURE_CODES = [
  "not_found",
  "constraint_violation",
  "backend_unavailable",
] as const;
export type ToolFailureCode = (typeof TOOL_FAILURE_CODES)[number];

export class ToolBackendError extends RuleAssistantError {
  declare readonly code: ToolFailureCode;

  constructor(
    code: ToolFailureCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(code, message, options);
  }
}

export class WorkflowCancelledError extends RuleAssistantError {
  constructor(message = "Request was cancelled before it completed") {
    super("cancelled", message);
  }
}

export class ConfigError extends RuleAssistantError {
  constructor(message: string) {
    super("invalid_config", message);
  }
}

/** unknown 에러를 로그/프롬프트용 메시지로 변환 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
