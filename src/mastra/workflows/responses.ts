/** 예산 소진 등 비정상 종료 시 응답 앞에 붙는 표시 */
export const INCOMPLETE_MARKER = "[INCOMPLETE]";

/** 분류 불가(UNKNOWN) 시 고정 응답 */
export const ERROR_RESPONSE =
  "Sorry, I could not understand your request or may be your request not relevant";

/** Reasoner 사용 불가 시 고정 응답 */
export const DEGRADED_RESPONSE =
  "The assistant is temporarily unavailable, so your request was not processed. Please try again shortly.";

export function markIncomplete(text: string): string {
  return `${INCOMPLETE_MARKER} ${text}`;
}
