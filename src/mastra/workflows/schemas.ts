import { z } from "zod";
import { INTENT_LABELS } from "../agents/reasoner";

/**
 * Workflow 입출력 스키마
 *
 * chatWorkflow의 입력/출력과 분기 핸들러(sub-workflow, GENERIC, UNKNOWN)의
 * 공통 출력 형태를 정의합니다.
 */

export const chatInputSchema = z.object({
  message: z.string().trim().min(1, "message is required"),
});

export const HANDLER_STATUSES = ["completed", "incomplete", "failed", "rejected"] as const;

/** 분기 핸들러 하나의 결과 */
export const handlerResultSchema = z.object({
  status: z.enum(HANDLER_STATUSES),
  response: z.string(),
  /** failed일 때만 (예: reasoner_unavailable) */
  errorCode: z.string().optional(),
});

export type HandlerResult = z.infer<typeof handlerResultSchema>;

export const chatOutputSchema = z.object({
  status: z.enum(HANDLER_STATUSES),
  /** 분류 전에 실패했으면 null */
  intent: z.enum(INTENT_LABELS).nullable(),
  response: z.string(),
  errorCode: z.string().optional(),
});

export type ChatOutput = z.infer<typeof chatOutputSchema>;

/** plan/execute 루프 사이에 오가는 다음 단계 표시 */
export const loopSignalSchema = z.object({
  phase: z.enum(["plan", "execute", "respond", "failed"]),
});

export type LoopSignal = z.infer<typeof loopSignalSchema>;
