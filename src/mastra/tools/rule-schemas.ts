import { z } from "zod";

/**
 * 자동화 규칙 도메인 상수 및 파라미터 스키마
 *
 * 도구 파라미터 검증(registry.validate)과 백엔드 재검증이 같은 제약을 공유합니다.
 * 도구 파라미터 이름은 LLM이 생성하는 snake_case를 그대로 사용합니다.
 */

export const SIGNAL_TYPES = [
  "Energy",
  "5G",
  "LTE",
  "QPSK",
  "CW",
  "PCMPM",
  "CPM",
  "CPMFM",
  "BPSK",
  "SOQPSK",
] as const;
export type SignalType = (typeof SIGNAL_TYPES)[number];

export const CONDITION_TYPES = ["signalDetection", "spectralEnergy"] as const;
export type ConditionType = (typeof CONDITION_TYPES)[number];

export const ACTION_TYPES = [
  "frequencyScanRequest",
  "geolocationRequest",
  "userNotification",
] as const;
export type ActionType = (typeof ACTION_TYPES)[number];

export const GEOLOCATION_ALGORITHMS = ["TDOA", "PDOA"] as const;

/** 센서가 커버하는 주파수 범위 (MHz). 생성 시 범위 미지정이면 전 구간 */
export const FREQUENCY_SPAN_MHZ = { min: 10, max: 6000 } as const;
export const THRESHOLD_SPAN_DBM = { min: -150, max: 150 } as const;

const FREQUENCY_MESSAGE = `Frequencies must be between ${FREQUENCY_SPAN_MHZ.min} and ${FREQUENCY_SPAN_MHZ.max} MHz`;
const THRESHOLD_MESSAGE = `threshold_dBm must be between ${THRESHOLD_SPAN_DBM.min} and ${THRESHOLD_SPAN_DBM.max}`;
export const BAND_ORDER_MESSAGE = "minFrequencyMHz must be less than maxFrequencyMHz";

const frequency = z
  .number()
  .min(FREQUENCY_SPAN_MHZ.min, FREQUENCY_MESSAGE)
  .max(FREQUENCY_SPAN_MHZ.max, FREQUENCY_MESSAGE);

const threshold = z
  .number()
  .min(THRESHOLD_SPAN_DBM.min, THRESHOLD_MESSAGE)
  .max(THRESHOLD_SPAN_DBM.max, THRESHOLD_MESSAGE);

const sensorIds = z
  .array(z.string().min(1))
  .min(1, "sensorIds must be a non-empty list");

const notificationMessage = z
  .string()
  .trim()
  .min(1, "Notification message cannot be empty");

const isoDateTime = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), "Invalid datetime format");

export const ruleIdSchema = z.string().trim().min(1, "rule_id is required");

function isOrderedBand(band: {
  minFrequencyMHz?: number;
  maxFrequencyMHz?: number;
}): boolean {
  if (band.minFrequencyMHz === undefined || band.maxFrequencyMHz === undefined) {
    return true;
  }
  return band.minFrequencyMHz < band.maxFrequencyMHz;
}

// ─── Condition ───

export const signalDetectionParametersSchema = z
  .object({
    minFrequencyMHz: frequency.default(FREQUENCY_SPAN_MHZ.min),
    maxFrequencyMHz: frequency.default(FREQUENCY_SPAN_MHZ.max),
    signalType: z.enum(SIGNAL_TYPES),
  })
  .refine(isOrderedBand, { message: BAND_ORDER_MESSAGE, path: ["maxFrequencyMHz"] });

export const spectralEnergyParametersSchema = z
  .object({
    minFrequencyMHz: frequency.default(FREQUENCY_SPAN_MHZ.min),
    maxFrequencyMHz: frequency.default(FREQUENCY_SPAN_MHZ.max),
    threshold_dBm: threshold,
  })
  .refine(isOrderedBand, { message: BAND_ORDER_MESSAGE, path: ["maxFrequencyMHz"] });

/** 규칙 생성 도구의 condition_* 필드 (condition_type으로 분기) */
export const conditionFieldsSchema = z.discriminatedUnion("condition_type", [
  z.object({
    condition_type: z.literal("signalDetection"),
    condition_parameters: signalDetectionParametersSchema,
    condition_description: z.string().optional(),
  }),
  z.object({
    condition_type: z.literal("spectralEnergy"),
    condition_parameters: spectralEnergyParametersSchema,
    condition_description: z.string().optional(),
  }),
]);

export type ConditionFields = z.infer<typeof conditionFieldsSchema>;

// ─── Action ───

export const actionFieldsSchema = z.discriminatedUnion("action_type", [
  z.object({
    action_type: z.literal("frequencyScanRequest"),
    action_parameters: z.object({ sensorIds }),
    action_description: z.string().optional(),
  }),
  z.object({
    action_type: z.literal("geolocationRequest"),
    action_parameters: z.object({
      algorithm: z.enum(GEOLOCATION_ALGORITHMS),
      sensorIds: z
        .array(z.string().min(1))
        .min(2, "geolocationRequest requires at least 2 sensors"),
    }),
    action_description: z.string().optional(),
  }),
  z.object({
    action_type: z.literal("userNotification"),
    action_parameters: z.object({ message: notificationMessage }),
    action_description: z.string().optional(),
  }),
]);

export type ActionFields = z.infer<typeof actionFieldsSchema>;

// ─── Rule ───

export const ruleFieldsSchema = z.object({
  name: z.string().trim().min(1, "Rule name cannot be empty"),
  description: z.string().optional(),
  is_enabled: z.boolean().default(false),
  max_executions: z.number().int().positive().optional(),
  start_time: isoDateTime.optional(),
  end_time: isoDateTime.optional(),
});

export type RuleFields = z.infer<typeof ruleFieldsSchema>;

/** start_time < end_time (둘 다 있을 때만) */
export function hasValidTimeWindow(fields: {
  start_time?: string;
  end_time?: string;
}): boolean {
  if (!fields.start_time || !fields.end_time) return true;
  return Date.parse(fields.start_time) < Date.parse(fields.end_time);
}

export const TIME_WINDOW_MESSAGE = "start_time must be before end_time";

// ─── Partial updates ───

export const conditionPatchSchema = z
  .object({
    minFrequencyMHz: frequency.optional(),
    maxFrequencyMHz: frequency.optional(),
    signalType: z.enum(SIGNAL_TYPES).optional(),
    threshold_dBm: threshold.optional(),
  })
  .refine(isOrderedBand, { message: BAND_ORDER_MESSAGE, path: ["maxFrequencyMHz"] });

export type ConditionPatch = z.infer<typeof conditionPatchSchema>;

export const actionPatchSchema = z.object({
  message: notificationMessage.optional(),
  sensorIds: sensorIds.optional(),
  algorithm: z.enum(GEOLOCATION_ALGORITHMS).optional(),
});

export type ActionPatch = z.infer<typeof actionPatchSchema>;
