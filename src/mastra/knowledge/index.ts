import { readFileSync } from "node:fs";
import { resolveDataFile } from "../paths";

/**
 * 정적 도메인 지식 텍스트
 *
 * 프로세스 시작 시 한 번 읽고 이후 변경하지 않습니다.
 * classifier(분석 결과에 따라 선택), planner, GENERIC 응답 프롬프트에 주입됩니다.
 */
function readKnowledge(fileName: string): string {
  const path = resolveDataFile(import.meta.url, "src/mastra/knowledge", fileName);
  return readFileSync(path, "utf8").trim();
}

export const SCHEMA_KNOWLEDGE = readKnowledge("schema.md");
export const RF_SPECTRUM_KNOWLEDGE = readKnowledge("rf-spectrum.md");

export interface KnowledgeBase {
  schema: string;
  rfSpectrum: string;
}

export const DEFAULT_KNOWLEDGE: KnowledgeBase = {
  schema: SCHEMA_KNOWLEDGE,
  rfSpectrum: RF_SPECTRUM_KNOWLEDGE,
};
