import { Agent } from "@mastra/core/agent";

/**
 * Analyzer Agent 설정
 * 분류 전에 필요한 지식 텍스트와 RF 엔티티를 판별 (structured output)
 */
const analyzerAgentConfig = {
  id: "analyzer-agent",
  name: "Analyzer Agent",
  instructions: `You pre-analyze requests sent to an RF spectrum monitoring assistant.

## Output Rules
- requiresSchemaKnowledge: true when the request is about how rules, conditions or actions are structured
- requiresRfKnowledge: true when it mentions frequencies, bands, signal types or modulation
- requiresDatabaseQueries: true when stored rules must be read or changed to answer
- detectedEntities: copy the mentions verbatim
  - frequencyRanges: e.g. "3.4-3.6 GHz", "900 MHz"
  - signalTypes: e.g. "5G", "LTE", "QPSK"
  - actionTypes / conditionTypes: e.g. "notify me", "geolocate", "energy above -70 dBm"
  - tableReferences: names of stored entities (rules, conditions, actions)
- Leave lists empty when nothing matches. Never invent entities.`,
};

/**
 * Classifier Agent 설정
 * 의도 분류 전용 (structured output)
 */
const classifierAgentConfig = {
  id: "classifier-agent",
  name: "Classifier Agent",
  instructions: `You classify requests sent to an RF spectrum monitoring assistant that manages automation rules.
An automation rule watches the spectrum (a condition) and reacts (an action).

## Classification Rules

### "CREATE"
The user wants a new rule, optionally with a condition and/or action.
Examples: "Alert me when 5G appears between 3.4 and 3.6 GHz", "Create a rule that geolocates LTE signals"

### "UPDATE"
The user wants to change an existing rule: enable, disable, or edit its condition or action.
Examples: "Turn off the LTE Detector", "Change the 5G Monitor range to 3300-3800 MHz"

### "INFO"
The user asks about stored rules, conditions or actions.
Examples: "Which rules are active?", "What does the Energy Threshold Alert do?"

### "GENERIC"
General questions about RF concepts or how the rule system works, with no stored data needed.
Examples: "What is TDOA?", "What signal types can a condition detect?"

### "UNKNOWN"
Anything unrelated to RF monitoring or automation rules, or too unclear to act on.

## Output Rules
- intent: exactly one of CREATE, UPDATE, INFO, GENERIC, UNKNOWN
- confidence: 0.0 to 1.0
- reasoning: one or two sentences
- keyIndicators: the words that drove the decision
- entities: rule names, frequencies, signal types or sensors mentioned`,
};

export function createAnalyzerAgent(model: string) {
  return new Agent({ ...analyzerAgentConfig, model });
}

/**
 * Classifier Agent 팩토리 함수
 * @param model - Mastra model router id (CLASSIFIER_MODEL)
 */
export function createClassifierAgent(model: string) {
  return new Agent({ ...classifierAgentConfig, model });
}
