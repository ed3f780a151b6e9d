/**
 * Attack scenarios - prompt generation for exercising the security proxy.
 */

export { ScenarioGenerator } from './service/generator.js';
export {
  SimulatedRewriter,
  AnthropicRewriter,
  createRewriter,
  REWRITE_STRATEGIES,
  CONTEXT_SUFFIXES,
} from './service/rewriter.js';
export type { ScenarioRewriter, RandomSource } from './service/rewriter.js';
export { loadScenarios, writeGeneratedPrompts } from './repo/filesystem.js';
export { SCENARIO_KEYS, SCENARIO_DISPLAY_NAMES, isScenarioKey } from './types.js';
export type { AttackScenario, ScenarioKey, GeneratedPromptsFile } from './types.js';
