/**
 * @fileoverview Centralized application configuration.
 *
 * All environment variables are loaded and validated here. The validation
 * core itself reads none of them: its thresholds and vocabularies are fixed.
 * Configuration only drives the HTTP server and the scenario tooling.
 *
 * @see .env.example for the supported environment variables
 */

import 'dotenv/config';

// ---------------------------------------------------------------------------
// Config helpers
// ---------------------------------------------------------------------------

/** Read an optional string env var with a default. */
function optional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/** Read an optional integer env var with a default. */
function optionalInt(key: string, defaultValue: number): number {
  const raw = process.env[key];
  return raw ? parseInt(raw, 10) : defaultValue;
}

export const REWRITER_KINDS = ['simulated', 'anthropic'] as const;
export type RewriterKind = (typeof REWRITER_KINDS)[number];

function isRewriterKind(value: string): value is RewriterKind {
  return REWRITER_KINDS.some(kind => kind === value);
}

// ---------------------------------------------------------------------------
// Config object
// ---------------------------------------------------------------------------

const rawRewriter = optional('SCENARIO_REWRITER', 'simulated');
const rewriter: RewriterKind = isRewriterKind(rawRewriter) ? rawRewriter : 'simulated';

const config = {
  port: optionalInt('PORT', 3000),
  nodeEnv: optional('NODE_ENV', 'development'),
  anthropicApiKey: process.env.ANTHROPIC_API_KEY,

  /** Model IDs for the LLM-backed collaborators */
  models: {
    rewriter: optional('REWRITER_MODEL_ID', 'claude-sonnet-4-5-20250929'),
    responder: optional('RESPONDER_MODEL_ID', 'claude-sonnet-4-5-20250929'),
  },

  /** Attack scenario prompt generation */
  scenarios: {
    templateDir: optional('SCENARIO_TEMPLATE_DIR', 'attack_scenario_prompts'),
    outputDir: optional('SCENARIO_OUTPUT_DIR', 'generated_prompts'),
    promptsPerScenario: optionalInt('SCENARIO_PROMPTS_PER_SCENARIO', 5),
    rawRewriter,
    rewriter,
  },
};

/**
 * Validate configuration at startup.
 * Throws if any value is missing or invalid.
 */
export function validateConfig(): void {
  const errors: string[] = [];

  if (Number.isNaN(config.port) || config.port < 1 || config.port > 65535) {
    errors.push(`PORT must be 1-65535, got ${config.port}`);
  }
  if (Number.isNaN(config.scenarios.promptsPerScenario) || config.scenarios.promptsPerScenario < 1) {
    errors.push(`SCENARIO_PROMPTS_PER_SCENARIO must be >= 1, got ${config.scenarios.promptsPerScenario}`);
  }
  if (!isRewriterKind(config.scenarios.rawRewriter)) {
    errors.push(`SCENARIO_REWRITER must be one of ${REWRITER_KINDS.join(', ')}, got ${config.scenarios.rawRewriter}`);
  } else if (config.scenarios.rewriter === 'anthropic' && !config.anthropicApiKey) {
    errors.push('ANTHROPIC_API_KEY is required when SCENARIO_REWRITER=anthropic');
  }

  if (errors.length > 0) {
    console.error(JSON.stringify({
      level: 'fatal',
      message: 'Configuration validation failed',
      errors,
      timestamp: new Date().toISOString(),
    }));
    throw new Error(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }
}

export default config;
