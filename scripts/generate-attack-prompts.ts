#!/usr/bin/env npx tsx
/**
 * Generate attack prompts for exercising the security proxy.
 *
 * Usage:
 *   npm run generate
 *   npm run generate -- --scenarios Deceptive_Output --num-prompts 3
 */

import { validateConfig } from '../src/config.js';
import { GENERATE_HELP, parseGenerateArgs, runGenerate } from '../src/cli/generate-attack-prompts.js';
import { AppError } from '../src/utils/errors.js';

async function main(): Promise<void> {
  validateConfig();
  const options = parseGenerateArgs(process.argv.slice(2));
  if (options.help) {
    console.log(GENERATE_HELP);
    return;
  }
  await runGenerate(options);
}

main().catch((error: unknown) => {
  if (error instanceof AppError && (error.code === 'UNKNOWN_SCENARIO' || error.code === 'INVALID_ARGUMENT')) {
    console.error(`Error: ${error.message}`);
    console.error(GENERATE_HELP);
  } else {
    console.error('Error:', error instanceof Error ? error.message : error);
  }
  process.exit(1);
});
