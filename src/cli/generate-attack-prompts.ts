/**
 * Argument parsing and run loop for the attack prompt generator CLI.
 */
import config from '../config.js';
import { AppError } from '../utils/errors.js';
import {
  ScenarioGenerator,
  createRewriter,
  isScenarioKey,
  SCENARIO_KEYS,
  type ScenarioKey,
} from '../domains/attack-scenarios/index.js';
import { createRunId, safeSnippet, withLogContext } from '../utils/observability/index.js';

export interface GenerateOptions {
  scenarios: ScenarioKey[] | 'all';
  numPrompts: number;
  outputDir: string;
  help: boolean;
}

export const GENERATE_HELP = `
Attack Prompt Generator

Usage:
  npm run generate
  npm run generate -- --scenarios Deceptive_Output Privacy_Harvesting
  npm run generate -- --num-prompts 10 --output-dir ./out

Options:
  --scenarios, -s     Scenarios to generate (default: all)
                      Choices: all, ${SCENARIO_KEYS.join(', ')}
  --num-prompts, -n   Prompts per scenario (default: ${config.scenarios.promptsPerScenario})
  --output-dir, -o    Directory for the generated JSON files (default: ${config.scenarios.outputDir})
  --help, -h          Show this help message
`;

function parsePositiveInt(flag: string, raw: string | undefined): number {
  const value = raw === undefined ? NaN : Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new AppError(`${flag} expects a positive integer, got ${raw ?? '(nothing)'}`, 'INVALID_ARGUMENT');
  }
  return value;
}

/**
 * Parse CLI arguments (without node and script path).
 * Throws AppError on an unknown scenario or a bad number.
 */
export function parseGenerateArgs(args: readonly string[]): GenerateOptions {
  const options: GenerateOptions = {
    scenarios: 'all',
    numPrompts: config.scenarios.promptsPerScenario,
    outputDir: config.scenarios.outputDir,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--scenarios' || arg === '-s') {
      const names: string[] = [];
      while (i + 1 < args.length && !args[i + 1].startsWith('-')) {
        names.push(args[++i]);
      }
      if (names.length === 0) {
        throw new AppError('--scenarios expects at least one name', 'INVALID_ARGUMENT');
      }
      if (names.includes('all')) {
        options.scenarios = 'all';
        continue;
      }
      const keys: ScenarioKey[] = [];
      for (const name of names) {
        if (!isScenarioKey(name)) {
          throw new AppError(`Unknown scenario: ${name}`, 'UNKNOWN_SCENARIO', false, { name });
        }
        keys.push(name);
      }
      options.scenarios = keys;
    } else if (arg === '--num-prompts' || arg === '-n') {
      options.numPrompts = parsePositiveInt(arg, args[++i]);
    } else if (arg === '--output-dir' || arg === '-o') {
      const dir = args[++i];
      if (!dir) {
        throw new AppError(`${arg} expects a directory`, 'INVALID_ARGUMENT');
      }
      options.outputDir = dir;
    } else if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else {
      throw new AppError(`Unknown argument: ${arg}`, 'INVALID_ARGUMENT');
    }
  }

  return options;
}

export type GenerateSummary = {
  scenarios: ScenarioKey[];
  prompts: Partial<Record<ScenarioKey, string[]>>;
  files: string[];
};

/**
 * Generate and save prompts. `print` receives the human-readable progress.
 */
export async function runGenerate(
  options: GenerateOptions,
  generator: ScenarioGenerator = new ScenarioGenerator(
    config.scenarios.templateDir,
    createRewriter(config.scenarios.rewriter)
  ),
  print: (line: string) => void = line => console.log(line)
): Promise<GenerateSummary> {
  const scenarios = options.scenarios === 'all' ? generator.getScenarioNames() : options.scenarios;

  print(`Generating prompts for scenarios: ${scenarios.join(', ')}`);
  print(`Number of prompts per scenario: ${options.numPrompts}`);

  const prompts = await withLogContext({ runId: createRunId() }, () =>
    generator.generateAttackPrompts(scenarios, options.numPrompts)
  );

  for (const scenario of scenarios) {
    print(`\n${scenario}:`);
    (prompts[scenario] ?? []).forEach((prompt, index) => {
      print(`  Prompt ${index + 1}: ${safeSnippet(prompt, 100)}`);
    });
  }

  const files = generator.saveGeneratedPrompts(options.outputDir);
  for (const file of files) {
    print(`Saved prompts to ${file}`);
  }
  print('\nAttack prompt generation completed!');

  return { scenarios, prompts, files };
}
