/**
 * Filesystem repository for scenario templates and generated prompt sets.
 */
import fs from 'fs';
import path from 'path';
import type { AppLogger } from '../../../utils/observability/index.js';
import {
  SCENARIO_DISPLAY_NAMES,
  SCENARIO_KEYS,
  type AttackScenario,
  type GeneratedPromptsFile,
} from '../types.js';

/**
 * Load every known scenario from `<templateDir>/<key>.txt`.
 * A missing template is replaced by a placeholder and logged; any other
 * read error propagates.
 */
export function loadScenarios(templateDir: string, logger: AppLogger): AttackScenario[] {
  return SCENARIO_KEYS.map(key => {
    const name = SCENARIO_DISPLAY_NAMES[key];
    const templatePath = path.join(templateDir, `${key}.txt`);

    if (!fs.existsSync(templatePath)) {
      logger.warn('scenario_template_missing', { scenario: key, templatePath });
      return {
        key,
        name,
        templatePath,
        templateContent: `Default ${name} template content`,
        usedDefaultTemplate: true,
        generatedPrompts: [],
      };
    }

    return {
      key,
      name,
      templatePath,
      templateContent: fs.readFileSync(templatePath, 'utf-8'),
      usedDefaultTemplate: false,
      generatedPrompts: [],
    };
  });
}

/**
 * Write `<key>_prompts.json` for each scenario that has prompts.
 * Creates `outputDir` if needed. Returns the written file paths.
 */
export function writeGeneratedPrompts(scenarios: readonly AttackScenario[], outputDir: string): string[] {
  const withPrompts = scenarios.filter(s => s.generatedPrompts.length > 0);
  if (withPrompts.length === 0) return [];

  fs.mkdirSync(outputDir, { recursive: true });

  return withPrompts.map(scenario => {
    const outputFile = path.join(outputDir, `${scenario.key}_prompts.json`);
    const payload: GeneratedPromptsFile = {
      scenario: scenario.key,
      prompts: scenario.generatedPrompts,
    };
    fs.writeFileSync(outputFile, JSON.stringify(payload, null, 2), 'utf-8');
    return outputFile;
  });
}
