/**
 * @fileoverview Attack prompt generation.
 *
 * Loads the scenario templates, asks a rewriter for variants of each and
 * keeps them per scenario until they are saved. The prompts are stimuli for
 * exercising the security proxy; nothing here sends email.
 */
import { safeExecute } from '../../../utils/errors.js';
import { createLogger, type AppLogger } from '../../../utils/observability/index.js';
import { loadScenarios, writeGeneratedPrompts } from '../repo/filesystem.js';
import { isScenarioKey, type AttackScenario, type ScenarioKey } from '../types.js';
import type { ScenarioRewriter } from './rewriter.js';

export class ScenarioGenerator {
  private readonly scenarios: Map<ScenarioKey, AttackScenario>;

  constructor(
    templateDir: string,
    private readonly rewriter: ScenarioRewriter,
    private readonly logger: AppLogger = createLogger({ domain: 'attack-scenarios' })
  ) {
    this.scenarios = new Map(loadScenarios(templateDir, logger).map(s => [s.key, s]));
  }

  getScenarioNames(): ScenarioKey[] {
    return Array.from(this.scenarios.keys());
  }

  getScenario(key: ScenarioKey): AttackScenario | undefined {
    return this.scenarios.get(key);
  }

  /**
   * Generate `count` prompts for each named scenario.
   *
   * Unknown names are logged and skipped. A rewrite that fails is logged
   * and left out, so a scenario may come back with fewer than `count`.
   */
  async generateAttackPrompts(names: readonly string[], count: number): Promise<Partial<Record<ScenarioKey, string[]>>> {
    const results: Partial<Record<ScenarioKey, string[]>> = {};

    for (const name of names) {
      const scenario = isScenarioKey(name) ? this.scenarios.get(name) : undefined;
      if (!scenario) {
        this.logger.warn('unknown_scenario', { scenario: name });
        continue;
      }

      this.logger.info('scenario_generation_started', { scenario: scenario.key, count });
      const prompts: string[] = [];

      for (let i = 0; i < count; i++) {
        const rewritten = await safeExecute(
          () => this.rewriter.rewrite(scenario.templateContent),
          `rewrite_${scenario.key}`
        );
        if (rewritten.success) {
          prompts.push(rewritten.data);
          scenario.generatedPrompts.push(rewritten.data);
        }
      }

      results[scenario.key] = prompts;
    }

    return results;
  }

  /**
   * Save every scenario's accumulated prompts under `outputDir`.
   */
  saveGeneratedPrompts(outputDir: string): string[] {
    const written = writeGeneratedPrompts(Array.from(this.scenarios.values()), outputDir);
    for (const file of written) {
      this.logger.info('scenario_prompts_saved', { file });
    }
    return written;
  }
}
