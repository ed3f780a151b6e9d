/**
 * Unit tests for the attack prompt generator CLI.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { parseGenerateArgs, runGenerate } from '../../../src/cli/generate-attack-prompts.js';
import { ScenarioGenerator, SimulatedRewriter } from '../../../src/domains/attack-scenarios/index.js';
import { AppError } from '../../../src/utils/errors.js';
import { createFakeLogger } from '../../helpers/logger.js';

describe('parseGenerateArgs', () => {
  it('uses configured defaults', () => {
    expect(parseGenerateArgs([])).toEqual({
      scenarios: 'all',
      numPrompts: 5,
      outputDir: 'generated_prompts',
      help: false,
    });
  });

  it('reads scenario names, count and output directory', () => {
    expect(
      parseGenerateArgs(['--scenarios', 'Deceptive_Output', 'Privacy_Harvesting', '-n', '3', '-o', './out'])
    ).toEqual({
      scenarios: ['Deceptive_Output', 'Privacy_Harvesting'],
      numPrompts: 3,
      outputDir: './out',
      help: false,
    });
  });

  it('treats "all" among the names as every scenario', () => {
    expect(parseGenerateArgs(['-s', 'Deceptive_Output', 'all']).scenarios).toBe('all');
  });

  it('rejects unknown scenarios', () => {
    expect(() => parseGenerateArgs(['--scenarios', 'Bogus'])).toThrow('Unknown scenario: Bogus');
  });

  it('rejects a non-positive prompt count', () => {
    expect(() => parseGenerateArgs(['--num-prompts', '0'])).toThrow(AppError);
    expect(() => parseGenerateArgs(['--num-prompts'])).toThrow('--num-prompts expects a positive integer, got (nothing)');
  });

  it('rejects unknown flags', () => {
    expect(() => parseGenerateArgs(['--verbose'])).toThrow('Unknown argument: --verbose');
  });

  it('recognizes --help', () => {
    expect(parseGenerateArgs(['-h']).help).toBe(true);
  });
});

describe('runGenerate', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'generate-cli-'));
    fs.writeFileSync(path.join(tmpDir, 'Deceptive_Output.txt'), 'TEMPLATE');
  });

  it('generates, prints and saves prompts', async () => {
    const generator = new ScenarioGenerator(tmpDir, new SimulatedRewriter(() => 0), createFakeLogger());
    const lines: string[] = [];
    const outputDir = path.join(tmpDir, 'out');

    const summary = await runGenerate(
      { scenarios: ['Deceptive_Output'], numPrompts: 1, outputDir, help: false },
      generator,
      line => lines.push(line)
    );

    expect(summary.files).toEqual([path.join(outputDir, 'Deceptive_Output_prompts.json')]);
    expect(summary.prompts.Deceptive_Output).toHaveLength(1);
    expect(lines[0]).toBe('Generating prompts for scenarios: Deceptive_Output');
    expect(lines[1]).toBe('Number of prompts per scenario: 1');
    expect(lines[lines.length - 1]).toBe('\nAttack prompt generation completed!');
  });

  it('expands "all" to every scenario', async () => {
    const generator = new ScenarioGenerator(tmpDir, new SimulatedRewriter(() => 0), createFakeLogger());

    const summary = await runGenerate(
      { scenarios: 'all', numPrompts: 1, outputDir: path.join(tmpDir, 'out'), help: false },
      generator,
      () => undefined
    );

    expect(summary.scenarios).toHaveLength(4);
    expect(summary.files).toHaveLength(4);
  });
});
