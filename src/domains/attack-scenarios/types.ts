/**
 * Attack scenario type definitions.
 */

export const SCENARIO_KEYS = [
  'Privacy_Harvesting',
  'Phishing_Email_Sending',
  'Deceptive_Output',
  'Email_Service_Pollution',
] as const;

export type ScenarioKey = (typeof SCENARIO_KEYS)[number];

export const SCENARIO_DISPLAY_NAMES: Readonly<Record<ScenarioKey, string>> = {
  Privacy_Harvesting: 'Privacy Harvesting',
  Phishing_Email_Sending: 'Phishing Email Sending',
  Deceptive_Output: 'Deceptive Output',
  Email_Service_Pollution: 'Email Service Pollution',
};

export function isScenarioKey(value: string): value is ScenarioKey {
  return SCENARIO_KEYS.some(key => key === value);
}

export type AttackScenario = {
  key: ScenarioKey;
  name: string;
  templatePath: string;
  templateContent: string;
  /** True when the template file was missing and a placeholder was used */
  usedDefaultTemplate: boolean;
  generatedPrompts: string[];
};

export type GeneratedPromptsFile = {
  scenario: ScenarioKey;
  prompts: string[];
};
