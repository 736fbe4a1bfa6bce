// src/agents/intent-detector.ts

/**
 * @file Keyword/pattern based intent detection, used when model output carries no
 * usable structured action. Rules are data (`intent-patterns.json`): each rule
 * lists regular expressions and a parameter template whose `$1`, `$2`, ...
 * placeholders are filled from the first matching expression's capture groups.
 */

import { ConfigurationError } from '../core/errors';
import { ToolParams } from '../core/tool';
import { isRecord } from '../core/utils';
import { MultiStepAction, UseToolAction } from './types';
import bundledIntentRules from './intent-patterns.json';

type TemplateValue = string | number | boolean | null | TemplateValue[] | { [key: string]: TemplateValue };

export type IntentTransform = 'url' | 'trimPunctuation' | 'lower' | 'stripShellSuffix';

interface ToolIntentRule {
  kind: 'tool';
  id: string;
  tool: string;
  patterns: RegExp[];
  params: Record<string, TemplateValue>;
  transforms: Record<string, IntentTransform[]>;
  defaults: Record<string, string>;
}

interface StepsIntentRule {
  kind: 'steps';
  id: string;
  patterns: RegExp[];
  steps: UseToolAction[];
}

export type IntentRule = ToolIntentRule | StepsIntentRule;

export interface IntentRuleSet {
  minInputLength: number;
  questionPattern: RegExp;
  rules: IntentRule[];
}

export interface DetectedIntent {
  action: UseToolAction | MultiStepAction;
  ruleId: string;
}

const TRANSFORMS: Record<IntentTransform, (value: string) => string> = {
  url: (value) => {
    const cleaned = value.trim().replace(/[.,;:!?]+$/, '');
    return cleaned.toLowerCase().startsWith('http') ? cleaned : `https://${cleaned}`;
  },
  trimPunctuation: (value) => value.replace(/[.,;:]+$/, ''),
  lower: (value) => value.toLowerCase(),
  stripShellSuffix: (value) => value.replace(/\s+(?:di|in|on)\s+(?:the\s+)?(?:terminal|shell|console|cmd)\s*$/i, ''),
};

function isTransform(value: unknown): value is IntentTransform {
  return typeof value === 'string' && value in TRANSFORMS;
}

function isTemplateValue(value: unknown): value is TemplateValue {
  if (value === null || ['string', 'number', 'boolean'].includes(typeof value)) {
    return true;
  }
  if (Array.isArray(value)) {
    return value.every(isTemplateValue);
  }
  return isRecord(value) && Object.values(value).every(isTemplateValue);
}

function compilePatterns(raw: unknown, ruleId: string): RegExp[] {
  if (!Array.isArray(raw) || raw.length === 0) {
    throw new ConfigurationError(`Intent rule "${ruleId}" must list at least one pattern.`);
  }
  return raw.map((source: unknown) => {
    if (typeof source !== 'string') {
      throw new ConfigurationError(`Intent rule "${ruleId}" has a non-string pattern.`);
    }
    try {
      return new RegExp(source, 'i');
    } catch (error: unknown) {
      throw new ConfigurationError(`Intent rule "${ruleId}" has an invalid pattern: ${source}`, {
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  });
}

function toToolParams(raw: unknown, where: string): ToolParams {
  if (!isRecord(raw)) {
    throw new ConfigurationError(`${where}: "params" must be an object.`);
  }
  return { ...raw };
}

function parseRule(raw: unknown, index: number): IntentRule {
  if (!isRecord(raw)) {
    throw new ConfigurationError(`Intent rule #${index} must be an object.`);
  }
  const id = typeof raw.id === 'string' ? raw.id : `rule-${index}`;
  const patterns = compilePatterns(raw.patterns, id);

  if (Array.isArray(raw.steps)) {
    const steps = raw.steps.map((step: unknown, stepIndex: number): UseToolAction => {
      const where = `Intent rule "${id}" step #${stepIndex}`;
      if (!isRecord(step) || typeof step.tool !== 'string') {
        throw new ConfigurationError(`${where} must name a tool.`);
      }
      return { type: 'use_tool', tool: step.tool, params: toToolParams(step.params ?? {}, where) };
    });
    return { kind: 'steps', id, patterns, steps };
  }

  if (typeof raw.tool !== 'string' || !isRecord(raw.params)) {
    throw new ConfigurationError(`Intent rule "${id}" needs either "steps" or both "tool" and "params".`);
  }
  const params: Record<string, TemplateValue> = {};
  for (const [key, value] of Object.entries(raw.params)) {
    if (!isTemplateValue(value)) {
      throw new ConfigurationError(`Intent rule "${id}" has an unsupported value for "${key}".`);
    }
    params[key] = value;
  }

  const transforms: Record<string, IntentTransform[]> = {};
  if (isRecord(raw.transforms)) {
    for (const [key, list] of Object.entries(raw.transforms)) {
      if (!Array.isArray(list) || !list.every(isTransform)) {
        throw new ConfigurationError(`Intent rule "${id}" has unknown transforms for "${key}".`);
      }
      transforms[key] = list;
    }
  }

  const defaults: Record<string, string> = {};
  if (isRecord(raw.defaults)) {
    for (const [key, value] of Object.entries(raw.defaults)) {
      if (typeof value === 'string') {
        defaults[key] = value;
      }
    }
  }

  return { kind: 'tool', id, tool: raw.tool, patterns, params, transforms, defaults };
}

/**
 * Validates raw rule data (parsed JSON) and compiles its expressions.
 * @throws ConfigurationError on malformed rules or invalid expressions.
 */
export function parseIntentRuleSet(raw: unknown): IntentRuleSet {
  if (!isRecord(raw) || !Array.isArray(raw.rules)) {
    throw new ConfigurationError('Intent rule set must be an object with a "rules" array.');
  }
  if (typeof raw.questionPattern !== 'string') {
    throw new ConfigurationError('Intent rule set needs a "questionPattern".');
  }
  return {
    minInputLength: typeof raw.minInputLength === 'number' ? raw.minInputLength : 3,
    questionPattern: new RegExp(raw.questionPattern, 'i'),
    rules: raw.rules.map((rule: unknown, index: number) => parseRule(rule, index)),
  };
}

interface FillResult {
  value: TemplateValue;
  /** A placeholder resolved to an empty capture. */
  missing: boolean;
}

function fillTemplate(template: TemplateValue, captures: string[]): FillResult {
  if (typeof template === 'string') {
    let missing = false;
    const value = template.replace(/\$(\d)/g, (_placeholder, digit: string) => {
      const captured = (captures[Number(digit)] ?? '').trim();
      if (captured === '') {
        missing = true;
      }
      return captured;
    });
    return { value, missing };
  }
  if (Array.isArray(template)) {
    const filled = template.map((item) => fillTemplate(item, captures));
    return { value: filled.map((f) => f.value), missing: filled.some((f) => f.missing) };
  }
  if (template !== null && typeof template === 'object') {
    const value: { [key: string]: TemplateValue } = {};
    let missing = false;
    for (const [key, item] of Object.entries(template)) {
      const filled = fillTemplate(item, captures);
      value[key] = filled.value;
      missing = missing || filled.missing;
    }
    return { value, missing };
  }
  return { value: template, missing: false };
}

export class IntentDetector {
  private readonly ruleSet: IntentRuleSet;

  constructor(ruleSet: IntentRuleSet = parseIntentRuleSet(bundledIntentRules)) {
    this.ruleSet = ruleSet;
  }

  /** True when the text opens like a question ("what", "why", "apa", "siapa", ...). */
  isQuestion(text: string): boolean {
    return this.ruleSet.questionPattern.test(text);
  }

  /**
   * Guesses a tool action from the user's own words. Returns null for short
   * inputs, questions, and matches whose parameters come out empty.
   */
  detect(userInput: string): DetectedIntent | null {
    const text = userInput.trim();
    if (text.length < this.ruleSet.minInputLength || this.isQuestion(text)) {
      return null;
    }

    for (const rule of this.ruleSet.rules) {
      for (const pattern of rule.patterns) {
        const match = pattern.exec(text);
        if (!match) {
          continue;
        }
        if (rule.kind === 'steps') {
          return {
            action: {
              type: 'multi_step',
              steps: rule.steps.map((s) => ({ type: 'use_tool', tool: s.tool, params: { ...s.params } })),
            },
            ruleId: rule.id,
          };
        }
        const params = this.buildParams(rule, Array.from(match, (group) => group ?? ''));
        if (params) {
          console.info(`[IntentDetector] Detected ${rule.tool} (${rule.id}) from "${text.slice(0, 60)}"`);
          return { action: { type: 'use_tool', tool: rule.tool, params }, ruleId: rule.id };
        }
      }
    }
    return null;
  }

  private buildParams(rule: ToolIntentRule, captures: string[]): ToolParams | null {
    const params: ToolParams = {};
    for (const [key, template] of Object.entries(rule.params)) {
      const filled = fillTemplate(template, captures);
      let value = filled.value;
      if (typeof value === 'string') {
        for (const transform of rule.transforms[key] ?? []) {
          value = TRANSFORMS[transform](value);
        }
        value = value.trim();
        if (value === '' && rule.defaults[key] !== undefined) {
          value = rule.defaults[key];
        } else if (value === '' || filled.missing) {
          return null;
        }
      } else if (filled.missing) {
        return null;
      }
      params[key] = value;
    }

    const strings = Object.values(params).filter((v): v is string => typeof v === 'string');
    if (strings.length === 0 || strings.every((v) => v.trim() === '')) {
      return null;
    }
    return params;
  }
}
