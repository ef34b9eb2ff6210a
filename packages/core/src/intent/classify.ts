/**
 * Free text → Action.
 * Pure: the result depends only on the input text and the static rule tables.
 */

import { INTENT_RISK, type Action } from '../actions/types.js';
import { isIdentifier, isTableRef } from '../actions/identifiers.js';
import { normalizeRequest } from './normalize.js';
import { ADMIN_RULES, STAR_RULES, type IntentRule } from './rules.js';

export type RuleScope = 'admin' | 'star' | 'both';

export interface ClassifyOptions {
  /** Which rule tables to search. Admin rules precede star rules under 'both'. */
  scope?: RuleScope;
}

function rulesFor(scope: RuleScope): readonly IntentRule[] {
  switch (scope) {
    case 'admin':
      return ADMIN_RULES;
    case 'star':
      return STAR_RULES;
    case 'both':
      return [...ADMIN_RULES, ...STAR_RULES];
  }
}

interface Captured {
  table?: string;
  column?: string;
  options: Record<string, string>;
}

function capture(rule: IntentRule, match: RegExpExecArray): Captured | null {
  const captured: Captured = { options: {} };
  for (let i = 0; i < rule.slots.length; i++) {
    const slot = rule.slots[i];
    const value = (match[i + 1] ?? '').trim();
    if (slot === 'table') {
      if (!isTableRef(value)) return null;
      captured.table = value;
    } else if (slot === 'column') {
      if (!isIdentifier(value)) return null;
      captured.column = value;
    } else if (value) {
      captured.options[slot.slice('options.'.length)] = value;
    }
  }
  return captured;
}

function cleanList(raw: string): string {
  return raw
    .replace(/[^a-z0-9_, ]/g, '')
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .join(', ');
}

function fillTemplate(template: string, captured: Captured): string {
  return template.replace(/\{([a-z.]+)\}/g, (whole, key: string) => {
    if (key === 'table') return captured.table ?? whole;
    if (key === 'column') return captured.column ?? whole;
    if (key.startsWith('options.')) return captured.options[key.slice('options.'.length)] ?? whole;
    return whole;
  });
}

export function classifyRequest(text: string, opts: ClassifyOptions = {}): Action {
  const normalized = normalizeRequest(text);
  if (!normalized) {
    return { kind: 'unknown', raw: text };
  }

  for (const rule of rulesFor(opts.scope ?? 'both')) {
    const match = rule.pattern.exec(normalized);
    if (!match) continue;

    const captured = capture(rule, match);
    if (!captured) continue;

    if (rule.body) {
      const { option, list } = rule.body;
      const body = list ? cleanList(captured.options[option] ?? '') : (captured.options[option] ?? '');
      if (list && body && !body.split(', ').every(isIdentifier)) continue;
      if (!body) {
        return {
          kind: 'clarification',
          raw: text,
          intent: rule.intent,
          question: fillTemplate(rule.body.question, captured),
        };
      }
      captured.options[option] = body;
    }

    return {
      kind: 'action',
      intent: rule.intent,
      ...(captured.table !== undefined ? { table: captured.table } : {}),
      ...(captured.column !== undefined ? { column: captured.column } : {}),
      options: captured.options,
      risk: INTENT_RISK[rule.intent],
      note: fillTemplate(rule.note, captured),
      raw: text,
    };
  }

  return { kind: 'unknown', raw: text };
}

/**
 * Split multi-request input into individual request lines. Newlines and
 * semicolons both separate requests.
 */
export function splitRequests(text: string): string[] {
  return text
    .split(/[\n;]+/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export function classifyRequests(text: string, opts: ClassifyOptions = {}): Action[] {
  return splitRequests(text).map((line) => classifyRequest(line, opts));
}
