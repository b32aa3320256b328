/**
 * Sensitive data masking for audit records
 *
 * Patterns run in a fixed order, each once over the running text. Every
 * replacement is outside its own pattern's language and every later
 * pattern's, so masking an already-masked value changes nothing.
 *
 * Numeric patterns only match a whole hyphen-chained run: they never start
 * right after "<digit or *>-" nor end right before "-<digit or *>".
 */

import { isPlainObject } from '../utils/json.js';

type Replacer = (match: string, ...groups: string[]) => string;

interface MaskingRule {
  name: string;
  pattern: RegExp;
  replace: Replacer;
}

const NOT_CHAINED_BEFORE = String.raw`(?<![\d*]-)`;
const NOT_CHAINED_AFTER = String.raw`(?!-[\d*])`;

function numeric(body: string): RegExp {
  return new RegExp(`${NOT_CHAINED_BEFORE}\\b${body}\\b${NOT_CHAINED_AFTER}`, 'g');
}

function stars(count: number): string {
  return '*'.repeat(Math.max(count, 0));
}

export const MASKING_RULES: readonly MaskingRule[] = [
  {
    name: 'national_id',
    pattern: numeric(String.raw`\d{6}-?\d{7}`),
    replace: () => '******-*******',
  },
  {
    name: 'card',
    pattern: numeric(String.raw`(\d{4})-?(\d{4})-?(\d{4})-?(\d{4})`),
    replace: (_match, _g1, _g2, _g3, last = '') => `****-****-****-${last}`,
  },
  {
    name: 'email',
    pattern: /\b([A-Za-z0-9._%+-]+)@([A-Za-z0-9.-]+\.[A-Za-z]{2,})\b/g,
    replace: (_match, local = '', domain = '') => `${local.charAt(0)}${stars(local.length - 1)}@${domain}`,
  },
  {
    name: 'phone',
    pattern: numeric(String.raw`(01[016789])-?(\d{3,4})-?(\d{4})`),
    replace: (_match, prefix = '', _middle, last = '') => `${prefix}-****-${last}`,
  },
  {
    name: 'account',
    pattern: numeric(String.raw`(\d{3})-(\d{2,6})-(\d{2,6})`),
    replace: (_match, bank = '', middle = '', tail = '') =>
      `${bank}-${stars(middle.length)}-${stars(tail.length - 3)}${tail.slice(-3)}`,
  },
];

/**
 * Mask every sensitive substring of a string
 */
export function maskString(text: string): string {
  let result = text;
  for (const rule of MASKING_RULES) {
    result = result.replace(rule.pattern, rule.replace);
  }
  return result;
}

/**
 * Mask strings anywhere inside arrays and plain objects
 *
 * Numbers, booleans and null pass through untouched.
 */
export function maskValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return maskString(value);
  }
  if (Array.isArray(value)) {
    return value.map(item => maskValue(item));
  }
  if (isPlainObject(value)) {
    const masked: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      masked[key] = maskValue(item);
    }
    return masked;
  }
  return value;
}

/**
 * Mask a params or response payload
 *
 * A string holding a JSON object or array is parsed and masked as structure;
 * any other string is masked as text.
 */
export function maskPayload(payload: unknown): unknown {
  if (payload === null || payload === undefined) {
    return null;
  }
  if (typeof payload === 'string') {
    const structured = parseStructured(payload);
    return structured === undefined ? maskString(payload) : maskValue(structured);
  }
  return maskValue(payload);
}

function parseStructured(text: string): unknown {
  const trimmed = text.trimStart();
  if (!trimmed.startsWith('{') && !trimmed.startsWith('[')) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return Array.isArray(parsed) || isPlainObject(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}
