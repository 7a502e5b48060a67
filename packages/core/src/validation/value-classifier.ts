import type { Claim } from '@triangulate/shared/src/types/research.types.js';
import { normalizeText } from '../embedding/embedding-text-builder.js';

export type ClaimValue =
  | { readonly kind: 'numeric'; readonly low: number; readonly high: number; readonly unit: string }
  | { readonly kind: 'date'; readonly date: string }
  | { readonly kind: 'boolean'; readonly polarity: boolean; readonly subject: string }
  | { readonly kind: 'text'; readonly normalized: string };

export interface ClassifiedClaim {
  readonly value: ClaimValue;
  readonly topic: string;
}

const MAX_BOOLEAN_WORDS = 20;

const MONTHS = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
];

const MONTH_PATTERN = String.raw`(jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)`;

const ISO_DATE = /\b(\d{4})-(\d{2})(?:-(\d{2}))?\b/;
const DAY_MONTH_YEAR = new RegExp(
  String.raw`\b(\d{1,2})(?:st|nd|rd|th)?\s+${MONTH_PATTERN}\.?,?\s+(\d{4})\b`,
  'i',
);
const MONTH_DAY_YEAR = new RegExp(
  String.raw`\b${MONTH_PATTERN}\.?\s+(?:(\d{1,2})(?:st|nd|rd|th)?,?\s+)?(\d{4})\b`,
  'i',
);

const NUMBER = String.raw`\d+(?:,\d{3})*(?:\.\d+)?`;

const SCALES: Readonly<Record<string, number>> = {
  thousand: 1e3,
  million: 1e6,
  billion: 1e9,
  bn: 1e9,
  trillion: 1e12,
};

const UNIT_ALIASES: Readonly<Record<string, string>> = {
  '%': '%',
  percent: '%',
  'per cent': '%',
  km: 'km',
  kilometers: 'km',
  kilometres: 'km',
  kg: 'kg',
  kilograms: 'kg',
  mph: 'mph',
  'km/h': 'km/h',
  '°c': '°c',
  celsius: '°c',
  '°f': '°f',
  fahrenheit: '°f',
  years: 'year',
  year: 'year',
  days: 'day',
  day: 'day',
  hours: 'hour',
  hour: 'hour',
  usd: 'usd',
  dollars: 'usd',
  eur: 'eur',
  euros: 'eur',
};

const CURRENCY_SYMBOLS: Readonly<Record<string, string>> = { $: 'usd', '€': 'eur', '£': 'gbp' };

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

const UNIT_PATTERN = Object.keys(UNIT_ALIASES)
  .sort((a, b) => b.length - a.length)
  .map((unit) => (/\w$/.test(unit) ? `${escapeRegExp(unit)}\\b` : escapeRegExp(unit)))
  .join('|');

const SCALE_PATTERN = Object.keys(SCALES).join('|');

const NUMERIC = new RegExp(
  String.raw`(?<![\w.-])(-)?([$€£])?\s?(${NUMBER})(?:\s*(?:-|–|to)\s*[$€£]?(${NUMBER}))?(?:\s*(${SCALE_PATTERN})\b)?(?:\s*(${UNIT_PATTERN}))?`,
  'gi',
);

const NEGATION = /\b(?:not|no|never|none|cannot|neither|nor)\b|n't\b/i;

const CONTRACTIONS: ReadonlyArray<readonly [RegExp, string]> = [
  [/\bcan't\b|\bcannot\b/g, 'can'],
  [/\bwon't\b/g, 'will'],
  [/\bshan't\b/g, 'shall'],
  [/n't\b/g, ''],
  [/\b(?:not|never|no|neither|nor)\b/g, ''],
];

interface ValueMatch {
  readonly value: ClaimValue;
  readonly start: number;
  readonly end: number;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

function monthIndex(name: string): number {
  const prefix = name.toLowerCase().slice(0, 3);
  return MONTHS.findIndex((month) => month.startsWith(prefix)) + 1;
}

function buildDate(year: string, month: number, day?: string): string | null {
  if (month < 1 || month > 12) {
    return null;
  }
  if (day === undefined) {
    return `${year}-${pad(month)}`;
  }
  const dayNumber = Number(day);
  if (dayNumber < 1 || dayNumber > 31) {
    return null;
  }
  return `${year}-${pad(month)}-${pad(dayNumber)}`;
}

function matchDate(statement: string): ValueMatch | null {
  const candidates: ValueMatch[] = [];

  const iso = ISO_DATE.exec(statement);
  if (iso) {
    const date = buildDate(iso[1], Number(iso[2]), iso[3]);
    if (date) {
      candidates.push({ value: { kind: 'date', date }, start: iso.index, end: iso.index + iso[0].length });
    }
  }

  const dayFirst = DAY_MONTH_YEAR.exec(statement);
  if (dayFirst) {
    const date = buildDate(dayFirst[3], monthIndex(dayFirst[2]), dayFirst[1]);
    if (date) {
      candidates.push({
        value: { kind: 'date', date },
        start: dayFirst.index,
        end: dayFirst.index + dayFirst[0].length,
      });
    }
  }

  const monthFirst = MONTH_DAY_YEAR.exec(statement);
  if (monthFirst) {
    const date = buildDate(monthFirst[3], monthIndex(monthFirst[1]), monthFirst[2]);
    if (date) {
      candidates.push({
        value: { kind: 'date', date },
        start: monthFirst.index,
        end: monthFirst.index + monthFirst[0].length,
      });
    }
  }

  return candidates.sort((a, b) => a.start - b.start || b.end - a.end)[0] ?? null;
}

function parseNumber(text: string): number {
  return Number(text.replace(/,/g, ''));
}

function isBareYear(match: RegExpMatchArray): boolean {
  const [, sign, currency, first, second, scale, unit] = match;
  if (sign || currency || second || scale || unit) {
    return false;
  }
  return /^[12]\d{3}$/.test(first);
}

function matchNumeric(statement: string): ValueMatch | null {
  const matches = [...statement.matchAll(NUMERIC)];
  if (matches.length === 0) {
    return null;
  }

  const withUnit = matches.find((m) => Boolean(m[2] ?? m[5] ?? m[6]));
  const notYear = matches.find((m) => !isBareYear(m));
  const chosen = withUnit ?? notYear ?? matches[0];

  const [text, sign, currency, first, second, scaleWord, unitWord] = chosen;
  const scale = scaleWord ? (SCALES[scaleWord.toLowerCase()] ?? 1) : 1;
  const direction = sign ? -1 : 1;
  const firstValue = direction * parseNumber(first) * scale;
  const secondValue = second !== undefined ? direction * parseNumber(second) * scale : firstValue;

  const unit = currency
    ? (CURRENCY_SYMBOLS[currency] ?? '')
    : unitWord
      ? (UNIT_ALIASES[unitWord.toLowerCase()] ?? unitWord.toLowerCase())
      : '';

  const start = chosen.index ?? 0;
  return {
    value: {
      kind: 'numeric',
      low: Math.min(firstValue, secondValue),
      high: Math.max(firstValue, secondValue),
      unit,
    },
    start,
    end: start + text.length,
  };
}

/** Lowercases, collapses whitespace and trims dangling punctuation. */
export function normalizeTopic(text: string): string {
  return normalizeText(text)
    .replace(/\s+([.,;:!?])/g, '$1')
    .replace(/^[\s.,;:!?-]+|[\s.,;:!?-]+$/g, '');
}

function stripNegation(statement: string): string {
  let result = statement.toLowerCase();
  for (const [pattern, replacement] of CONTRACTIONS) {
    result = result.replace(pattern, replacement);
  }
  return result;
}

function isShortAssertion(statement: string): boolean {
  const sentences = statement.trim().split(/[.!?]\s+/).filter((s) => s.length > 0);
  const words = statement.trim().split(/\s+/).length;
  return sentences.length <= 1 && words <= MAX_BOOLEAN_WORDS;
}

export function classifyValue(statement: string): ValueMatch {
  const date = matchDate(statement);
  if (date) {
    return date;
  }

  const numeric = matchNumeric(statement);
  if (numeric) {
    return numeric;
  }

  if (isShortAssertion(statement)) {
    return {
      value: {
        kind: 'boolean',
        polarity: !NEGATION.test(statement),
        subject: normalizeTopic(stripNegation(statement)),
      },
      start: 0,
      end: 0,
    };
  }

  return { value: { kind: 'text', normalized: normalizeTopic(statement) }, start: 0, end: 0 };
}

function deriveTopic(statement: string, match: ValueMatch): string {
  switch (match.value.kind) {
    case 'numeric':
    case 'date':
      return normalizeTopic(`${statement.slice(0, match.start)} ${statement.slice(match.end)}`);
    case 'boolean':
      return match.value.subject;
    case 'text':
      return match.value.normalized;
  }
}

/**
 * Picks the comparator for a claim and derives its topic: the statement with
 * the asserted value removed. An agent-supplied topic takes precedence.
 */
export function classifyClaim(claim: Claim): ClassifiedClaim {
  const match = classifyValue(claim.statement);
  const topic = claim.topic ? normalizeTopic(claim.topic) : deriveTopic(claim.statement, match);
  return { value: match.value, topic };
}
