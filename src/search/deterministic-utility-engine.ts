/**
 * Deterministic utility engine: calculator, percent-of and unit conversion.
 * Pure string matching, no model or tool calls. Tried before anything else in a turn.
 *
 * Two tiers:
 *  - high: strict shapes ("15% of 230", "5 * 12", "100 F to C")
 *  - medium: conversational wrappers ("if I set it to 72F what is that in C"),
 *    only considered when a cue word plus a number/unit or an operator is present.
 */
import {
  evaluateArithmetic,
  formatArithmeticResult,
  formatGrouped2,
  roundAwayFromZero,
} from '@/search/arithmetic';

export type MatchConfidence = 'high' | 'medium';

export interface DeterministicResult {
  category: 'calculator' | 'conversion';
  answer: string;
}

export interface DeterministicMatch {
  result: DeterministicResult;
  confidence: MatchConfidence;
}

const UNIT =
  'fahrenheit|celsius|kelvin|f|c|k|lbs?|pounds?|kg|kilograms?|oz|ounces?|grams?|g|miles?|mi|km|kilometers?|inches?|in|cm|centimeters?';
const TEMP_UNIT = 'fahrenheit|celsius|kelvin|f|c|k';

const STRICT_CONVERSION = new RegExp(
  `(?:convert\\s+)?(?<value>-?\\d+(?:\\.\\d+)?)\\s*(?:°\\s*)?(?<from>${UNIT})\\s+(?:to|in|into)\\s*(?:°\\s*)?(?<to>${UNIT})\\b`,
  'i',
);
const WRAPPER_TEMPERATURE = new RegExp(
  `(?:if\\s+i\\s+set\\s+it\\s+to|set\\s+it\\s+to|set\\s+to)\\s*(?<value>-?\\d+(?:\\.\\d+)?)\\s*(?:°\\s*)?(?<from>${TEMP_UNIT})\\b.*?\\b(?:to|in|into)\\s*(?:°\\s*)?(?<to>${TEMP_UNIT})\\b`,
  'i',
);
const VALUE_UNIT = new RegExp(`(?<value>-?\\d+(?:\\.\\d+)?)\\s*(?:°\\s*)?(?<unit>${UNIT})\\b`, 'i');
const TARGET_UNIT = new RegExp(`\\b(?:to|in|into)\\s*(?:°\\s*)?(?<unit>${UNIT})\\b`, 'gi');
const UNIT_TOKEN = new RegExp(`\\b(?:${UNIT})\\b`, 'i');

const PERCENT_OF = /(?:what(?:'s| is)\s+)?(?<pct>\d+(?:\.\d+)?)\s*%\s*(?:of)\s*(?<base>\d+(?:\.\d+)?)/i;
const CALC = /^(?:what(?:'s| is)\s+|calculate\s+|compute\s+|solve\s+)?(?<expr>\d[\d\s.+\-*/%()]+\d)$/i;
const HAS_OPERATOR = /[+\-*/]/;

const CONVERSATIONAL_CUES = [
  'if i set it to',
  'set it to',
  'what is that in',
  "what's that in",
  'convert',
  'calculate',
  'compute',
  'solve',
];
const ARITHMETIC_CUES = ['+', '-', '*', '/', 'plus', 'minus', 'times', 'divided by', 'percent', '%'];

type CanonicalUnit =
  | 'fahrenheit'
  | 'celsius'
  | 'kelvin'
  | 'lbs'
  | 'kg'
  | 'oz'
  | 'grams'
  | 'miles'
  | 'km'
  | 'inches'
  | 'cm';

const UNIT_ALIASES: Record<string, CanonicalUnit> = {
  f: 'fahrenheit',
  fahrenheit: 'fahrenheit',
  c: 'celsius',
  celsius: 'celsius',
  k: 'kelvin',
  kelvin: 'kelvin',
  lb: 'lbs',
  lbs: 'lbs',
  pound: 'lbs',
  pounds: 'lbs',
  kg: 'kg',
  kilogram: 'kg',
  kilograms: 'kg',
  oz: 'oz',
  ounce: 'oz',
  ounces: 'oz',
  g: 'grams',
  gram: 'grams',
  grams: 'grams',
  mi: 'miles',
  mile: 'miles',
  miles: 'miles',
  km: 'km',
  kilometer: 'km',
  kilometers: 'km',
  in: 'inches',
  inch: 'inches',
  inches: 'inches',
  cm: 'cm',
  centimeter: 'cm',
  centimeters: 'cm',
};

const LINEAR_FACTORS: ReadonlyArray<[CanonicalUnit, CanonicalUnit, number]> = [
  ['lbs', 'kg', 0.453592],
  ['kg', 'lbs', 2.20462],
  ['oz', 'grams', 28.3495],
  ['grams', 'oz', 0.035274],
  ['miles', 'km', 1.60934],
  ['km', 'miles', 0.621371],
  ['inches', 'cm', 2.54],
  ['cm', 'inches', 0.393701],
];

const DISPLAY_UNIT: Partial<Record<CanonicalUnit, string>> = {
  lbs: 'lb',
  grams: 'g',
  miles: 'mi',
  inches: 'in',
};

function normalizeUnit(raw: string | undefined): CanonicalUnit | null {
  if (!raw) return null;
  return UNIT_ALIASES[raw.trim().toLowerCase()] ?? null;
}

const isTemperature = (u: CanonicalUnit) => u === 'fahrenheit' || u === 'celsius' || u === 'kelvin';

function convert(value: number, from: CanonicalUnit, to: CanonicalUnit): number | null {
  if (from === 'fahrenheit' && to === 'celsius') return ((value - 32) * 5) / 9;
  if (from === 'celsius' && to === 'fahrenheit') return (value * 9) / 5 + 32;
  if (from === 'celsius' && to === 'kelvin') return value + 273.15;
  if (from === 'kelvin' && to === 'celsius') return value - 273.15;

  const row = LINEAR_FACTORS.find(([f, t]) => f === from && t === to);
  return row ? value * row[2] : null;
}

function formatTemperature(value: number, unit: CanonicalUnit): string {
  const text = roundAwayFromZero(value, 1).toFixed(1);
  switch (unit) {
    case 'fahrenheit':
      return `${text}°F`;
    case 'celsius':
      return `${text}°C`;
    default:
      return `${text}K`;
  }
}

function formatLinear(value: number, unit: CanonicalUnit): string {
  return `${String(roundAwayFromZero(value, 4))} ${DISPLAY_UNIT[unit] ?? unit}`;
}

function buildConversion(
  rawValue: string | undefined,
  rawFrom: string | undefined,
  rawTo: string | undefined,
): DeterministicResult | null {
  const value = Number(rawValue);
  const from = normalizeUnit(rawFrom);
  const to = normalizeUnit(rawTo);
  if (rawValue === undefined || !Number.isFinite(value) || !from || !to || from === to) return null;

  const converted = convert(value, from, to);
  if (converted === null) return null;

  const answer =
    isTemperature(from) || isTemperature(to)
      ? `${formatTemperature(value, from)} equals **${formatTemperature(converted, to)}**.`
      : `${formatLinear(value, from)} equals **${formatLinear(converted, to)}**.`;
  return { category: 'conversion', answer };
}

// ==================================================================
// Parsers
// ==================================================================

function parsePercent(message: string): DeterministicResult | null {
  const normalized = message.replace(/\bpercent\b/gi, '%');
  const m = PERCENT_OF.exec(normalized);
  const pct = Number(m?.groups?.pct);
  const base = Number(m?.groups?.base);
  if (!m || !Number.isFinite(pct) || !Number.isFinite(base)) return null;

  const result = base * (pct / 100);
  return { category: 'calculator', answer: `${pct}% of ${base} = **${formatGrouped2(result)}**` };
}

export function normalizeArithmeticExpression(message: string): string {
  let expr = message.trim().toLowerCase();
  if (!expr) return '';

  expr = expr.replace(/^(?:can you\s+|could you\s+|please\s+|hey[,!\s]+|hi[,!\s]+|well[,!\s]+)*/i, '');
  expr = expr.replace(/^(?:what(?:'s| is)\s+|calculate\s+|compute\s+|solve\s+)+/i, '');
  expr = expr.replace(/[?!]+$/, '');
  expr = expr.replace(/\s+(?:for me|please|thanks|thank you)\s*$/i, '');
  expr = expr.replace(/,/g, '');
  expr = expr.replace(/\bmultiplied\s+by\b/gi, '*');
  expr = expr.replace(/\bdivided\s+by\b/gi, '/');
  expr = expr.replace(/\bplus\b/gi, '+');
  expr = expr.replace(/\bminus\b/gi, '-');
  expr = expr.replace(/\btimes\b/gi, '*');
  expr = expr.replace(/\bover\b/gi, '/');
  expr = expr.replace(/(?<=\d)\s*x\s*(?=\d)/gi, ' * ');
  return expr.replace(/\s+/g, ' ').trim();
}

function parseArithmetic(message: string): DeterministicResult | null {
  const m = CALC.exec(normalizeArithmeticExpression(message));
  const expr = m?.groups?.expr?.trim();
  // a bare number ("2024") is not a calculation
  if (!expr || !HAS_OPERATOR.test(expr)) return null;

  const value = evaluateArithmetic(expr);
  if (value === null) return null;
  return { category: 'calculator', answer: `${expr} = **${formatArithmeticResult(value)}**` };
}

function parseStrictConversion(message: string): DeterministicResult | null {
  const g = STRICT_CONVERSION.exec(message)?.groups;
  return g ? buildConversion(g.value, g.from, g.to) : null;
}

function parseWrapperTemperature(message: string): DeterministicResult | null {
  const g = WRAPPER_TEMPERATURE.exec(message)?.groups;
  return g ? buildConversion(g.value, g.from, g.to) : null;
}

function parseValueAndTargetUnit(message: string): DeterministicResult | null {
  const source = VALUE_UNIT.exec(message)?.groups;
  if (!source) return null;

  const targets = [...message.matchAll(TARGET_UNIT)];
  const last = targets[targets.length - 1];
  if (!last) return null;
  return buildConversion(source.value, source.unit, last.groups?.unit);
}

function stripConversationalWrappers(message: string): string {
  return message
    .trim()
    .replace(/\b(?:if i set it to|set it to|what is that in|what's that in)\b/gi, '')
    .replace(/\s+/g, ' ')
    .trim();
}

function looksLikeMediumCandidate(message: string): boolean {
  if (WRAPPER_TEMPERATURE.test(message)) return true;

  const lower = message.toLowerCase();
  if (!CONVERSATIONAL_CUES.some((cue) => lower.includes(cue))) return false;

  const numberAndUnit = /\d/.test(message) && UNIT_TOKEN.test(message);
  return numberAndUnit || ARITHMETIC_CUES.some((cue) => lower.includes(cue));
}

export function tryMatch(text: string): DeterministicMatch | null {
  const message = text?.trim() ?? '';
  if (!message) return null;

  const strict = parsePercent(message) ?? parseArithmetic(message) ?? parseStrictConversion(message);
  if (strict) return { result: strict, confidence: 'high' };

  if (!looksLikeMediumCandidate(message)) return null;

  const stripped = stripConversationalWrappers(message);
  const medium =
    parseWrapperTemperature(message) ??
    parseValueAndTargetUnit(message) ??
    parsePercent(stripped) ??
    parseArithmetic(stripped);
  return medium ? { result: medium, confidence: 'medium' } : null;
}
