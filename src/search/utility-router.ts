/**
 * Utility router: weather, time, holidays, status, feeds, letter counts,
 * evergreen facts, calculator and unit conversion.
 *
 * First match wins. A result either carries an inline answer or names exactly
 * one tool to call next (toolName + toolArgs JSON). False positives are worse
 * than misses here: anything ambiguous returns null and goes to search.
 */
import { z } from 'zod';
import countryCodeData from '@/search/data/country-codes.json';
import type { UtilityResult } from '@/search/types';
import { TOOL_NAMES } from '@/mcp/tool-alias';
import {
  ARITHMETIC_ALLOW_LIST,
  evaluateArithmetic,
  formatArithmeticResult,
  formatGrouped2,
} from '@/search/arithmetic';
import { trimEndChars } from '@/utils/text';

const COUNTRY_CODES: Record<string, string> = z
  .record(z.string().regex(/^[A-Z]{2}$/))
  .parse(countryCodeData);

// ==================================================================
// Patterns
// ==================================================================

const WEATHER =
  /(?:what(?:'s| is)\s+the\s+)?(?:weather|forecast|temperature|temp)(?:\s+(?:is|like))?\s+(?:in|for|at|near)\s+(.+)/i;
const WEATHER_LOOSE = /\b(?:weather|forecast|temperature|temp)\b.*?\b(?:in|for|at|near)\b\s+(.+)/i;
const WILL_IT_RAIN =
  /(?:will it|is it going to)\s+(?:rain|snow|storm|be (?:hot|cold|warm|sunny|cloudy))\s+(?:in|at|near)\s+(.+)/i;

const WEATHER_FALSE_POSITIVES = [
  'political climate',
  'business climate',
  'economic climate',
  'climate change',
  'climate crisis',
  'investment climate',
  'social climate',
  'weather the storm',
  'weather this',
];

const TEMPORAL = 'today|tomorrow|tonight|now|right now|currently|this\\s+(?:morning|afternoon|evening|week|weekend)|next\\s+week';
const LOCATION_TEMPORAL_TAIL = new RegExp(`\\s+(?:for\\s+)?(?:${TEMPORAL})\\s*$`, 'i');
const TEMPORAL_ONLY_LOCATION = new RegExp(`^(?:for\\s+)?(?:${TEMPORAL})$`, 'i');

const TIME_IN =
  /(?:what(?:'s| is)\s+(?:the\s+)?time(?:\s+is\s+it)?|what\s+time\s+is\s+it|time)\s+(?:in|at|for)\s+(.+)/i;
const TIME_ZONE = /time\s*zone\s+(?:for|of|in)\s+(.+)/i;

const HOLIDAY_TODAY = /(?:is\s+today\s+(?:a\s+)?(?:public\s+)?holiday)\s+(?:in|for)\s+(.+)/i;
const HOLIDAY_NEXT = /(?:next|upcoming)\s+(?:public\s+)?holiday\s+(?:in|for)\s+(.+)/i;
const HOLIDAY_LIST = /(?:public\s+holidays?|holidays?)\s+(?:in|for)\s+(.+)/i;
const YEAR = /\b(19\d{2}|20\d{2})\b/;

const FEED_INTENT = /\b(?:rss|atom|feed)\b/i;
const STATUS_INTENT = /\b(?:is|check|status|uptime)\b.+\b(?:up|online|reachable|down)\b/i;
const URL_LIKE =
  /((?:https?:\/\/)?(?:[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?\.)+[a-z]{2,}(?:\/[^\s\][()"']*)?)/i;

const CALC = /^(?:what(?:'s| is)\s+|calculate\s+)?(\d[\d\s.+\-*/%()]+\d)$/i;
const PERCENT_OF = /(?:what(?:'s| is)\s+)?(\d+(?:\.\d+)?)\s*%\s*(?:of)\s*(\d+(?:\.\d+)?)/i;

const CONVERT =
  /(?:convert\s+)?(\d+(?:\.\d+)?)\s*(miles?|km|kilometers?|feet|ft|meters?|m|inches?|in|cm|centimeters?|lbs?|pounds?|kg|kilograms?|oz|ounces?|grams?|g|liters?|l|gallons?|gal|fahrenheit|celsius|f|c)\s+(?:to|in|into)\s+(\w+)/i;
const HOW_MANY = /how many\s+(\w+)\s+(?:in|per)\s+(?:a |an )?(\w+)/i;
const LETTER_COUNT =
  /(?:how many|count)\s+([a-zA-Z])(?:['’]s|s)?\s+(?:are\s+)?in\s+(?:the\s+word\s+)?["']?([a-zA-Z]+)["']?/i;

const MOON_DISTANCE =
  /(?:how\s+far\s+(?:is|to)\s+(?:the\s+)?moon|distance\s+(?:to|from)\s+(?:the\s+)?moon|how\s+many\s+\w+\s+(?:is|are)\s+(?:it\s+)?(?:to\s+)?(?:the\s+)?moon|earth\s+to\s+moon)/i;
const SPEED_OF_LIGHT = /(?:what(?:'s| is)\s+)?(?:the\s+)?speed of light(?:\s+in\s+(?:vacuum|space))?/i;
const BOILING_POINT = /(?:what(?:'s| is)\s+)?(?:the\s+)?boiling point of water(?:\s+(?:at|in)\s+sea\s+level)?/i;
const FREEZING_POINT = /(?:what(?:'s| is)\s+)?(?:the\s+)?freezing point of water(?:\s+(?:at|in)\s+sea\s+level)?/i;
const DAYS_IN_YEAR =
  /(?:how many|number of)\s+days\s+(?:are\s+)?(?:in|per)\s+(?:a|one)\s+year|how many\s+days\s+in\s+(?:a|one)\s+year/i;

const AVG_EARTH_MOON_KM = 384_400;
const TRAILING_PUNCT = '?.!,';

function toolResult(category: string, answer: string, toolName: string, args: object): UtilityResult {
  return { category, answer, toolName, toolArgs: JSON.stringify(args) };
}

// ==================================================================
// Weather / time
// ==================================================================

export function normalizeLocation(value: string): string {
  let location = trimEndChars(value.trim(), TRAILING_PUNCT);
  location = location.replace(/\s+(?:for me|please|pls|thanks|thank you)\s*$/i, '');
  location = location.replace(LOCATION_TEMPORAL_TAIL, '');
  if (TEMPORAL_ONLY_LOCATION.test(location.trim())) return '';
  return trimEndChars(location.trim(), TRAILING_PUNCT);
}

function normalizeLocationCandidate(value: string): string {
  const location = trimEndChars(value.trim(), TRAILING_PUNCT).replace(
    /\s+(?:right now|currently|please|pls|thanks|thank you)\s*$/i,
    '',
  );
  return trimEndChars(location.trim(), TRAILING_PUNCT);
}

function tryWeather(message: string): UtilityResult | null {
  const lower = message.toLowerCase();
  if (WEATHER_FALSE_POSITIVES.some((fp) => lower.includes(fp))) return null;

  const m = WEATHER.exec(message) ?? WILL_IT_RAIN.exec(message) ?? WEATHER_LOOSE.exec(message);
  if (!m) return null;

  const location = normalizeLocation(m[1] ?? '');
  if (location.length < 2) return null;

  return toolResult('weather', `[weather lookup for: ${location}]`, TOOL_NAMES.weatherGeocode, {
    place: location,
    maxResults: 3,
  });
}

function tryTime(message: string): UtilityResult | null {
  const m = TIME_IN.exec(message) ?? TIME_ZONE.exec(message);
  if (!m) return null;

  const location = normalizeLocationCandidate(m[1] ?? '');
  if (location.length < 2) return null;

  return toolResult('time', `[time lookup for: ${location}]`, TOOL_NAMES.weatherGeocode, {
    place: location,
    maxResults: 3,
  });
}

// ==================================================================
// Holidays
// ==================================================================

export interface CountryScope {
  countryCode: string;
  regionCode: string | null;
}

function normalizeHolidayScope(value: string): string {
  return trimEndChars(value.trim(), TRAILING_PUNCT).replace(/the /gi, '').trim();
}

function stripHolidayYearHints(value: string): string {
  const stripped = value.replace(new RegExp(YEAR.source, 'g'), '').replace(/\b(?:this|next)\s+year\b/gi, '');
  return normalizeHolidayScope(stripped);
}

function resolveHolidayYear(value: string, now: Date): number {
  const nowYear = now.getUTCFullYear();
  if (value.toLowerCase().includes('next year')) return nowYear + 1;

  const m = YEAR.exec(value);
  if (m) return Math.min(2100, Math.max(1900, Number(m[1])));
  return nowYear;
}

export function resolveCountryCode(raw: string): string | null {
  const cleaned = trimEndChars(raw.trim(), TRAILING_PUNCT);
  if (!cleaned) return null;

  const named = COUNTRY_CODES[cleaned.toLowerCase()];
  if (named) return named;
  return /^[a-z]{2}$/i.test(cleaned) ? cleaned.toUpperCase() : null;
}

/** "US-ID", "ID, US", "canada", "holidays in canada please" (last token). */
export function parseCountryAndRegion(scope: string): CountryScope | null {
  const cleaned = normalizeHolidayScope(scope);
  if (!cleaned) return null;

  const upper = cleaned.toUpperCase();
  if (/^[A-Z]{2}-[A-Z0-9]{2,3}$/.test(upper)) {
    return { countryCode: upper.slice(0, 2), regionCode: upper };
  }

  const parts = cleaned
    .split(',')
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
  if (parts.length >= 2) {
    const country = resolveCountryCode(parts[parts.length - 1]);
    if (country) {
      const region = parts[0].toUpperCase();
      return { countryCode: country, regionCode: /^[A-Z]{2}$/.test(region) ? `${country}-${region}` : null };
    }
  }

  const direct = resolveCountryCode(cleaned);
  if (direct) return { countryCode: direct, regionCode: null };

  const tokens = cleaned.split(' ').filter((t) => t.length > 0);
  const last = tokens.length > 0 ? resolveCountryCode(tokens[tokens.length - 1]) : null;
  return last ? { countryCode: last, regionCode: null } : null;
}

function tryHoliday(message: string, now: Date): UtilityResult | null {
  const today = HOLIDAY_TODAY.exec(message);
  if (today) {
    const scope = parseCountryAndRegion(today[1] ?? '');
    if (!scope) return null;
    return toolResult('holiday', `[holiday lookup for: ${scope.countryCode}]`, TOOL_NAMES.holidaysIsToday, {
      countryCode: scope.countryCode,
      regionCode: scope.regionCode,
    });
  }

  const next = HOLIDAY_NEXT.exec(message);
  if (next) {
    const scope = parseCountryAndRegion(next[1] ?? '');
    if (!scope) return null;
    return toolResult('holiday', `[next holiday lookup for: ${scope.countryCode}]`, TOOL_NAMES.holidaysNext, {
      countryCode: scope.countryCode,
      regionCode: scope.regionCode,
      maxItems: 5,
    });
  }

  const list = HOLIDAY_LIST.exec(message);
  if (!list) return null;

  const rawScope = list[1] ?? '';
  const scope = parseCountryAndRegion(stripHolidayYearHints(rawScope));
  if (!scope) return null;
  return toolResult('holiday', `[holiday list lookup for: ${scope.countryCode}]`, TOOL_NAMES.holidaysGet, {
    countryCode: scope.countryCode,
    regionCode: scope.regionCode,
    year: resolveHolidayYear(rawScope, now),
    maxItems: 25,
  });
}

// ==================================================================
// Status / feeds
// ==================================================================

/** First URL-like token, made absolute (https:// when no scheme). */
export function extractUrlLike(message: string): string | null {
  const m = URL_LIKE.exec(message);
  if (!m) return null;

  let raw = trimEndChars((m[1] ?? '').trim(), '?.!,;:)]}');
  if (!raw) return null;
  if (!/^https?:\/\//i.test(raw)) raw = `https://${raw}`;

  try {
    const url = new URL(raw);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') return null;
    return url.toString();
  } catch {
    return null;
  }
}

function tryStatus(message: string): UtilityResult | null {
  const lower = message.toLowerCase();
  if (!STATUS_INTENT.test(message) && !lower.includes(' is ') && !lower.includes(' up')) return null;

  const url = extractUrlLike(message);
  if (!url) return null;
  return toolResult('status', `[status check for: ${url}]`, TOOL_NAMES.statusCheckUrl, { url });
}

function tryFeed(message: string): UtilityResult | null {
  const url = extractUrlLike(message);
  if (!url) return null;

  const lowerUrl = url.toLowerCase();
  const urlLooksFeedy =
    lowerUrl.includes('/feed') ||
    lowerUrl.includes('rss') ||
    lowerUrl.includes('atom') ||
    lowerUrl.endsWith('.xml');
  if (!FEED_INTENT.test(message) && !urlLooksFeedy) return null;

  return toolResult('feed', `[feed fetch for: ${url}]`, TOOL_NAMES.feedFetch, { url, maxItems: 5 });
}

// ==================================================================
// Inline answers
// ==================================================================

function tryLetterCount(message: string): UtilityResult | null {
  const m = LETTER_COUNT.exec(message);
  const rawLetter = m?.[1];
  const word = m?.[2]?.trim();
  if (!rawLetter || !word) return null;

  const letter = rawLetter.toLowerCase();
  let count = 0;
  for (const ch of word.toLowerCase()) {
    if (ch === letter) count++;
  }
  return {
    category: 'text',
    answer: `The word "${word}" contains **${count}** '${letter}' characters.`,
  };
}

function moonDistance(lower: string): string {
  const [value, unit] = lower.includes('meter')
    ? [AVG_EARTH_MOON_KM * 1000, 'meters']
    : lower.includes('mile')
      ? [AVG_EARTH_MOON_KM * 0.621371, 'miles']
      : [AVG_EARTH_MOON_KM, 'kilometers'];
  return `${Math.round(value).toLocaleString('en-US')} ${unit}`;
}

function trySimpleFact(message: string): UtilityResult | null {
  const lower = message.toLowerCase();
  const fact = (answer: string): UtilityResult => ({ category: 'fact', answer });

  if (MOON_DISTANCE.test(lower)) {
    return fact(`The average Earth-Moon distance is about **${moonDistance(lower)}**.`);
  }
  if (SPEED_OF_LIGHT.test(lower)) {
    return fact(
      'The speed of light in vacuum is **299,792,458 meters per second** (about **299,792 km/s**).',
    );
  }
  if (BOILING_POINT.test(lower)) return fact('At sea level, water boils at **100C** (**212F**).');
  if (FREEZING_POINT.test(lower)) return fact('At sea level, water freezes at **0C** (**32F**).');
  if (DAYS_IN_YEAR.test(lower)) {
    if (lower.includes('mars') || lower.includes('martian')) return null;
    return fact('A standard year has **365 days**; leap years have **366**.');
  }
  return null;
}

function tryCalculator(message: string): UtilityResult | null {
  const normalized = trimEndChars(message.trim(), '?!.');

  const pct = PERCENT_OF.exec(normalized);
  if (pct) {
    const p = Number(pct[1]);
    const base = Number(pct[2]);
    return {
      category: 'calculator',
      answer: `${p}% of ${base} = **${formatGrouped2(base * (p / 100))}**`,
    };
  }

  const expr = CALC.exec(normalized)?.[1]?.trim();
  if (!expr || !ARITHMETIC_ALLOW_LIST.test(expr) || !/[+\-*/]/.test(expr)) return null;

  const value = evaluateArithmetic(expr);
  return value === null ? null : { category: 'calculator', answer: `${expr} = **${formatArithmeticResult(value)}**` };
}

// ==================================================================
// Conversion
// ==================================================================

const CONVERSION_FACTORS: Record<string, number> = {
  'miles>km': 1.60934,
  'km>miles': 0.621371,
  'feet>meters': 0.3048,
  'meters>feet': 3.28084,
  'inches>cm': 2.54,
  'cm>inches': 0.393701,
  'miles>meters': 1609.34,
  'meters>miles': 0.000621371,
  'feet>inches': 12,
  'inches>feet': 1 / 12,
  'km>meters': 1000,
  'meters>km': 0.001,
  'lbs>kg': 0.453592,
  'kg>lbs': 2.20462,
  'oz>grams': 28.3495,
  'grams>oz': 0.035274,
  'lbs>oz': 16,
  'oz>lbs': 0.0625,
  'kg>grams': 1000,
  'grams>kg': 0.001,
  'liters>gallons': 0.264172,
  'gallons>liters': 3.78541,
};

const CONVERSION_UNITS: Record<string, string> = {
  fahrenheit: 'fahrenheit',
  f: 'fahrenheit',
  celsius: 'celsius',
  c: 'celsius',
  mile: 'miles',
  miles: 'miles',
  kilometer: 'km',
  kilometers: 'km',
  km: 'km',
  meter: 'meters',
  meters: 'meters',
  m: 'meters',
  foot: 'feet',
  feet: 'feet',
  ft: 'feet',
  inch: 'inches',
  inches: 'inches',
  in: 'inches',
  centimeter: 'cm',
  centimeters: 'cm',
  cm: 'cm',
  lb: 'lbs',
  lbs: 'lbs',
  pound: 'lbs',
  pounds: 'lbs',
  kilogram: 'kg',
  kilograms: 'kg',
  kg: 'kg',
  ounce: 'oz',
  ounces: 'oz',
  oz: 'oz',
  gram: 'grams',
  grams: 'grams',
  g: 'grams',
  liter: 'liters',
  liters: 'liters',
  l: 'liters',
  gallon: 'gallons',
  gallons: 'gallons',
  gal: 'gallons',
};

function normalizeConversionUnit(unit: string): string {
  const lower = unit.trim().toLowerCase();
  return CONVERSION_UNITS[lower] ?? lower.replace(/s+$/, '');
}

function convertUnits(value: number, from: string, to: string): number | null {
  if (from === to) return value;
  if (from === 'fahrenheit' && to === 'celsius') return ((value - 32) * 5) / 9;
  if (from === 'celsius' && to === 'fahrenheit') return (value * 9) / 5 + 32;

  const factor = CONVERSION_FACTORS[`${from}>${to}`];
  return factor === undefined ? null : value * factor;
}

const formatN4 = (value: number) =>
  value.toLocaleString('en-US', { minimumFractionDigits: 4, maximumFractionDigits: 4 });

function tryConversion(message: string): UtilityResult | null {
  const m = CONVERT.exec(message);
  if (m) {
    const value = Number(m[1]);
    const from = normalizeConversionUnit(m[2] ?? '');
    const to = normalizeConversionUnit(m[3] ?? '');
    const converted = convertUnits(value, from, to);
    if (converted !== null) {
      return { category: 'conversion', answer: `${value} ${from} = **${formatN4(converted)} ${to}**` };
    }
  }

  const hm = HOW_MANY.exec(message);
  if (hm) {
    const small = normalizeConversionUnit(hm[1] ?? '');
    const big = normalizeConversionUnit(hm[2] ?? '');
    const converted = convertUnits(1, big, small);
    if (converted !== null) {
      return { category: 'conversion', answer: `There are **${formatN4(converted)} ${small}** in 1 ${big}.` };
    }
  }
  return null;
}

/** Returns null when the message is not a utility intent. */
export function tryHandle(text: string, now: Date = new Date()): UtilityResult | null {
  const message = text.trim();
  if (!message) return null;

  return (
    tryWeather(message) ??
    tryTime(message) ??
    tryHoliday(message, now) ??
    tryStatus(message) ??
    tryFeed(message) ??
    tryLetterCount(message) ??
    trySimpleFact(message) ??
    tryCalculator(message) ??
    tryConversion(message)
  );
}
