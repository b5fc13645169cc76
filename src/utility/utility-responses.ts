// src/utility/utility-responses.ts: user-facing text for utility tool results
//
// Every builder takes the raw tool JSON and never throws: unparseable
// payloads map to a fixed apology line.

import { z } from 'zod';
import { TOOL_NAMES } from '@/mcp/tool-alias';
import type { UtilityResult } from '@/search/types';

// ==================================================================
// JSON helpers
// ==================================================================

function parseJson<S extends z.ZodTypeAny>(raw: string, schema: S): z.infer<S> | null {
  if (!raw.trim()) return null;
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = schema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

const optionalText = z.string().nullish().catch(null);
const optionalNumber = z.number().nullish().catch(null);

// ==================================================================
// Geocode
// ==================================================================

const geocodeSchema = z.object({
  results: z.array(z.unknown()),
});

const geocodeCandidateSchema = z.object({
  latitude: z.number(),
  longitude: z.number(),
  confidence: optionalNumber,
  name: optionalText,
  countryCode: optionalText,
  regionCode: optionalText,
  region: optionalText,
});

export interface GeocodeCandidate {
  name: string;
  countryCode: string;
  regionCode: string;
  latitude: number;
  longitude: number;
}

/** Highest-confidence result that carries coordinates; the first wins ties. */
export function parseBestGeocodeCandidate(geocodeJson: string): GeocodeCandidate | null {
  const root = parseJson(geocodeJson, geocodeSchema);
  if (!root) return null;

  let best: z.infer<typeof geocodeCandidateSchema> | null = null;
  let bestConfidence = Number.NEGATIVE_INFINITY;
  for (const item of root.results) {
    const candidate = geocodeCandidateSchema.safeParse(item);
    if (!candidate.success) continue;
    const confidence = candidate.data.confidence ?? 0;
    if (!best || confidence > bestConfidence) {
      best = candidate.data;
      bestConfidence = confidence;
    }
  }
  if (!best) return null;

  return {
    name: best.name ?? '',
    countryCode: best.countryCode ?? '',
    regionCode: best.regionCode ?? best.region ?? '',
    latitude: best.latitude,
    longitude: best.longitude,
  };
}

// ==================================================================
// Weather
// ==================================================================

const WEATHER_LOCATION = /\b(?:in|for|at|near)\s+(.+)$/i;

export function extractLocationFromMessage(message: string): string | null {
  const m = WEATHER_LOCATION.exec(message);
  if (!m) return null;
  const location = (m[1] ?? '').trim().replace(/[?.!,]+$/, '');
  return location || null;
}

const forecastSchema = z.object({
  error: optionalText,
  location: z.object({ name: optionalText }).nullish().catch(null),
  current: z
    .object({ temperature: optionalNumber, unit: optionalText, condition: optionalText })
    .nullish()
    .catch(null),
  daily: z.array(z.unknown()).nullish().catch(null),
});

const dailySchema = z.object({ avgTemp: z.number() });

const WEATHER_CUES = ['weather', 'forecast', 'temperature', 'temp', 'rain', 'snow'];
const ACTIVITY_CUES = [
  'activity',
  'activities',
  'what can i do',
  'could i do',
  'what should i do',
  'kind of things',
  'things to do',
  'ideas',
  'recommend',
  'suggest',
];

export function looksLikeWeatherActivityAdviceRequest(message: string): boolean {
  const lower = message.toLowerCase();
  return WEATHER_CUES.some((c) => lower.includes(c)) && ACTIVITY_CUES.some((c) => lower.includes(c));
}

export interface WeatherSnapshot {
  location: string;
  temp: number | null;
  unit: string;
  condition: string;
  avgTemp: number | null;
}

function weatherSnapshotLine(s: WeatherSnapshot): string {
  const condition = s.condition.toLowerCase();
  if (s.temp !== null && condition) return `In ${s.location}, it's about ${s.temp}${s.unit} with ${condition} right now.`;
  if (s.temp !== null) return `In ${s.location}, it's about ${s.temp}${s.unit} right now.`;
  if (condition) return `In ${s.location}, conditions are ${condition} right now.`;
  if (s.avgTemp !== null) return `In ${s.location}, average temp is around ${s.avgTemp}${s.unit}.`;
  return `In ${s.location}, weather conditions are available.`;
}

function toFahrenheit(temp: number | null, unit: string): number | null {
  if (temp === null) return null;
  return unit.toUpperCase() === 'C' ? (temp * 9) / 5 + 32 : temp;
}

export function buildWeatherActivityAdvice(s: WeatherSnapshot): string {
  const condition = s.condition.toLowerCase();
  const temp = toFahrenheit(s.temp ?? s.avgTemp, s.unit);

  const wet = ['rain', 'snow', 'sleet', 'drizzle', 'shower', 'storm'].some((w) => condition.includes(w));
  const icy = condition.includes('ice') || condition.includes('freez');
  const windy = condition.includes('wind') || condition.includes('gust');
  const cold = temp !== null && temp <= 45;
  const hot = temp !== null && temp >= 85;

  let plan = 'Good options: a short walk, errands on foot, or light outdoor activity.';
  let caution = 'Bring a layer and check conditions before heading out.';
  if (wet || icy || cold) {
    plan = 'Best fit right now: mostly indoor plans (gym/rec center, cafe + reading, movie/museum).';
    caution = 'If you go outside, keep it short and use warm waterproof layers plus good traction.';
  } else if (hot) {
    plan = 'Best fit right now: early/late outdoor time, shaded spots, or indoor options with AC.';
    caution = 'Bring water and avoid long midday exposure.';
  } else if (windy) {
    plan = 'Good options: low-exposure outdoor plans or indoor activities with easy fallback.';
    caution = 'Avoid long exposed routes if gusts pick up.';
  }

  return `${weatherSnapshotLine(s)} ${plan} ${caution}`;
}

/** Short current-conditions line, or null when the forecast has nothing usable. */
export function buildWeatherBrief(forecastJson: string, message: string, fallbackLocation: string): string | null {
  const root = parseJson(forecastJson, forecastSchema);
  if (!root || root.error?.trim()) return null;

  const location =
    root.location?.name?.trim() || extractLocationFromMessage(message) || fallbackLocation.trim() || 'there';

  const rawTemp = root.current?.temperature;
  const temp = typeof rawTemp === 'number' ? Math.round(rawTemp) : null;
  const unit = (root.current?.unit ?? '').trim().toUpperCase();
  const condition = (root.current?.condition ?? '').trim();

  let avgTemp: number | null = null;
  for (const day of root.daily ?? []) {
    const parsed = dailySchema.safeParse(day);
    if (parsed.success) {
      avgTemp = Math.round(parsed.data.avgTemp);
      break;
    }
  }

  const snapshot: WeatherSnapshot = { location, temp, unit, condition, avgTemp };
  if (looksLikeWeatherActivityAdviceRequest(message)) return buildWeatherActivityAdvice(snapshot);

  const avg = avgTemp !== null ? ` Avg temp: **${avgTemp}${unit}**.` : '';
  if (temp !== null && condition) return `In ${location}, it's about **${temp}${unit}** and **${condition}** right now.${avg}`;
  if (temp !== null) return `In ${location}, it's about **${temp}${unit}** right now.${avg}`;
  if (condition) return `In ${location}, conditions are **${condition}** right now.${avg}`;
  if (avgTemp !== null) return `In ${location}, avg temp is **${avgTemp}${unit}**.`;
  return null;
}

// ==================================================================
// Time
// ==================================================================

const timezoneSchema = z.object({ error: optionalText, timezone: optionalText });

/** "h:mm AM on Weekday, Mon d" in the given IANA zone; null for an unknown zone. */
export function formatLocalTime(timezone: string, now: Date): string | null {
  let parts: Intl.DateTimeFormatPart[];
  try {
    parts = new Intl.DateTimeFormat('en-US', {
      timeZone: timezone,
      hour: 'numeric',
      minute: '2-digit',
      hour12: true,
      weekday: 'long',
      month: 'short',
      day: 'numeric',
    }).formatToParts(now);
  } catch {
    return null;
  }

  const part = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? '';
  return `${part('hour')}:${part('minute')} ${part('dayPeriod').toUpperCase()} on ${part('weekday')}, ${part('month')} ${part('day')}`;
}

export function buildTimeBrief(timezoneJson: string, fallbackLocation: string, message: string, now: Date): string | null {
  const root = parseJson(timezoneJson, timezoneSchema);
  if (!root || root.error?.trim()) return null;

  const timezone = root.timezone?.trim();
  if (!timezone) return null;

  const location = extractLocationFromMessage(message) ?? fallbackLocation;
  const local = formatLocalTime(timezone, now);
  if (local) return `It's currently **${local}** in ${location} (${timezone}).\n\nNeed another city checked too?`;

  return `The timezone for ${location} is **${timezone}**.\n\nWant local time there as well?`;
}

// ==================================================================
// Holidays
// ==================================================================

const namedDateSchema = z.object({ name: optionalText, date: optionalText });

const holidaySchema = z.object({
  error: optionalText,
  countryCode: optionalText,
  regionCode: optionalText,
  isPublicHoliday: z.boolean().nullish().catch(null),
  holidaysToday: z.array(z.unknown()).nullish().catch(null),
  nextHoliday: namedDateSchema.nullish().catch(null),
  holidays: z.array(z.unknown()).nullish().catch(null),
  year: optionalNumber,
});

function namedDates(items: readonly unknown[]): Array<{ name: string; date: string }> {
  return items.map((item) => {
    const parsed = namedDateSchema.safeParse(item);
    return parsed.success
      ? { name: (parsed.data.name ?? '').trim(), date: (parsed.data.date ?? '').trim() }
      : { name: '', date: '' };
  });
}

function distinctIgnoreCase(values: readonly string[]): string[] {
  const seen = new Set<string>();
  return values.filter((v) => {
    const key = v.toLowerCase();
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export function buildHolidayResponse(toolName: string, toolJson: string, now: Date = new Date()): string {
  if (!toolJson.trim()) return "I couldn't get holiday data from that tool call.";

  const root = parseJson(toolJson, holidaySchema);
  if (!root) return "I fetched holiday data, but couldn't parse a clean answer.";
  if (root.error?.trim()) return `Holiday lookup failed: ${root.error}`;

  const region = root.regionCode?.trim() ?? '';
  const scope = region || root.countryCode || 'that country';
  const tool = toolName.toLowerCase();

  if (tool === TOOL_NAMES.holidaysIsToday || tool === 'holidaysistoday') {
    const names = distinctIgnoreCase(namedDates(root.holidaysToday ?? []).map((h) => h.name).filter(Boolean));
    let line = root.isPublicHoliday
      ? `Yes — today is a public holiday in **${scope}**: **${names.length > 0 ? names.join(', ') : 'a listed public holiday'}**.`
      : `No — today is not a public holiday in **${scope}**.`;

    const nextName = root.nextHoliday?.name?.trim();
    const nextDate = root.nextHoliday?.date?.trim();
    if (nextName && nextDate) line += ` Next up: **${nextName}** on **${nextDate}**.`;

    return `${line}\n\nWant the full holiday calendar for the year?`;
  }

  if (tool === TOOL_NAMES.holidaysNext || tool === 'holidaysnext') {
    const first = namedDates(root.holidays ?? [])[0];
    if (!first) return `I couldn't find upcoming public holidays for **${scope}**.`;
    const name = first.name || 'the next holiday';
    const date = first.date || 'an upcoming date';
    return `The next public holiday in **${scope}** is **${name}** on **${date}**.\n\nWant the next few after that?`;
  }

  const year = typeof root.year === 'number' && Number.isInteger(root.year) ? root.year : now.getUTCFullYear();
  const holidays = namedDates(root.holidays ?? []);
  if (holidays.length === 0) return `I couldn't find public holidays for **${scope}** in **${year}**.`;

  const entries = holidays
    .slice(0, 4)
    .filter((h) => h.name && h.date)
    .map((h) => `${h.name} (${h.date})`);
  const preview = entries.length > 0 ? entries.join(', ') : 'no preview available';
  return (
    `I found **${holidays.length}** public holidays in **${scope}** for **${year}**. First entries: ${preview}.` +
    '\n\nWant this narrowed to a specific region?'
  );
}

// ==================================================================
// Feeds
// ==================================================================

const feedSchema = z.object({
  error: optionalText,
  feedTitle: optionalText,
  sourceHost: optionalText,
  items: z.array(z.unknown()).nullish().catch(null),
});

const feedItemSchema = z.object({ title: z.string() });

export function buildFeedResponse(toolJson: string): string {
  if (!toolJson.trim()) return "I couldn't read any feed data from that request.";

  const root = parseJson(toolJson, feedSchema);
  if (!root) return "I fetched feed data, but couldn't parse it into a clean summary.";
  if (root.error?.trim()) return `Feed fetch failed: ${root.error}`;

  const label = root.feedTitle?.trim() || (root.sourceHost ?? '');
  const items = root.items ?? [];
  if (items.length === 0) {
    return `I reached **${label}**, but there were no recent feed items to show.\n\nWant a retry or a different feed URL?`;
  }

  const titles: string[] = [];
  for (const item of items.slice(0, 3)) {
    const parsed = feedItemSchema.safeParse(item);
    const title = parsed.success ? parsed.data.title.trim() : '';
    if (title) titles.push(title);
  }
  const headlines = titles.length > 0 ? titles.map((t, i) => `${i + 1}) ${t}`).join('; ') : 'recent items were returned';

  return `I fetched **${items.length}** recent feed item(s) from **${label}**. Latest: ${headlines}\n\nPick one and I'll summarize it.`;
}

// ==================================================================
// Status
// ==================================================================

const statusSchema = z.object({
  error: optionalText,
  url: optionalText,
  reachable: z.boolean().nullish().catch(null),
  httpStatus: optionalNumber,
  method: optionalText,
  latencyMs: optionalNumber,
});

function hostOf(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    return url;
  }
}

export function buildStatusResponse(toolJson: string): string {
  if (!toolJson.trim()) return "I couldn't get a status payload from that check.";

  const root = parseJson(toolJson, statusSchema);
  if (!root) return "I ran the status check, but couldn't parse the response cleanly.";
  if (root.error?.trim()) return `Status check failed: ${root.error}`;

  const host = hostOf(root.url ?? '');
  if (root.reachable) {
    const status = typeof root.httpStatus === 'number' ? `HTTP ${root.httpStatus}` : 'a network response';
    const latency = typeof root.latencyMs === 'number' ? Math.round(root.latencyMs) : 0;
    return `**${host}** is reachable (${status} via ${root.method ?? 'probe'} in ${latency} ms).\n\nNeed a quick re-check in a few seconds?`;
  }

  return `I couldn't reach **${host}** (no response).\n\nWant a retry or a different URL variant?`;
}

// ==================================================================
// Inline answers
// ==================================================================

const INLINE_FOLLOW_UPS: Record<string, string> = {
  calculator: 'Need another quick one? Toss over the next math step.',
  conversion: 'Need another unit converted?',
  fact: 'Want a quick benchmark comparison next?',
};

const UI_SUPPRESSED_CATEGORIES = new Set(['calculator', 'conversion', 'fact', 'text']);

export function buildInlineResponse(result: UtilityResult): string {
  const primary = result.answer.trim() || 'Done.';
  const followUp = INLINE_FOLLOW_UPS[result.category.toLowerCase()];
  return followUp ? `${primary}\n\n${followUp}` : primary;
}

export function shouldSuppressUiArtifacts(category: string): boolean {
  return UI_SUPPRESSED_CATEGORIES.has(category.toLowerCase());
}
