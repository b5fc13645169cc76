import { describe, expect, it } from 'vitest';
import {
  buildFeedResponse,
  buildHolidayResponse,
  buildInlineResponse,
  buildStatusResponse,
  buildTimeBrief,
  buildWeatherActivityAdvice,
  buildWeatherBrief,
  formatLocalTime,
  parseBestGeocodeCandidate,
  shouldSuppressUiArtifacts,
} from '@/utility/utility-responses';

const NOW = new Date('2025-06-10T18:05:00Z');

describe('parseBestGeocodeCandidate', () => {
  it('picks the most confident candidate with coordinates', () => {
    const json = JSON.stringify({
      results: [
        { name: 'Boise City', latitude: 36.7, longitude: -102.5, confidence: 0.5 },
        { name: 'Boise', latitude: 43.6, longitude: -116.2, confidence: 0.9, countryCode: 'US', region: 'ID' },
        { name: 'No coordinates', confidence: 1 },
      ],
    });
    expect(parseBestGeocodeCandidate(json)).toEqual({
      name: 'Boise',
      countryCode: 'US',
      regionCode: 'ID',
      latitude: 43.6,
      longitude: -116.2,
    });
  });

  it('returns null for unusable payloads', () => {
    expect(parseBestGeocodeCandidate('{"results":[]}')).toBeNull();
    expect(parseBestGeocodeCandidate('oops')).toBeNull();
  });
});

describe('weather', () => {
  const forecast = JSON.stringify({
    location: { name: 'Boise' },
    current: { temperature: 71.6, unit: 'f', condition: 'Sunny' },
    daily: [{ avgTemp: 68.4 }],
  });

  it('builds a rounded current-conditions line', () => {
    expect(buildWeatherBrief(forecast, 'weather in Boise', 'fallback')).toBe(
      "In Boise, it's about **72F** and **Sunny** right now. Avg temp: **68F**.",
    );
  });

  it('switches to activity advice when asked for ideas', () => {
    expect(buildWeatherBrief(forecast, 'what activities could I do in Boise given the weather', 'Boise')).toBe(
      "In Boise, it's about 72F with sunny right now. " +
        'Good options: a short walk, errands on foot, or light outdoor activity. ' +
        'Bring a layer and check conditions before heading out.',
    );
  });

  it('recommends indoor plans for cold rain', () => {
    const advice = buildWeatherActivityAdvice({
      location: 'Rexburg',
      temp: 5,
      unit: 'C',
      condition: 'Light rain',
      avgTemp: null,
    });
    expect(advice).toBe(
      "In Rexburg, it's about 5C with light rain right now. " +
        'Best fit right now: mostly indoor plans (gym/rec center, cafe + reading, movie/museum). ' +
        'If you go outside, keep it short and use warm waterproof layers plus good traction.',
    );
  });

  it('returns null for tool errors', () => {
    expect(buildWeatherBrief('{"error":"upstream down"}', 'weather in Boise', 'Boise')).toBeNull();
  });
});

describe('time', () => {
  it('formats local time in the zone', () => {
    expect(formatLocalTime('America/Denver', NOW)).toBe('12:05 PM on Tuesday, Jun 10');
    expect(formatLocalTime('Asia/Tokyo', NOW)).toBe('3:05 AM on Wednesday, Jun 11');
    expect(formatLocalTime('Not/AZone', NOW)).toBeNull();
  });

  it('names the location from the message', () => {
    expect(buildTimeBrief('{"timezone":"America/Denver"}', 'Boise', 'what time is it in Boise?', NOW)).toBe(
      "It's currently **12:05 PM on Tuesday, Jun 10** in Boise (America/Denver).\n\nNeed another city checked too?",
    );
  });

  it('falls back to the zone name when it cannot format', () => {
    expect(buildTimeBrief('{"timezone":"Not/AZone"}', 'Boise', 'time please', NOW)).toBe(
      'The timezone for Boise is **Not/AZone**.\n\nWant local time there as well?',
    );
  });
});

describe('buildHolidayResponse', () => {
  it('answers whether today is a holiday', () => {
    const json = JSON.stringify({
      countryCode: 'CA',
      isPublicHoliday: true,
      holidaysToday: [{ name: 'Canada Day', date: '2025-07-01' }, { name: 'canada day' }],
      nextHoliday: { name: 'Civic Holiday', date: '2025-08-04' },
    });
    expect(buildHolidayResponse('holidays_is_today', json, NOW)).toBe(
      'Yes — today is a public holiday in **CA**: **Canada Day**. Next up: **Civic Holiday** on **2025-08-04**.' +
        '\n\nWant the full holiday calendar for the year?',
    );
  });

  it('previews the yearly list', () => {
    const json = JSON.stringify({
      countryCode: 'US',
      regionCode: 'US-ID',
      year: 2026,
      holidays: [
        { name: "New Year's Day", date: '2026-01-01' },
        { name: 'Martin Luther King Jr. Day', date: '2026-01-19' },
      ],
    });
    expect(buildHolidayResponse('holidays_get', json, NOW)).toBe(
      "I found **2** public holidays in **US-ID** for **2026**. First entries: New Year's Day (2026-01-01), " +
        'Martin Luther King Jr. Day (2026-01-19).\n\nWant this narrowed to a specific region?',
    );
  });

  it('treats mistyped fields as missing', () => {
    const json = JSON.stringify({ countryCode: 'CA', regionCode: null, isPublicHoliday: 'yes', holidaysToday: 'none' });
    expect(buildHolidayResponse('holidays_is_today', json, NOW)).toBe(
      'No — today is not a public holiday in **CA**.\n\nWant the full holiday calendar for the year?',
    );
  });

  it('handles empty and failed lookups', () => {
    expect(buildHolidayResponse('holidays_next', '{"countryCode":"US","holidays":[]}', NOW)).toBe(
      "I couldn't find upcoming public holidays for **US**.",
    );
    expect(buildHolidayResponse('holidays_get', '{"error":"bad country"}', NOW)).toBe(
      'Holiday lookup failed: bad country',
    );
  });
});

describe('buildFeedResponse', () => {
  it('lists the first titled items', () => {
    const json = JSON.stringify({
      feedTitle: 'Example Blog',
      items: [{ title: 'Post one' }, { title: ' Post two ' }, { link: 'x' }, { title: 'Post four' }],
    });
    expect(buildFeedResponse(json)).toBe(
      "I fetched **4** recent feed item(s) from **Example Blog**. Latest: 1) Post one; 2) Post two\n\nPick one and I'll summarize it.",
    );
  });

  it('reports an empty feed by host', () => {
    expect(buildFeedResponse('{"sourceHost":"blog.example.org","items":[]}')).toBe(
      'I reached **blog.example.org**, but there were no recent feed items to show.\n\nWant a retry or a different feed URL?',
    );
  });
});

describe('buildStatusResponse', () => {
  it('reports a reachable host', () => {
    const json = JSON.stringify({
      url: 'https://example.com/',
      reachable: true,
      httpStatus: 200,
      method: 'HEAD',
      latencyMs: 123.6,
    });
    expect(buildStatusResponse(json)).toBe(
      '**example.com** is reachable (HTTP 200 via HEAD in 124 ms).\n\nNeed a quick re-check in a few seconds?',
    );
  });

  it('reports an unreachable host', () => {
    expect(buildStatusResponse('{"url":"https://down.example.com","reachable":false}')).toBe(
      "I couldn't reach **down.example.com** (no response).\n\nWant a retry or a different URL variant?",
    );
  });

  it('falls back field by field on mistyped values', () => {
    const json = JSON.stringify({ url: 'https://status.example.com', reachable: true, httpStatus: '200', latencyMs: 41.6 });
    expect(buildStatusResponse(json)).toBe(
      '**status.example.com** is reachable (a network response via probe in 42 ms).\n\nNeed a quick re-check in a few seconds?',
    );
  });

  it('surfaces tool errors and bad payloads', () => {
    expect(buildStatusResponse('{"error":"timeout"}')).toBe('Status check failed: timeout');
    expect(buildStatusResponse('not json')).toBe("I ran the status check, but couldn't parse the response cleanly.");
  });
});

describe('inline answers', () => {
  it('adds a category follow-up line', () => {
    expect(buildInlineResponse({ category: 'calculator', answer: '2 + 2 = **4**' })).toBe(
      '2 + 2 = **4**\n\nNeed another quick one? Toss over the next math step.',
    );
    expect(buildInlineResponse({ category: 'text', answer: 'Three.' })).toBe('Three.');
  });

  it('suppresses ui artifacts for inline categories only', () => {
    expect(shouldSuppressUiArtifacts('Fact')).toBe(true);
    expect(shouldSuppressUiArtifacts('weather')).toBe(false);
  });
});
