import { describe, expect, it } from 'vitest';
import {
  extractUrlLike,
  normalizeLocation,
  parseCountryAndRegion,
  resolveCountryCode,
  tryHandle,
} from '@/search/utility-router';

const NOW = new Date('2025-06-10T12:00:00Z');

describe('tryHandle', () => {
  it('routes weather to the geocoder', () => {
    expect(tryHandle("what's the weather in Boise, ID?", NOW)).toEqual({
      category: 'weather',
      answer: '[weather lookup for: Boise, ID]',
      toolName: 'weather_geocode',
      toolArgs: '{"place":"Boise, ID","maxResults":3}',
    });
  });

  it('leaves weather without a place to search', () => {
    expect(tryHandle('weather today', NOW)).toBeNull();
  });

  it('skips figurative weather phrasing', () => {
    expect(tryHandle('how do I weather the storm in Boston', NOW)).toBeNull();
  });

  it('routes local time lookups through the geocoder', () => {
    const result = tryHandle('what time is it in Tokyo', NOW);
    expect(result?.category).toBe('time');
    expect(result?.toolArgs).toBe('{"place":"Tokyo","maxResults":3}');
  });

  it('builds holiday-today args with a null region', () => {
    const result = tryHandle('is today a holiday in canada', NOW);
    expect(result?.toolName).toBe('holidays_is_today');
    expect(result?.toolArgs).toBe('{"countryCode":"CA","regionCode":null}');
  });

  it('reads an explicit year for holiday lists', () => {
    const result = tryHandle('public holidays in US-ID 2026', NOW);
    expect(result?.toolName).toBe('holidays_get');
    expect(result?.toolArgs).toBe('{"countryCode":"US","regionCode":"US-ID","year":2026,"maxItems":25}');
  });

  it('defaults the holiday year to the current one', () => {
    const result = tryHandle('holidays in japan', NOW);
    expect(result?.toolArgs).toBe('{"countryCode":"JP","regionCode":null,"year":2025,"maxItems":25}');
  });

  it('routes reachability checks', () => {
    expect(tryHandle('is example.com up?', NOW)).toEqual({
      category: 'status',
      answer: '[status check for: https://example.com/]',
      toolName: 'status_check_url',
      toolArgs: '{"url":"https://example.com/"}',
    });
  });

  it('routes feed fetches', () => {
    const result = tryHandle('fetch the rss feed at https://blog.example.org/feed.xml', NOW);
    expect(result?.toolName).toBe('feed_fetch');
    expect(result?.toolArgs).toBe('{"url":"https://blog.example.org/feed.xml","maxItems":5}');
  });

  it('counts letters inline', () => {
    expect(tryHandle('how many r\'s are in the word "strawberry"', NOW)).toEqual({
      category: 'text',
      answer: 'The word "strawberry" contains **3** \'r\' characters.',
    });
  });

  it('answers the moon distance in the requested unit', () => {
    expect(tryHandle('how far is the moon in miles', NOW)).toEqual({
      category: 'fact',
      answer: 'The average Earth-Moon distance is about **238,855 miles**.',
    });
  });

  it('does not answer days in a Martian year', () => {
    expect(tryHandle('how many days in a year on mars', NOW)).toBeNull();
  });

  it('calculates simple expressions', () => {
    expect(tryHandle('what is 2 + 2', NOW)).toEqual({ category: 'calculator', answer: '2 + 2 = **4**' });
  });

  it('converts units with four decimals', () => {
    expect(tryHandle('convert 5 miles to km', NOW)).toEqual({
      category: 'conversion',
      answer: '5 miles = **8.0467 km**',
    });
    expect(tryHandle('how many grams in a kg', NOW)).toEqual({
      category: 'conversion',
      answer: 'There are **1,000.0000 grams** in 1 kg.',
    });
  });
});

describe('helpers', () => {
  it('strips temporal tails from locations', () => {
    expect(normalizeLocation('Rexburg today?')).toBe('Rexburg');
    expect(normalizeLocation('tomorrow')).toBe('');
  });

  it('resolves country names before two-letter codes', () => {
    expect(resolveCountryCode('Japan')).toBe('JP');
    expect(resolveCountryCode('uk')).toBe('GB');
    expect(resolveCountryCode('de')).toBe('DE');
    expect(resolveCountryCode('Atlantis')).toBeNull();
  });

  it('parses region and country scopes', () => {
    expect(parseCountryAndRegion('ID, US')).toEqual({ countryCode: 'US', regionCode: 'US-ID' });
    expect(parseCountryAndRegion('northern canada')).toEqual({ countryCode: 'CA', regionCode: null });
    expect(parseCountryAndRegion('nowhere land')).toBeNull();
  });

  it('makes bare domains absolute', () => {
    expect(extractUrlLike('check https://Example.com/status).')).toBe('https://example.com/status');
    expect(extractUrlLike('no links here')).toBeNull();
  });
});
