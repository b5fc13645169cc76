// src/search/market-quote-heuristics.ts: detects "what is the Dow doing right now" style requests

import type { Recency } from '@/search/types';

const MARKET_SUBJECTS = [
  'dow jones',
  'djia',
  's&p',
  's and p',
  'sp500',
  's&p 500',
  'nasdaq',
  'russell 2000',
  'nyse',
  'stock market',
  'index',
];

const QUOTE_SIGNALS = [
  'quote',
  'price',
  'trading',
  'points',
  'percent',
  '%',
  'up',
  'down',
  'live',
  'right now',
  'currently',
  'current',
  'latest',
  'most recent',
  'most recently',
  'past few hours',
  'last few hours',
  'today',
  'at ',
];

const WEEK_MARKERS = ['this week', 'past week', 'last week', 'weekly'];
const MONTH_MARKERS = ['this month', 'past month', 'last month', 'monthly'];

const containsAny = (text: string, needles: readonly string[]) => needles.some((n) => text.includes(n));

export function isMarketQuoteRequest(message: string | null | undefined): boolean {
  const lower = (message ?? '').trim().toLowerCase();
  if (!lower || !containsAny(lower, MARKET_SUBJECTS)) return false;
  if (containsAny(lower, QUOTE_SIGNALS)) return true;
  return lower.startsWith("what's") || lower.startsWith('whats') || lower.startsWith('what is');
}

/** Quotes default to the last day unless the user asked about a week or a month. */
export function preferredQuoteRecency(message: string): Recency {
  const lower = message.toLowerCase();
  if (containsAny(lower, WEEK_MARKERS)) return 'week';
  if (containsAny(lower, MONTH_MARKERS)) return 'month';
  return 'day';
}

export function extractCanonicalInstrument(message: string | null | undefined): string | null {
  const lower = (message ?? '').toLowerCase();
  if (!lower.trim()) return null;

  // most specific first
  if (lower.includes('dow jones') || lower.includes('djia')) return 'Dow Jones';
  if (lower.includes('s&p') || lower.includes('sp500') || lower.includes('s and p')) return 'S&P 500';
  if (lower.includes('russell 2000')) return 'Russell 2000';
  if (lower.includes('nasdaq')) return 'Nasdaq';
  if (lower.includes('nyse')) return 'NYSE Composite';
  if (lower.includes('stock market')) return 'stock market';
  return null;
}
