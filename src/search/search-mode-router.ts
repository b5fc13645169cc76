/**
 * Heuristic turn classifier, no model call.
 *
 * FollowUp needs fresh session results plus follow-up or referential wording;
 * news phrasing gives NewsAggregate; everything else is WebFactFind.
 */
import type { SearchSession } from '@/search/search-session';
import type { FollowUpBranch, SearchMode } from '@/search/types';

const NEWS_TRIGGERS = [
  'news',
  'headlines',
  'top headlines',
  'top stories',
  'breaking',
  'current events',
  "what's happening",
  'whats happening',
  'week in review',
  'month in review',
  'daily briefing',
  'news this week',
  'news last week',
  'latest news',
  'recent news',
  'news feed',
  'what happened',
  "what's going on",
  'whats going on',
];

const FOLLOW_UP_PHRASES = [
  'tell me more',
  'more info',
  'more information',
  'more detail',
  'more details',
  'more about',
  'go deeper',
  'dig into',
  'elaborate',
  'expand on',
  'continue',
  'keep going',
  'what else',
  'anything else',
];

const MORE_SOURCES_PHRASES = [
  'more sources',
  'other sources',
  'other coverage',
  'related articles',
  'find more',
  'other perspectives',
  'different sources',
  'additional coverage',
  'more coverage',
  'other reports',
];

// whole words only: "Reddit" or "credit" must not read as "it"
const REFERENTIAL_MARKERS = /\b(?:this|that|it|these|those|the (?:first|second|third))\b/;

// Referential words alone only count in short messages; long ones usually start a new topic.
const REFERENTIAL_MAX_LENGTH = 80;

const containsAny = (text: string, needles: readonly string[]) => needles.some((n) => text.includes(n));

/** Expects a lower-cased message. */
export function isFollowUpMessage(lower: string): boolean {
  if (containsAny(lower, FOLLOW_UP_PHRASES)) return true;
  return lower.startsWith('more ') && lower.length < 60;
}

export function isReferential(lower: string): boolean {
  return REFERENTIAL_MARKERS.test(lower);
}

export function looksLikeNewsIntent(lower: string): boolean {
  return containsAny(lower, NEWS_TRIGGERS);
}

export function classify(message: string, session: SearchSession, now: Date): SearchMode {
  const lower = message.trim().toLowerCase();
  if (!lower) return 'WebFactFind';

  if (session.hasRecentResults(now)) {
    const referential = isReferential(lower) && lower.length < REFERENTIAL_MAX_LENGTH;
    if (isFollowUpMessage(lower) || referential) return 'FollowUp';
  }

  if (looksLikeNewsIntent(lower)) return 'NewsAggregate';
  return 'WebFactFind';
}

export function classifyFollowUpBranch(message: string): FollowUpBranch {
  const lower = message.trim().toLowerCase();
  return containsAny(lower, MORE_SOURCES_PHRASES) ? 'MoreSources' : 'DeepDive';
}
