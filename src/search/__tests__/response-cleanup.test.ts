import { describe, expect, it } from 'vitest';
import {
  buildExtractiveFallback,
  stripTemplateTokens,
  trimDanglingIncompleteEnding,
} from '@/search/response-cleanup';

describe('stripTemplateTokens', () => {
  it('removes template tokens and cuts self-dialogue', () => {
    expect(stripTemplateTokens('Answer here.<|im_end|>\nUser: next question')).toBe('Answer here.');
  });

  it('returns empty for blank text', () => {
    expect(stripTemplateTokens('  \n ')).toBe('');
  });
});

describe('trimDanglingIncompleteEnding', () => {
  it('keeps complete text', () => {
    expect(trimDanglingIncompleteEnding('All done.  ')).toBe('All done.');
  });

  it('cuts back to the last sentence when enough remains', () => {
    expect(
      trimDanglingIncompleteEnding('The index closed higher after a strong day. Analysts said the rally could'),
    ).toBe('The index closed higher after a strong day.');
  });

  it('only strips trailing separators from short text', () => {
    expect(trimDanglingIncompleteEnding('Markets rose. Then,')).toBe('Markets rose. Then');
  });

  it('drops trailing table rows', () => {
    expect(trimDanglingIncompleteEnding('Summary line.\n| a | b |\n| 1 |')).toBe('Summary line.');
  });
});

describe('buildExtractiveFallback', () => {
  it('takes the first substantive lines', () => {
    const content = [
      '=== Story A ===',
      'short',
      'The first useful line of text.',
      '[…truncated]',
      'The second useful line of text.',
    ].join('\n');
    expect(buildExtractiveFallback(content)).toBe('The first useful line of text.\n\nThe second useful line of text.');
  });

  it('has fixed replies for empty input', () => {
    expect(buildExtractiveFallback('')).toBe("I found some results but couldn't generate a summary.");
    expect(buildExtractiveFallback('tiny\n[x]')).toBe("I found some results but couldn't generate a clean summary.");
  });
});
