// src/search/response-cleanup.ts: post-processing for model summaries

const TEMPLATE_TOKENS = ['<|im_end|>', '<|endoftext|>', '[/INST]', '[INST]', '</s>', '<s>'];
const SELF_DIALOGUE_MARKERS = ['\nUser:', '\nuser:', '\nHuman:', '\nhuman:', '\n### User', '\n### Human'];

export const EMPTY_SUMMARY_REPLY = "I wasn't able to generate a clean answer — try rephrasing?";

/** Drops chat-template artifacts and cuts the text where the model starts talking to itself. */
export function stripTemplateTokens(text: string): string {
  if (!text.trim()) return '';

  let out = text;
  for (const token of TEMPLATE_TOKENS) out = out.split(token).join('');
  for (const marker of SELF_DIALOGUE_MARKERS) {
    const idx = out.indexOf(marker);
    if (idx > 0) out = out.slice(0, idx);
  }
  return out.trim();
}

/**
 * Token-limited output often stops mid-table or mid-sentence. Removes trailing
 * table rows, then cuts back to the last sentence end when that keeps enough text.
 */
export function trimDanglingIncompleteEnding(text: string): string {
  if (!text.trim()) return text;

  const lines = text.trim().split('\n');
  while (lines.length > 0) {
    const last = lines[lines.length - 1].trim();
    if (last.length === 0 || last.startsWith('|')) {
      lines.pop();
      continue;
    }
    break;
  }

  const cleaned = lines.join('\n').trim();
  if (!cleaned) return text.trim();

  if (/[.!?"')\]]$/.test(cleaned)) return cleaned;

  const sentenceEnd = Math.max(cleaned.lastIndexOf('.'), cleaned.lastIndexOf('!'), cleaned.lastIndexOf('?'));
  if (sentenceEnd >= 40) return cleaned.slice(0, sentenceEnd + 1).trim();

  return cleaned.replace(/[,;:\-—]+$/, '').trim();
}

/**
 * Used when the model cannot summarize: the first few substantive lines of the
 * raw input, skipping section headers.
 */
export function buildExtractiveFallback(content: string): string {
  if (!content.trim()) return "I found some results but couldn't generate a summary.";

  const lines = content
    .split('\n')
    .map((l) => l.trim())
    .filter((l) => l.length > 10 && !l.startsWith('[') && !l.startsWith('==='))
    .slice(0, 5);

  return lines.length > 0 ? lines.join('\n\n') : "I found some results but couldn't generate a clean summary.";
}
