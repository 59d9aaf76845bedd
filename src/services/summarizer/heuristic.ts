import type { Summarizer, SummaryInput } from '../../shared/types/api.js';
import { sliceText } from '../../lib/text.js';

const PREVIEW_CHARS = 220;
const EMPTY_BODY = '(no text content)';

/**
 * First characters of the whitespace-collapsed body
 */
export function heuristicSummary(text: string, maxChars = PREVIEW_CHARS): string {
  const collapsed = text.replace(/\s+/g, ' ').trim();
  if (!collapsed) return EMPTY_BODY;
  if (collapsed.length <= maxChars) return collapsed;
  return `${sliceText(collapsed, maxChars).trimEnd()}…`;
}

/**
 * Local summarizer, no model calls. Used in "local" mode and as the pipeline's fallback.
 */
export class HeuristicSummarizer implements Summarizer {
  readonly name = 'local';

  constructor(private readonly maxChars = PREVIEW_CHARS) {}

  async summarize(input: SummaryInput): Promise<string> {
    return [
      `• Subject: ${input.subject || '(no subject)'}`,
      `• From: ${input.sender || '(unknown)'}`,
      `• Preview: ${heuristicSummary(input.text, this.maxChars)}`,
    ].join('\n');
  }
}
