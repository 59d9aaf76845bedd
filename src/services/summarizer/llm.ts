import type { Summarizer, SummaryInput } from '../../shared/types/api.js';
import { sliceText } from '../../lib/text.js';
import { generateTextCompletion, type TextCompletion, type TextCompletionParams } from '../llm/client.js';
import { buildSummaryPrompt } from '../llm/prompts/summarization.js';
import { heuristicSummary } from './heuristic.js';

export interface LlmSummarizerOptions {
  model: string;
  maxInputChars: number;
  timeoutMs?: number;
  complete?: (params: TextCompletionParams) => Promise<TextCompletion>;
}

/**
 * Model-backed summarizer. Oversized input is cut, empty input never reaches the model.
 * Backend failures propagate; the digest pipeline falls back to the heuristic summary.
 */
export class LlmSummarizer implements Summarizer {
  readonly name: string;
  private readonly complete: (params: TextCompletionParams) => Promise<TextCompletion>;

  constructor(private readonly options: LlmSummarizerOptions) {
    this.name = `llm:${options.model}`;
    this.complete = options.complete ?? generateTextCompletion;
  }

  async summarize(input: SummaryInput): Promise<string> {
    const text = sliceText(input.text.trim(), this.options.maxInputChars);
    if (!text) {
      return heuristicSummary(text);
    }

    const { system, prompt } = buildSummaryPrompt({ ...input, text });
    const { text: summary } = await this.complete({
      model: this.options.model,
      system,
      prompt,
      temperature: 0.3,
      maxTokens: 200,
      abortSignal: AbortSignal.timeout(this.options.timeoutMs ?? 20_000),
    });

    return summary.trim();
  }
}
