import type { Summarizer } from '../../shared/types/api.js';
import { HeuristicSummarizer } from './heuristic.js';
import { LlmSummarizer } from './llm.js';

export function createSummarizer(config: {
  mode: 'llm' | 'local';
  model: string;
  maxInputChars: number;
}): Summarizer {
  if (config.mode === 'local') {
    console.log('Summarizer mode: local (heuristic preview)');
    return new HeuristicSummarizer();
  }

  console.log(`Summarizer mode: llm (${config.model})`);
  return new LlmSummarizer({ model: config.model, maxInputChars: config.maxInputChars });
}

export { HeuristicSummarizer, heuristicSummary } from './heuristic.js';
export { LlmSummarizer } from './llm.js';
