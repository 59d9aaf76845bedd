// Triage summary prompt builder
import type { SummaryInput } from '../../../shared/types/api.js';

export function buildSummaryPrompt(input: SummaryInput): {
  system: string;
  prompt: string;
} {
  const system = `You are an assistant that summarizes Outlook emails for quick triage.

Summarize the email in 3-6 concise bullet points. Include the sender's intent and any deadlines.
Suggest one next action if appropriate. Keep it under 40 words.

Write plain text only: bullets start with "• ", no markdown, no preamble.`;

  const prompt = `Subject: ${input.subject || '(no subject)'}
From: ${input.sender || '(unknown)'}
Content:
${input.text}`;

  return { system, prompt };
}
