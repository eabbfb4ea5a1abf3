import type { ScoredSnippet } from '../retrieval/types';

export type PromptShape = 'grounded' | 'no_context';

export interface ComposedPrompt {
  shape: PromptShape;
  system: string;
  user: string;
}

const ACTION_INSTRUCTIONS = [
  'If the caller wants to book an appointment and has given their name, phone number, the issue and a time,',
  'confirm the booking in your reply and add one line on its own in exactly this form:',
  'ACTION schedule_appointment {"customer_name": "...", "customer_phone": "...", "customer_address": "...", "issue_type": "...", "scheduled_time": "<ISO 8601>"}',
  'Keep replies short; they are spoken aloud on a phone call.',
].join('\n');

const GROUNDED_SYSTEM = [
  "You are an AI receptionist for a business. Answer the caller's question by prioritizing the information found in the context.",
  "If the context doesn't contain the answer, use your general knowledge, but clearly state that the information is not from the business.",
  ACTION_INSTRUCTIONS,
].join('\n');

const NO_CONTEXT_SYSTEM = [
  'You are an AI receptionist for a business.',
  'No information from the business knowledge base is available for this question.',
  'Do not invent prices, hours, policies or other business details; say you do not have that information and offer to take a message or book an appointment.',
  ACTION_INSTRUCTIONS,
].join('\n');

export function composePrompt(utterance: string, snippets: readonly ScoredSnippet[]): ComposedPrompt {
  const question = utterance.trim();

  if (snippets.length === 0) {
    return {
      shape: 'no_context',
      system: NO_CONTEXT_SYSTEM,
      user: `Question:\n${question}`,
    };
  }

  const context = snippets.map((snippet, index) => `[${index + 1}] ${snippet.text.trim()}`).join('\n');
  return {
    shape: 'grounded',
    system: GROUNDED_SYSTEM,
    user: `Context:\n${context}\n\nQuestion:\n${question}`,
  };
}
