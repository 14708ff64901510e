/**
 * Follow-up prompts for a brainstorm capture
 *
 * Five fixed templates, filled from the topic and the ideas just recorded.
 * The same input always yields the same prompts.
 */

import { InputError } from '../../utils/errors.js';

export const PROMPT_COUNT = 5;

const MAX_QUOTE_LENGTH = 60;

function quote(text: string): string {
  const clean = text.replace(/\s+/g, ' ').trim();
  if (clean.length <= MAX_QUOTE_LENGTH) return `"${clean}"`;
  return `"${clean.slice(0, MAX_QUOTE_LENGTH - 3).trimEnd()}..."`;
}

function extensionPrompt(topic: string, ideas: readonly string[]): string {
  const first = ideas[0];
  const last = ideas[ideas.length - 1];
  if (first !== undefined && last !== undefined && ideas.length > 1) {
    return `How could ${quote(first)} and ${quote(last)} combine into something new?`;
  }
  if (first !== undefined) {
    return `Take ${quote(first)} further: what new angle or question does it open up?`;
  }
  return `List three more ideas about ${quote(topic)} before judging any of them.`;
}

/**
 * Normalize and validate a brainstorm capture
 */
export function normalizeCapture(topic: string, ideas: readonly string[]): { topic: string; ideas: string[] } {
  const cleanTopic = topic.replace(/\s+/g, ' ').trim();
  if (!cleanTopic) {
    throw new InputError('Brainstorm topic cannot be empty');
  }
  const cleanIdeas = ideas.map((idea) => idea.replace(/\s+/g, ' ').trim()).filter(Boolean);
  if (cleanIdeas.length === 0) {
    throw new InputError('Provide at least one idea to record');
  }
  return { topic: cleanTopic, ideas: cleanIdeas };
}

/**
 * Generate the five follow-up prompts for a topic and its ideas
 */
export function generatePrompts(topic: string, ideas: readonly string[]): string[] {
  const subject = quote(topic);
  return [
    `Break ${subject} into three smaller goals you could finish this week.`,
    `What could get in the way of ${subject}, and how would you respond?`,
    `Which resources, tools or people could help move ${subject} forward?`,
    `What is the smallest next step on ${subject} you can complete within 24 hours?`,
    extensionPrompt(topic, ideas),
  ];
}
