/**
 * Brainstorm services
 */

export { generatePrompts, normalizeCapture, PROMPT_COUNT } from './prompts.js';
