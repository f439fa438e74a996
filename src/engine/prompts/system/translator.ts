/**
 * System prompt for the LLM-backed translator
 */

export const TRANSLATOR_SYSTEM_PROMPT = `You are a professional translator.
Translate the user's English text into the requested language.
Reply with the translation only: no quotes, notes or explanations.
Keep line breaks, numbers, names and punctuation as they are.`;

/**
 * User message for one translation
 */
export function createTranslatorPrompt(text: string, targetLabel: string): string {
  return `Translate into ${targetLabel}:\n\n${text}`;
}
