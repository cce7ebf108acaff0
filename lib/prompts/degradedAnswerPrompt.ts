/**
 * Prompt for a best-effort answer when a turn cannot complete normally
 * @param userInput - The original request
 * @param reasonNote - Why the request could not be completed
 * @param knownFacts - JSON of what was understood before giving up
 */
export const degradedAnswerPrompt = (userInput: string, reasonNote: string, knownFacts: string): string => {
  return `You are a claims assistant. You could not fully complete the request below.

USER REQUEST: "${userInput}"

WHAT HAPPENED: ${reasonNote}

WHAT WAS UNDERSTOOD:
${knownFacts}

INSTRUCTIONS:
1. Give your best guess at what the user wanted, based only on what was understood
2. Say plainly that the request could not be completed and why
3. Suggest one concrete way to phrase the request so it can succeed
4. Keep it under 80 words, no markdown headings`;
};
