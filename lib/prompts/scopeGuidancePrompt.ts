import type { Capability } from '../models/intent';

/**
 * Prompt for proposing in-scope alternatives to an unclear or unsupported request
 * @param userInput - What the user asked for
 * @param detectedIntent - The intent the analyzer settled on, possibly "unknown"
 * @param capabilities - The only actions that may be proposed
 */
export const scopeGuidancePrompt = (
  userInput: string,
  detectedIntent: string,
  capabilities: readonly Capability[]
): string => {
  const actions = capabilities.map(capability => `- ${capability.name}: ${capability.description}`).join('\n');

  return `A user asked an assistant for something it could not map to a single supported action.

USER REQUEST: "${userInput}"
DETECTED INTENT: ${detectedIntent}

SUPPORTED ACTIONS (propose nothing else):
${actions}

TASK: Propose 3 or 4 supported actions that best match what the user may have wanted,
most likely first. Write each label as a short instruction the user can click.

Respond with ONLY a JSON object:
{
  "actions": [
    { "id": "get_claims", "label": "Show the claims of a patient" }
  ]
}`;
};
