import type { Capability } from '../models/intent';

/**
 * Prompt for extracting a structured intent analysis from a user request
 * @param userInput - The raw user message
 * @param capabilities - Actions the assistant can execute
 * @param serializedContext - Recent history and values the user already clarified
 * @param strict - Set on the retry after a malformed answer
 */
export const intentAnalysisPrompt = (
  userInput: string,
  capabilities: readonly Capability[],
  serializedContext: string,
  strict: boolean = false
): string => {
  const toolList = capabilities
    .map((capability, index) => {
      const params = capability.requiredParameters.map(param => param.name).join(', ');
      return `${index + 1}. ${capability.name} - ${capability.description} (requires: ${params})`;
    })
    .join('\n');

  const strictRules = strict
    ? `
STRICT OUTPUT RULES:
- Your previous answer could not be parsed.
- Respond with ONE JSON object and nothing else: no prose, no markdown, no code fences.
- Use double quotes for every key and string value.
- "confidence" must be a number between 0 and 1.
`
    : '';

  return `Analyze this user request and extract structured information.

USER REQUEST: "${userInput}"

AVAILABLE TOOLS:
${toolList}

CONTEXT FROM PREVIOUS CONVERSATION:
${serializedContext || 'None'}

EXTRACT:
1. Intent: which tool should be used? Use "unknown" if none fits.
2. Entities: people or records referenced by name rather than by ID.
   - kind "patient": a full or partial patient name
   - kind "claim": a claim described in words
3. Parameters: exact values the user gave (patient_id, claim_ids, status, count, query, ...).
4. Confidence (0.0-1.0):
   - High (0.90+): exact IDs or very specific values
   - Medium (0.60-0.90): clear request but a value may match several records
   - Low (<0.60): vague or unclear request

Respond in this JSON format:
{
  "intent": "get_claims",
  "entities": [
    { "name": "patient", "kind": "patient", "reference": "John" }
  ],
  "parameters": { "status": ["pending"] },
  "confidence": 0.55,
  "reasoning": "Brief explanation"
}

Focus on detecting ambiguity. Names like "John" without an ID are likely ambiguous.
${strictRules}`;
};
