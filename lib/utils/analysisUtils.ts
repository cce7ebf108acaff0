import type { EntityReference } from '../models/intent';

/**
 * Pulls the JSON object out of a model response. Handles fenced code blocks
 * and prose around the object; returns null when there is no object at all.
 */
export function extractJsonObject(response: string): string | null {
  const text = response.trim();

  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
  const candidate = fenced ? fenced[1].trim() : text;

  const objectMatch = candidate.match(/\{[\s\S]*\}/);
  return objectMatch ? objectMatch[0] : null;
}

export interface KeywordIntent {
  intent: string;
  confidence: number;
}

const INTENT_PATTERNS: Array<{ intent: string; patterns: RegExp[] }> = [
  {
    intent: 'export_claims',
    patterns: [/\b(export|download|dump)\b.*\bclaims?\b/i, /\bclaims?\b.*\b(export|download)\b/i]
  },
  {
    intent: 'calculate_total',
    patterns: [/\b(total|sum|calculate|add up)\b/i]
  },
  {
    intent: 'get_claims',
    patterns: [/\b(show|get|list|find|view)\b.*\bclaims?\b/i, /^\s*claims?\b/i]
  },
  {
    intent: 'search_knowledge',
    patterns: [/\b(policy|policies|procedure|guideline|how do i|what is)\b/i]
  },
  {
    intent: 'query_patients',
    patterns: [/\b(find|search|look for|look up)\b/i, /\bpatients?\b/i]
  }
];

/**
 * Keyword fallback used when the model output cannot be decoded. Order matters:
 * more specific intents are checked first.
 */
export function detectIntentByKeywords(message: string): KeywordIntent {
  const msg = message.toLowerCase().trim();

  for (const { intent, patterns } of INTENT_PATTERNS) {
    if (patterns.some(pattern => pattern.test(msg))) {
      return { intent, confidence: 0.6 };
    }
  }

  return { intent: 'unknown', confidence: 0.3 };
}

/**
 * Finds capitalized names after "for", "by" or "patient", e.g. "claims for John".
 */
export function extractNameReferences(message: string): EntityReference[] {
  const references: EntityReference[] = [];
  const words = message.split(/\s+/).filter(Boolean);

  words.forEach((word, index) => {
    const next = words[index + 1];
    if (!next || !['for', 'by', 'patient'].includes(word.toLowerCase())) return;

    const name = next.replace(/[^\p{L}'-]/gu, '');
    if (name && name[0] === name[0].toUpperCase() && name[0] !== name[0].toLowerCase()) {
      references.push({ name: 'patient', kind: 'patient', reference: name });
    }
  });

  return references.slice(0, 1);
}
