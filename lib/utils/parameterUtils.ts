import type { ParameterType, ParameterValue } from '../models/intent';

/**
 * Converts a user-supplied value to the declared parameter type.
 * Returns null when the value is empty or cannot be read as that type.
 */
export function coerceParameter(value: unknown, type: ParameterType): ParameterValue | null {
  switch (type) {
    case 'number': {
      if (typeof value === 'number') return Number.isFinite(value) ? value : null;
      if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value.trim());
        return Number.isFinite(parsed) ? parsed : null;
      }
      return null;
    }

    case 'boolean':
      if (typeof value === 'boolean') return value;
      if (value === 'true' || value === 'yes') return true;
      if (value === 'false' || value === 'no') return false;
      return null;

    case 'array': {
      const items = Array.isArray(value) ? value : typeof value === 'string' ? value.split(',') : [];
      const strings = items
        .filter((item): item is string | number => typeof item === 'string' || typeof item === 'number')
        .map(item => String(item).trim())
        .filter(Boolean);
      return strings.length ? strings : null;
    }

    case 'date': {
      if (typeof value !== 'string' || value.trim() === '') return null;
      return Number.isNaN(Date.parse(value.trim())) ? null : value.trim();
    }

    case 'string':
      if (typeof value === 'number') return String(value);
      if (typeof value === 'string' && value.trim() !== '') return value.trim();
      return null;
  }
}

/** "claim_ids" -> "Claim ids" */
export function humanizeParameter(name: string): string {
  const words = name.replace(/_/g, ' ').trim();
  return words.charAt(0).toUpperCase() + words.slice(1);
}

export function formatParameterValue(value: ParameterValue): string {
  return Array.isArray(value) ? value.join(', ') : String(value);
}
