import { jsonrepair } from 'jsonrepair';

export interface LenientParse {
  value: unknown;
  repaired: boolean;
}

/**
 * Parse JSON text, falling back to jsonrepair for the usual model slips
 * (single quotes, trailing commas, unquoted keys). Null when neither works.
 */
export function parseLenientJson(text: string): LenientParse | null {
  try {
    return { value: JSON.parse(text), repaired: false };
  } catch {
    // fall through to repair
  }
  try {
    return { value: JSON.parse(jsonrepair(text)), repaired: true };
  } catch {
    return null;
  }
}
