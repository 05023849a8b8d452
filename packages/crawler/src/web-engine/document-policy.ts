import type { FetchSuccess, ResolvedDocument } from './types.js';

const usable = (value: string | null): string | undefined =>
  value !== null && value.trim().length > 0 ? value : undefined;

/**
 * Prefer the filtered document, fall back to the raw one. Neither being
 * usable is an extraction failure, not a fetch failure.
 */
export function resolveDocument(
  outcome: Pick<FetchSuccess, 'primaryDocument' | 'fallbackDocument'>,
): ResolvedDocument {
  const primary = usable(outcome.primaryDocument);
  if (primary !== undefined) {
    return { kind: 'fit', content: primary };
  }

  const fallback = usable(outcome.fallbackDocument);
  if (fallback !== undefined) {
    return { kind: 'raw', content: fallback };
  }

  return { kind: 'none' };
}
