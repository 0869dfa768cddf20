// Hyphen-like code points folded to ASCII '-' when building comparison keys.
// NFKC already maps fullwidth/small hyphen-minus, these survive it.
const DASH_VARIANTS = /[‐-―⁃−⸺⸻]/g;

/**
 * Comparison form of free text: NFKC, dashes unified, whitespace collapsed.
 * Only used for keys; output text keeps what the model wrote.
 */
export function normalizeForComparison(text: string): string {
  return text
    .normalize('NFKC')
    .replace(DASH_VARIANTS, '-')
    .replace(/\s+/g, ' ')
    .trim();
}

const CITATION_MARKER = /\[(\d+)\]/g;

/** "01" and "1" refer to the same citation. */
export function canonicalCitation(raw: string): string | null {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    return null;
  }
  return String(Number.parseInt(trimmed, 10));
}

export function findCitationNumbers(detail: string): Set<string> {
  const found = new Set<string>();
  for (const match of detail.matchAll(CITATION_MARKER)) {
    const citation = canonicalCitation(match[1]);
    if (citation !== null) {
      found.add(citation);
    }
  }
  return found;
}

/**
 * Removes every `[n]` marker whose citation is not in `keep` and rewrites
 * kept ones to their canonical number, then collapses doubled spaces.
 */
export function stripCitationMarkers(detail: string, keep: ReadonlySet<string>): string {
  return detail
    .replace(CITATION_MARKER, (_marker: string, digits: string) => {
      const citation = canonicalCitation(digits);
      return citation !== null && keep.has(citation) ? `[${citation}]` : '';
    })
    .replace(/ {2,}/g, ' ')
    .trim();
}
