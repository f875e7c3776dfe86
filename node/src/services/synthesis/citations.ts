// [Source 3], [Sources 1, 4], [source 2 and 5], (Source 9), and bare [7] or [1, 3].
// A bare group followed by "(" is a markdown link label and is left alone.
const CITATION_GROUP =
  /[ \t]*(?:\[\s*sources?\b\s*([^\]]*)\]|\(\s*sources?\b\s*([^)]*)\)|\[\s*(\d+(?:\s*(?:,|&|and)\s*\d+)*)\s*\](?!\())/gi;

export interface VerifiedCitations {
  text: string;
  /** Valid indices in order of first citation. */
  cited: number[];
}

/**
 * Keeps only citation indices that exist in the corpus and rewrites every
 * surviving group as `[Source n, m]`. A group left with no valid index is
 * removed together with the whitespace before it.
 */
export function verifyCitations(text: string, valid: ReadonlySet<number>): VerifiedCitations {
  const cited: number[] = [];

  const cleaned = text.replace(
    CITATION_GROUP,
    (match: string, bracketed?: string, parenthesized?: string, bare?: string) => {
      const inner = bracketed ?? parenthesized ?? bare ?? '';
      const leading = /^[ \t]*/.exec(match)?.[0] ?? '';
      const indices = Array.from(inner.matchAll(/\d+/g), (m) => Number(m[0]));
      const kept = indices.filter((n, i) => valid.has(n) && indices.indexOf(n) === i);
      if (kept.length === 0) return '';
      for (const n of kept) if (!cited.includes(n)) cited.push(n);
      return `${leading}[Source ${kept.join(', ')}]`;
    },
  );

  return { text: cleaned, cited };
}

/** Removes every citation marker, e.g. from an earlier report reused as context. */
export function stripCitations(text: string): string {
  return verifyCitations(text, new Set()).text;
}
