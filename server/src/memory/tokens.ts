/** Lowercase word tokens: letters, digits and underscores */
export function tokenize(text: string): string[] {
  return text.normalize("NFKC").toLowerCase().match(/[\p{L}\p{N}_]+/gu) ?? [];
}

export function indexKeyFor(text: string): string {
  return tokenize(text).join(" ");
}

/**
 * FTS5 query matching any of the tokens, each quoted so operators and
 * column filters in user input stay literal. Null when there is nothing to
 * search for.
 */
export function toMatchQuery(query: string): string | null {
  const tokens = [...new Set(tokenize(query))];
  if (tokens.length === 0) return null;
  return tokens.map((t) => `"${t.replace(/"/g, '""')}"`).join(" OR ");
}

export function normalizeTags(tags: readonly string[] = []): string[] {
  return [...new Set(tags.map((t) => t.trim()).filter(Boolean))];
}
