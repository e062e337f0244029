// Latin words plus short CJK runs, so mixed-language scenes still overlap.
const TOKEN_PATTERN = /[a-z0-9_]+|[\u4e00-\u9fff]{1,3}/g;

export function tokenize(text: string): Set<string> {
  const tokens = new Set<string>();
  for (const match of text.toLowerCase().matchAll(TOKEN_PATTERN)) {
    if (match[0]) tokens.add(match[0]);
  }
  return tokens;
}

/** Share of query tokens that also appear in the candidate. */
export function overlapScore(query: Set<string>, candidate: Set<string>): number {
  if (query.size === 0 || candidate.size === 0) return 0;
  let shared = 0;
  for (const token of query) {
    if (candidate.has(token)) shared++;
  }
  return shared / query.size;
}
