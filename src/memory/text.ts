// ── Tokenizer shared by the local embedder, keyword search and topic detection ──

const STOPWORDS = new Set([
  "a", "an", "and", "are", "as", "at", "be", "but", "by", "can", "do", "does",
  "for", "from", "how", "i", "in", "is", "it", "me", "my", "of", "on", "or",
  "so", "that", "the", "this", "to", "was", "we", "what", "with", "you", "your",
]);

const TOKEN_RE = /[\p{L}\p{N}_]+/gu;
const CJK_CHAR_RE = /\p{Script=Han}|\p{Script=Hiragana}|\p{Script=Katakana}|\p{Script=Hangul}/u;

/** Trim common English inflections so "prefers" and "prefer" meet. */
function stem(word: string): string {
  if (word.length > 4 && word.endsWith("ies")) return `${word.slice(0, -3)}y`;
  if (word.length > 3 && word.endsWith("s") && !word.endsWith("ss")) {
    return word.slice(0, -1);
  }
  return word;
}

/**
 * Lowercased content tokens with stopwords removed. CJK runs are split into
 * single characters since they carry no spaces.
 */
export function tokenize(text: string): string[] {
  const out: string[] = [];
  for (const match of text.toLowerCase().matchAll(TOKEN_RE)) {
    const word = match[0];
    if (CJK_CHAR_RE.test(word)) {
      for (const ch of word) out.push(ch);
      continue;
    }
    if (word.length < 2 || STOPWORDS.has(word)) continue;
    out.push(stem(word));
  }
  return out;
}

/** Share of distinct query tokens present in `text` (0..1). */
export function keywordScore(query: string, text: string): number {
  const queryTokens = new Set(tokenize(query));
  if (queryTokens.size === 0) return 0;
  const textTokens = new Set(tokenize(text));
  let matched = 0;
  for (const token of queryTokens) {
    if (textTokens.has(token)) matched++;
  }
  return matched / queryTokens.size;
}
