/**
 * Text normalisation for the hashing encoder.
 */

/** Words that carry no "vibe" signal */
const STOPWORDS = new Set([
  "a", "an", "and", "are", "as", "at", "be", "by", "for", "from", "in", "into",
  "is", "it", "its", "of", "on", "or", "the", "to", "with", "some", "somewhere",
  "place", "places", "i", "me", "my", "we", "want", "looking", "like", "near",
]);

/** Lowercase, strip diacritics, collapse whitespace. */
export function normalizeText(text: string): string {
  return text
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/\s+/g, " ")
    .trim();
}

/** Alphanumeric word tokens with stopwords removed. */
export function tokenize(text: string): string[] {
  return normalizeText(text)
    .split(/[^a-z0-9]+/)
    .filter((t) => t.length > 0 && !STOPWORDS.has(t));
}

/** Character trigrams of a token, padded with '#' at both ends. */
export function charTrigrams(token: string): string[] {
  const padded = `#${token}#`;
  if (padded.length <= 3) return [padded];
  const grams: string[] = [];
  for (let i = 0; i + 3 <= padded.length; i++) {
    grams.push(padded.slice(i, i + 3));
  }
  return grams;
}
