export function normalizeText(text: string): string {
  return text.toLowerCase().replace(/\s+/g, ' ').trim();
}

/** Text sent to the embedding model for a query or a claim topic. */
export function buildEmbeddingText(text: string): string {
  return normalizeText(text).replace(/[.!?;:,]+$/, '');
}
