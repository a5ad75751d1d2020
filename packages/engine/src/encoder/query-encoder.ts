/** Maps free text into the vector space of the embedding index. */
export interface QueryEncoder {
  /** Output vector length */
  readonly dimension: number;
  /**
   * Encode non-empty text. Throws InvalidInputError for empty or
   * whitespace-only input.
   */
  encode(text: string, signal?: AbortSignal): Promise<number[]>;
}
