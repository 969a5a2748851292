import { getEncoding } from "js-tiktoken";

type TiktokenEncoding = Parameters<typeof getEncoding>[0];

/**
 * Estimated token cost of a piece of text. Provider-agnostic: the pipeline
 * never needs an exact count, only a consistent one.
 */
export type TokenCounter = (text: string) => number;

/**
 * Character heuristic: roughly four characters per token
 */
export const estimateTokens: TokenCounter = (text) => Math.ceil(text.length / 4);

/**
 * BPE counter backed by js-tiktoken. The encoder is built on first use.
 */
export function createTiktokenCounter(encoding: TiktokenEncoding = "cl100k_base"): TokenCounter {
  let encoder: ReturnType<typeof getEncoding> | null = null;

  return (text) => {
    if (!encoder) {
      encoder = getEncoding(encoding);
    }
    return encoder.encode(text).length;
  };
}
