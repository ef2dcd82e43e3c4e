const TOKENS_PER_PRICE_UNIT = 1_000_000;

/**
 * Cost of one AI call in USD from per-1M-token prices.
 * Returns null when token counts or prices are unknown.
 *
 * @example calculateCost(1000, 500, 5, 15) // 0.0125
 */
export function calculateCost(
  inputTokens: number | null | undefined,
  outputTokens: number | null | undefined,
  inputPricePer1M: number | null | undefined,
  outputPricePer1M: number | null | undefined,
): number | null {
  if (inputTokens == null || outputTokens == null) return null;
  if (inputPricePer1M == null || outputPricePer1M == null) return null;

  const inputCost = (inputTokens / TOKENS_PER_PRICE_UNIT) * inputPricePer1M;
  const outputCost = (outputTokens / TOKENS_PER_PRICE_UNIT) * outputPricePer1M;
  return inputCost + outputCost;
}
