import { Decimal } from "decimal.js";

import type { MarketScaling } from "./types.js";

// Wide enough that u64 * u64 * 10^x stays exact before the final division.
export const BookDecimal = Decimal.clone({ precision: 80, rounding: Decimal.ROUND_HALF_EVEN });

/**
 * Native price (quote lots per base lot) -> UI price.
 * price = native * quoteLot * 10^(baseDecimals - quoteDecimals) / baseLot
 */
export function nativePriceToUi(native: bigint, market: MarketScaling): Decimal {
  const exp = market.baseDecimals - market.quoteDecimals;
  return new BookDecimal(native.toString())
    .mul(market.quoteLotSize.toString())
    .mul(new BookDecimal(10).pow(exp))
    .div(market.baseLotSize.toString());
}

/**
 * Native quantity (base lots) -> UI quantity.
 * quantity = native * baseLot / 10^baseDecimals
 */
export function nativeQuantityToUi(native: bigint, market: MarketScaling): Decimal {
  return new BookDecimal(native.toString())
    .mul(market.baseLotSize.toString())
    .div(new BookDecimal(10).pow(market.baseDecimals));
}

export function assertMarketScaling(market: MarketScaling): MarketScaling {
  if (market.baseLotSize <= 0n) throw new Error("base_lot_size_invalid");
  if (market.quoteLotSize <= 0n) throw new Error("quote_lot_size_invalid");
  for (const [label, d] of [
    ["base_decimals", market.baseDecimals],
    ["quote_decimals", market.quoteDecimals],
  ] as const) {
    if (!Number.isInteger(d) || d < 0 || d > 255) throw new Error(`${label}_invalid`);
  }
  return market;
}
