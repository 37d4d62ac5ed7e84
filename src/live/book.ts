import type { PublicKey } from "@solana/web3.js";
import type { Logger } from "pino";

import { decodeBookSide, type DecodeOptions } from "../book/codec.js";
import { SideMismatch, type MalformedUpdate } from "../book/errors.js";
import { bookOrders } from "../book/orders.js";
import type { BookSideKind, MarketScaling, Order, RawAccount } from "../book/types.js";
import type { LivenessRegistry } from "./liveness.js";
import type { AccountSource } from "./source.js";
import { deriveWatcher, watchAccount, type Watcher } from "./watcher.js";

export type OrderbookView = {
  bids: readonly Order[];
  asks: readonly Order[];
};

export type OrderbookWatchers = {
  bids: Watcher<readonly Order[]>;
  asks: Watcher<readonly Order[]>;
  book: Watcher<OrderbookView>;
  dispose(): Promise<void>;
};

type CommonParams = {
  source: AccountSource;
  market: MarketScaling;
  decodeOptions?: DecodeOptions;
  liveness?: LivenessRegistry;
  logger?: Logger;
  onError?: (err: MalformedUpdate) => void;
};

export function decodeBookOrders(
  account: RawAccount,
  kind: BookSideKind,
  market: MarketScaling,
  opts?: DecodeOptions
): readonly Order[] {
  const side = decodeBookSide(account, market, opts);
  if (side.kind !== kind) throw new SideMismatch(kind, side.kind);
  return Object.freeze([...bookOrders(side)]);
}

export function watchBookSide(
  params: CommonParams & { address: PublicKey; kind: BookSideKind }
): Promise<Watcher<readonly Order[]>> {
  const { address, kind, market, decodeOptions } = params;

  return watchAccount({
    source: params.source,
    address,
    name: `orderbook_${kind}_subscription`,
    decode: (account) => decodeBookOrders(account, kind, market, decodeOptions),
    liveness: params.liveness,
    logger: params.logger,
    onError: params.onError,
  });
}

/**
 * Watch both sides of one market. If the second side cannot be watched the
 * first one is released before the error propagates.
 */
export async function watchOrderbook(
  params: CommonParams & { bids: PublicKey; asks: PublicKey }
): Promise<OrderbookWatchers> {
  const bids = await watchBookSide({ ...params, address: params.bids, kind: "bids" });

  let asks: Watcher<readonly Order[]>;
  try {
    asks = await watchBookSide({ ...params, address: params.asks, kind: "asks" });
  } catch (e) {
    await bids.dispose();
    throw e;
  }

  const book = deriveWatcher<OrderbookView>("orderbook", () => ({
    bids: bids.latest(),
    asks: asks.latest(),
  }));

  return {
    bids,
    asks,
    book,
    async dispose() {
      await Promise.all([bids.dispose(), asks.dispose(), book.dispose()]);
    },
  };
}
