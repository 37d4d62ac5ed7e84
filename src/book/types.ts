import type { PublicKey } from "@solana/web3.js";
import type { Decimal } from "decimal.js";

import type { ORDER_TYPE_CODES } from "./layout.js";

/**
 * Anything addressable that carries raw account bytes.
 */
export type RawAccount = {
  address: PublicKey;
  data: Buffer;
  owner?: PublicKey;
  slot?: number;
};

export type BookSideKind = "bids" | "asks";

export type OrderSide = "buy" | "sell";

export type OrderType = (typeof ORDER_TYPE_CODES)[number] | "unknown";

/**
 * Supplied by the market description, never decoded from the book side.
 * Lot sizes are native integers, so they travel as bigint.
 */
export type MarketScaling = {
  baseDecimals: number;
  quoteDecimals: number;
  baseLotSize: bigint;
  quoteLotSize: bigint;
};

export type BookMetaData = {
  dataType: number;
  version: number;
  isInitialized: boolean;
  extraInfo: Buffer;
};

export type UninitializedNode = { kind: "uninitialized" };

export type InnerNode = {
  kind: "inner";
  prefixLen: number;
  key: bigint;
  children: readonly [number, number];
  childEarliestExpiry: readonly [bigint, bigint];
};

export type LeafNode = {
  kind: "leaf";
  ownerSlot: number;
  orderType: number;
  version: number;
  timeInForce: number;
  // u128: price in the high 64 bits, sequence number in the low 64 bits
  key: bigint;
  owner: PublicKey;
  quantity: bigint;
  clientOrderId: bigint;
  bestInitial: bigint;
  timestamp: bigint;
};

export type FreeNode = {
  kind: "free";
  next: number;
  last: boolean;
};

export type UnknownNode = { kind: "unknown"; tag: number };

export type BookNode = UninitializedNode | InnerNode | LeafNode | FreeNode | UnknownNode;

export type BookSide = {
  account: RawAccount;
  kind: BookSideKind;
  metaData: BookMetaData;
  market: MarketScaling;
  bumpIndex: bigint;
  freeListLen: bigint;
  freeListHead: number;
  rootNode: number;
  leafCount: bigint;
  nodes: readonly BookNode[];
};

export type Order = {
  readonly id: bigint;
  readonly clientOrderId: bigint;
  readonly owner: string;
  readonly side: OrderSide;
  readonly price: Decimal;
  readonly quantity: Decimal;
  readonly orderType: OrderType;
  readonly sequence: bigint;
  readonly timestamp: bigint;
};
