import { PublicKey } from "@solana/web3.js";

import { AccountNotFound, DecodeSizeMismatch } from "./errors.js";
import {
  DATA_TYPE,
  DEFAULT_BOOK_NODES,
  FREE,
  HEADER,
  HEADER_LEN,
  INNER,
  LEAF,
  META_DATA_LEN,
  NODE_LEN,
  NODE_TAG,
  bookSideSize,
} from "./layout.js";
import type { BookMetaData, BookNode, BookSide, MarketScaling, RawAccount } from "./types.js";
import type { AccountSource } from "../live/source.js";

export type DecodeOptions = {
  /** Node-array capacity of the deployment. */
  capacity?: number;
};

function readU128LE(data: Buffer, off: number): bigint {
  const lo = data.readBigUInt64LE(off);
  const hi = data.readBigUInt64LE(off + 8);
  return (hi << 64n) | lo;
}

function decodeMetaData(data: Buffer): BookMetaData {
  return {
    dataType: data.readUInt8(HEADER.dataType),
    version: data.readUInt8(HEADER.version),
    isInitialized: data.readUInt8(HEADER.isInitialized) !== 0,
    extraInfo: Buffer.from(data.subarray(HEADER.extraInfo, META_DATA_LEN)),
  };
}

/**
 * Decode one 88-byte node. Tags outside the known set come back as `unknown`
 * and are only rejected if a traversal reaches them.
 */
export function decodeNode(data: Buffer, off: number): BookNode {
  const tag = data.readUInt32LE(off);

  switch (tag) {
    case NODE_TAG.Uninitialized:
      return { kind: "uninitialized" };

    case NODE_TAG.Inner:
      return {
        kind: "inner",
        prefixLen: data.readUInt32LE(off + INNER.prefixLen),
        key: readU128LE(data, off + INNER.key),
        children: [
          data.readUInt32LE(off + INNER.children),
          data.readUInt32LE(off + INNER.children + 4),
        ],
        childEarliestExpiry: [
          data.readBigUInt64LE(off + INNER.childEarliestExpiry),
          data.readBigUInt64LE(off + INNER.childEarliestExpiry + 8),
        ],
      };

    case NODE_TAG.Leaf:
      return {
        kind: "leaf",
        ownerSlot: data.readUInt8(off + LEAF.ownerSlot),
        orderType: data.readUInt8(off + LEAF.orderType),
        version: data.readUInt8(off + LEAF.version),
        timeInForce: data.readUInt8(off + LEAF.timeInForce),
        key: readU128LE(data, off + LEAF.key),
        owner: new PublicKey(data.subarray(off + LEAF.owner, off + LEAF.owner + 32)),
        quantity: data.readBigInt64LE(off + LEAF.quantity),
        clientOrderId: data.readBigUInt64LE(off + LEAF.clientOrderId),
        bestInitial: data.readBigInt64LE(off + LEAF.bestInitial),
        timestamp: data.readBigUInt64LE(off + LEAF.timestamp),
      };

    case NODE_TAG.Free:
    case NODE_TAG.LastFree:
      return {
        kind: "free",
        next: data.readUInt32LE(off + FREE.next),
        last: tag === NODE_TAG.LastFree,
      };

    default:
      return { kind: "unknown", tag };
  }
}

/**
 * Decode a book side account. The buffer must be exactly the size implied by
 * the node capacity; nothing else about the bytes is checked here.
 */
export function decodeBookSide(
  account: RawAccount,
  market: MarketScaling,
  opts: DecodeOptions = {}
): BookSide {
  const capacity = opts.capacity ?? DEFAULT_BOOK_NODES;
  const expected = bookSideSize(capacity);
  const data = account.data;

  if (data.length !== expected) {
    throw new DecodeSizeMismatch(data.length, expected);
  }

  const metaData = decodeMetaData(data);

  const nodes: BookNode[] = new Array(capacity);
  for (let i = 0; i < capacity; i++) {
    nodes[i] = decodeNode(data, HEADER_LEN + i * NODE_LEN);
  }

  return {
    account,
    kind: metaData.dataType === DATA_TYPE.Bids ? "bids" : "asks",
    metaData,
    market,
    bumpIndex: data.readBigUInt64LE(HEADER.bumpIndex),
    freeListLen: data.readBigUInt64LE(HEADER.freeListLen),
    freeListHead: data.readUInt32LE(HEADER.freeListHead),
    rootNode: data.readUInt32LE(HEADER.rootNode),
    leafCount: data.readBigUInt64LE(HEADER.leafCount),
    nodes,
  };
}

/**
 * Fetch and decode in one step.
 */
export async function loadBookSide(
  source: AccountSource,
  address: RawAccount["address"],
  market: MarketScaling,
  opts: DecodeOptions = {}
): Promise<BookSide> {
  const account = await source.fetch(address);
  if (!account) throw new AccountNotFound(address.toBase58());
  return decodeBookSide(account, market, opts);
}
