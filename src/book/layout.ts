/**
 * Book side account layout (little endian):
 *
 *   metaData(8) + bumpIndex(8) + freeListLen(8) + freeListHead(4) + rootNode(4) + leafCount(8)
 *   + nodes[capacity] (88 bytes each)
 *
 * metaData = dataType(1) + version(1) + isInitialized(1) + extraInfo(5)
 */

export const META_DATA_LEN = 8;
export const HEADER_LEN = 40;
export const NODE_LEN = 88;
export const DEFAULT_BOOK_NODES = 1024;

export const HEADER = {
  dataType: 0,
  version: 1,
  isInitialized: 2,
  extraInfo: 3,
  bumpIndex: 8,
  freeListLen: 16,
  freeListHead: 24,
  rootNode: 28,
  leafCount: 32,
} as const;

// Offsets within a node, relative to the start of the node.
export const INNER = {
  prefixLen: 4,
  key: 8,
  children: 24,
  childEarliestExpiry: 32,
} as const;

export const LEAF = {
  ownerSlot: 4,
  orderType: 5,
  version: 6,
  timeInForce: 7,
  key: 8,
  owner: 24,
  quantity: 56,
  clientOrderId: 64,
  bestInitial: 72,
  timestamp: 80,
} as const;

export const FREE = {
  next: 4,
} as const;

export const NODE_TAG = {
  Uninitialized: 0,
  Inner: 1,
  Leaf: 2,
  Free: 3,
  LastFree: 4,
} as const;

export const DATA_TYPE = {
  Bids: 5,
  Asks: 6,
} as const;

export const ORDER_TYPE_CODES = ["limit", "ioc", "post_only", "market", "post_only_slide"] as const;

export const U64_MASK = (1n << 64n) - 1n;

export function bookSideSize(capacity: number = DEFAULT_BOOK_NODES): number {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new Error(`book_capacity_invalid: ${capacity}`);
  }
  return HEADER_LEN + capacity * NODE_LEN;
}
