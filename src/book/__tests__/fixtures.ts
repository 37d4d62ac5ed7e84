import { PublicKey } from "@solana/web3.js";

import {
  DATA_TYPE,
  FREE,
  HEADER,
  HEADER_LEN,
  INNER,
  LEAF,
  NODE_LEN,
  NODE_TAG,
  bookSideSize,
} from "../layout.js";
import type { BookSideKind, MarketScaling, RawAccount } from "../types.js";

export const UNIT_MARKET: MarketScaling = {
  baseDecimals: 0,
  quoteDecimals: 0,
  baseLotSize: 1n,
  quoteLotSize: 1n,
};

export function testKey(n: number): PublicKey {
  return new PublicKey(Buffer.alloc(32, n));
}

export type LeafSpec = {
  price: bigint;
  sequence?: bigint;
  quantity?: bigint;
  owner?: PublicKey;
  clientOrderId?: bigint;
  orderType?: number;
  timestamp?: bigint;
};

export type NodeSpec =
  | { tag: "uninitialized" }
  | { tag: "inner"; children: [number, number]; key?: bigint }
  | ({ tag: "leaf" } & LeafSpec)
  | { tag: "free"; next: number; last?: boolean }
  | { tag: "raw"; value: number };

export type RawSlabSpec = {
  kind: BookSideKind;
  capacity: number;
  rootNode: number;
  leafCount: number;
  bumpIndex: number;
  freeListLen?: number;
  freeListHead?: number;
  nodes: NodeSpec[];
};

function writeU128LE(buf: Buffer, v: bigint, off: number) {
  buf.writeBigUInt64LE(v & ((1n << 64n) - 1n), off);
  buf.writeBigUInt64LE(v >> 64n, off + 8);
}

export function leafKey(leaf: LeafSpec): bigint {
  return (leaf.price << 64n) | (leaf.sequence ?? 0n);
}

/**
 * Write a slab exactly as described, no consistency checks. Node i of
 * `nodes` lands in slot i; slots past the end stay zeroed (uninitialized).
 */
export function encodeRawSlab(spec: RawSlabSpec): Buffer {
  const buf = Buffer.alloc(bookSideSize(spec.capacity));

  buf.writeUInt8(spec.kind === "bids" ? DATA_TYPE.Bids : DATA_TYPE.Asks, HEADER.dataType);
  buf.writeUInt8(1, HEADER.version);
  buf.writeUInt8(1, HEADER.isInitialized);
  buf.writeBigUInt64LE(BigInt(spec.bumpIndex), HEADER.bumpIndex);
  buf.writeBigUInt64LE(BigInt(spec.freeListLen ?? 0), HEADER.freeListLen);
  buf.writeUInt32LE(spec.freeListHead ?? 0, HEADER.freeListHead);
  buf.writeUInt32LE(spec.rootNode, HEADER.rootNode);
  buf.writeBigUInt64LE(BigInt(spec.leafCount), HEADER.leafCount);

  spec.nodes.forEach((node, i) => {
    const off = HEADER_LEN + i * NODE_LEN;
    switch (node.tag) {
      case "uninitialized":
        buf.writeUInt32LE(NODE_TAG.Uninitialized, off);
        break;
      case "inner":
        buf.writeUInt32LE(NODE_TAG.Inner, off);
        writeU128LE(buf, node.key ?? 0n, off + INNER.key);
        buf.writeUInt32LE(node.children[0], off + INNER.children);
        buf.writeUInt32LE(node.children[1], off + INNER.children + 4);
        break;
      case "leaf":
        buf.writeUInt32LE(NODE_TAG.Leaf, off);
        buf.writeUInt8(node.orderType ?? 0, off + LEAF.orderType);
        buf.writeUInt8(1, off + LEAF.version);
        writeU128LE(buf, leafKey(node), off + LEAF.key);
        (node.owner ?? testKey(7)).toBuffer().copy(buf, off + LEAF.owner);
        buf.writeBigInt64LE(node.quantity ?? 1n, off + LEAF.quantity);
        buf.writeBigUInt64LE(node.clientOrderId ?? 0n, off + LEAF.clientOrderId);
        buf.writeBigUInt64LE(node.timestamp ?? 0n, off + LEAF.timestamp);
        break;
      case "free":
        buf.writeUInt32LE(node.last ? NODE_TAG.LastFree : NODE_TAG.Free, off);
        buf.writeUInt32LE(node.next, off + FREE.next);
        break;
      case "raw":
        buf.writeUInt32LE(node.value, off);
        break;
    }
  });

  return buf;
}

type Built =
  | { tag: "leaf"; leaf: LeafSpec }
  | { tag: "inner"; key: bigint; left: Built; right: Built };

function build(sorted: LeafSpec[], lo: number, hi: number): Built {
  if (hi - lo === 1) return { tag: "leaf", leaf: sorted[lo] };
  const mid = (lo + hi) >> 1;
  return {
    tag: "inner",
    key: leafKey(sorted[mid]),
    left: build(sorted, lo, mid),
    right: build(sorted, mid, hi),
  };
}

/**
 * Encode a well-formed side holding `leaves`. child[0] always carries the
 * lesser keys. Nodes are laid out post-order (root in the last used slot),
 * followed by `freeSlots` free-list entries.
 */
export function encodeBookSide(spec: {
  kind: BookSideKind;
  capacity: number;
  leaves: LeafSpec[];
  freeSlots?: number;
}): Buffer {
  const sorted = [...spec.leaves].sort((a, b) => {
    const ka = leafKey(a);
    const kb = leafKey(b);
    return ka < kb ? -1 : ka > kb ? 1 : 0;
  });

  const nodes: NodeSpec[] = [];

  const place = (n: Built): number => {
    if (n.tag === "leaf") {
      nodes.push({ tag: "leaf", ...n.leaf });
      return nodes.length - 1;
    }
    const left = place(n.left);
    const right = place(n.right);
    nodes.push({ tag: "inner", key: n.key, children: [left, right] });
    return nodes.length - 1;
  };

  const rootNode = sorted.length > 0 ? place(build(sorted, 0, sorted.length)) : 0;
  const used = nodes.length;

  const freeSlots = spec.freeSlots ?? 0;
  for (let i = 0; i < freeSlots; i++) {
    const last = i === freeSlots - 1;
    nodes.push({ tag: "free", next: last ? 0 : used + i + 1, last });
  }

  if (nodes.length > spec.capacity) {
    throw new Error(`fixture needs ${nodes.length} nodes, capacity is ${spec.capacity}`);
  }

  return encodeRawSlab({
    kind: spec.kind,
    capacity: spec.capacity,
    rootNode,
    leafCount: sorted.length,
    bumpIndex: nodes.length,
    freeListLen: freeSlots,
    freeListHead: freeSlots > 0 ? used : 0,
    nodes,
  });
}

export function rawAccount(data: Buffer, address: PublicKey = testKey(1)): RawAccount {
  return { address, data };
}
