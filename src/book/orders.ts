import { CorruptTree } from "./errors.js";
import { ORDER_TYPE_CODES, U64_MASK } from "./layout.js";
import { nativePriceToUi, nativeQuantityToUi } from "./scaling.js";
import type { BookSide, LeafNode, Order, OrderSide, OrderType } from "./types.js";

export function sideOf(book: Pick<BookSide, "kind">): OrderSide {
  return book.kind === "bids" ? "buy" : "sell";
}

export function leafPrice(leaf: Pick<LeafNode, "key">): bigint {
  return leaf.key >> 64n;
}

export function leafSequence(leaf: Pick<LeafNode, "key">): bigint {
  return leaf.key & U64_MASK;
}

function orderTypeOf(code: number): OrderType {
  return ORDER_TYPE_CODES[code] ?? "unknown";
}

function leafToOrder(leaf: LeafNode, book: BookSide, side: OrderSide): Order {
  return Object.freeze({
    id: leaf.key,
    clientOrderId: leaf.clientOrderId,
    owner: leaf.owner.toBase58(),
    side,
    price: nativePriceToUi(leafPrice(leaf), book.market),
    quantity: nativeQuantityToUi(leaf.quantity, book.market),
    orderType: orderTypeOf(leaf.orderType),
    sequence: leafSequence(leaf),
    timestamp: leaf.timestamp,
  });
}

/**
 * Depth-first walk from the root with an explicit stack.
 *
 * child[0] always holds the lesser keys, so pushing [c0, c1] pops the greater
 * subtree first (bids, descending) and pushing [c1, c0] pops the lesser one
 * first (asks, ascending). No sort happens anywhere.
 */
function* walk(book: BookSide): Generator<Order, void, undefined> {
  if (book.leafCount === 0n) return;

  const side = sideOf(book);
  const visited = new Set<number>();
  const stack: number[] = [book.rootNode];
  let leaves = 0n;

  while (stack.length > 0) {
    const index = stack.pop();
    if (index === undefined) break;

    if (index >= book.nodes.length || BigInt(index) >= book.bumpIndex) {
      throw new CorruptTree("index out of range", index);
    }
    if (visited.has(index)) {
      throw new CorruptTree("node reached twice", index);
    }
    visited.add(index);

    const node = book.nodes[index];
    switch (node.kind) {
      case "leaf":
        leaves++;
        yield leafToOrder(node, book, side);
        break;

      case "inner":
        if (side === "buy") {
          stack.push(node.children[0], node.children[1]);
        } else {
          stack.push(node.children[1], node.children[0]);
        }
        break;

      case "free":
      case "uninitialized":
        throw new CorruptTree(`${node.kind} node reachable from root`, index);

      case "unknown":
        throw new CorruptTree(`unknown node tag ${node.tag}`, index);
    }
  }

  if (leaves !== book.leafCount) {
    throw new CorruptTree(`reached ${leaves} leaves but header says ${book.leafCount}`);
  }
}

/**
 * Orders of one side in display order: bids by descending price, asks by
 * ascending price. Every iteration starts a fresh walk over the same tree.
 */
export function bookOrders(book: BookSide): Iterable<Order> {
  return {
    [Symbol.iterator]: () => walk(book),
  };
}

export function bestOrder(book: BookSide): Order | null {
  for (const order of bookOrders(book)) return order;
  return null;
}

export function describeBookSide(book: BookSide, depth = 10): string {
  const lines = [
    `BookSide ${book.kind} [${book.account.address.toBase58()}]`,
    `  Version: ${book.metaData.version} Initialized: ${book.metaData.isInitialized}`,
    `  Bump Index: ${book.bumpIndex}`,
    `  Free List: ${book.freeListHead} (head) ${book.freeListLen} (length)`,
    `  Root Node: ${book.rootNode}`,
    `  Leaf Count: ${book.leafCount}`,
  ];

  let shown = 0;
  for (const o of bookOrders(book)) {
    if (shown >= depth) {
      lines.push("  ...");
      break;
    }
    lines.push(`  ${o.side} ${o.quantity.toString()} @ ${o.price.toString()} id=${o.id} client=${o.clientOrderId} owner=${o.owner}`);
    shown++;
  }

  return lines.join("\n");
}
