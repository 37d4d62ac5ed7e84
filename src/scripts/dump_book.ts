/**
 * Print one book side as decoded right now.
 * Usage: npx tsx src/scripts/dump_book.ts <bids|asks> [depth]
 */

import { z } from "zod";

import { env, marketScaling } from "../config.js";
import { connection, pk } from "../solana.js";
import { loadBookSide } from "../book/codec.js";
import { isBookError } from "../book/errors.js";
import { describeBookSide } from "../book/orders.js";
import { assertMarketScaling } from "../book/scaling.js";
import { createConnectionSource } from "../live/source.js";

const ArgsZ = z.tuple([
  z.enum(["bids", "asks"]),
  z.coerce.number().int().min(1).max(1000).default(20),
]);

async function main() {
  const parsed = ArgsZ.safeParse([process.argv[2], process.argv[3]]);
  if (!parsed.success) {
    console.error("Usage: npx tsx src/scripts/dump_book.ts <bids|asks> [depth]");
    process.exit(1);
  }

  const [kind, depth] = parsed.data;
  const address = pk(kind === "bids" ? env.BIDS : env.ASKS);
  const source = createConnectionSource(connection, env.COMMITMENT);

  const side = await loadBookSide(source, address, assertMarketScaling(marketScaling), {
    capacity: env.BOOK_NODES,
  });

  if (side.kind !== kind) {
    console.warn(`account ${address.toBase58()} holds ${side.kind}, not ${kind}`);
  }

  console.log(describeBookSide(side, depth));
}

main().catch((e) => {
  console.error(isBookError(e) ? `${e.code}: ${e.message}` : e);
  process.exit(1);
});
