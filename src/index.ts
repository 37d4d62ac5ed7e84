import { env, corsOrigins, marketScaling } from "./config.js";
import { connection, pk } from "./solana.js";
import { createLogger } from "./logger.js";
import { assertMarketScaling } from "./book/scaling.js";
import { createConnectionSource } from "./live/source.js";
import { createLivenessRegistry } from "./live/liveness.js";
import { watchOrderbook } from "./live/book.js";
import { buildServer } from "./server.js";

const logger = createLogger(env.LOG_LEVEL);

const liveness = createLivenessRegistry({ silenceMs: env.LIVENESS_SILENCE_SEC * 1000 });
const source = createConnectionSource(connection, env.COMMITMENT);

/**
 * Initial load is fatal: if either side cannot be fetched and decoded the
 * process exits instead of serving an empty book.
 */
const orderbook = await watchOrderbook({
  source,
  bids: pk(env.BIDS),
  asks: pk(env.ASKS),
  market: assertMarketScaling(marketScaling),
  decodeOptions: { capacity: env.BOOK_NODES },
  liveness,
  logger,
});

const app = await buildServer({
  liveness,
  orderbook: orderbook.book,
  logger,
  corsOrigins,
});

/**
 * Periodic top-of-book line
 */
function logTopOfBook() {
  const { bids, asks } = orderbook.book.latest();
  const depth = env.BOOK_LOG_DEPTH;
  logger.info(
    {
      bids: bids.length,
      asks: asks.length,
      bestBid: bids[0]?.price.toString() ?? null,
      bestAsk: asks[0]?.price.toString() ?? null,
      topBids: bids.slice(0, depth).map((o) => `${o.quantity.toString()}@${o.price.toString()}`),
      topAsks: asks.slice(0, depth).map((o) => `${o.quantity.toString()}@${o.price.toString()}`),
      healthy: liveness.report().ok,
    },
    "orderbook"
  );
}

logTopOfBook();
const bookInterval =
  env.BOOK_LOG_EVERY_SEC > 0 ? setInterval(logTopOfBook, env.BOOK_LOG_EVERY_SEC * 1000) : null;

/**
 * Graceful shutdown
 */
const shutdown = async (signal: string) => {
  logger.info({ signal }, "shutting down");
  if (bookInterval) clearInterval(bookInterval);

  try {
    await orderbook.dispose();
  } catch (err) {
    logger.warn({ err }, "orderbook dispose failed");
  }

  try {
    await app.close();
  } finally {
    process.exit(0);
  }
};

process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));

await app.listen({
  port: env.PORT,
  host: "0.0.0.0",
});

logger.info(
  {
    port: env.PORT,
    bids: env.BIDS,
    asks: env.ASKS,
    capacity: env.BOOK_NODES,
    silenceSec: env.LIVENESS_SILENCE_SEC,
  },
  "book watcher started"
);
