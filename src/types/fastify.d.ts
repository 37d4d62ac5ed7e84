import "fastify";

import type { LivenessRegistry } from "../live/liveness.js";
import type { OrderbookView } from "../live/book.js";
import type { Watcher } from "../live/watcher.js";

declare module "fastify" {
  interface FastifyInstance {
    liveness: LivenessRegistry;
    orderbook: Watcher<OrderbookView>;
  }
}
