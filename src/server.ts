import Fastify, { type FastifyBaseLogger } from "fastify";
import helmet from "@fastify/helmet";
import cors from "@fastify/cors";

import { reqId } from "./utils/http.js";
import { v1Routes } from "./routes/v1.js";
import type { LivenessRegistry } from "./live/liveness.js";
import type { OrderbookView } from "./live/book.js";
import type { Watcher } from "./live/watcher.js";

export async function buildServer(params: {
  liveness: LivenessRegistry;
  orderbook: Watcher<OrderbookView>;
  logger?: FastifyBaseLogger;
  corsOrigins?: string[];
}) {
  const logger: FastifyBaseLogger | false = params.logger ?? false;

  const app = Fastify({
    logger,
    genReqId: () => reqId(),
    trustProxy: true,
  });

  /**
   * Security headers (Helmet)
   */
  await app.register(helmet, { global: true });

  /**
   * CORS
   * - allowlist when provided, otherwise any origin (read-only endpoints)
   */
  const origins = params.corsOrigins ?? [];
  await app.register(cors, {
    origin: origins.length ? origins : true,
    methods: ["GET"],
  });

  app.decorate("liveness", params.liveness);
  app.decorate("orderbook", params.orderbook);

  await app.register(v1Routes, { prefix: "/api/v1" });

  return app;
}
