import type { FastifyInstance } from "fastify";
import { z } from "zod";

import type { Order } from "../book/types.js";

export type OrderJson = {
  id: string;
  clientOrderId: string;
  owner: string;
  side: Order["side"];
  price: string;
  quantity: string;
  orderType: Order["orderType"];
  sequence: string;
  timestamp: string;
};

export function orderToJson(o: Order): OrderJson {
  return {
    id: o.id.toString(),
    clientOrderId: o.clientOrderId.toString(),
    owner: o.owner,
    side: o.side,
    price: o.price.toString(),
    quantity: o.quantity.toString(),
    orderType: o.orderType,
    sequence: o.sequence.toString(),
    timestamp: o.timestamp.toString(),
  };
}

export async function v1Routes(app: FastifyInstance) {
  // GET /api/v1/health -> liveness of every watched feed (503 when any is silent)
  app.get("/health", async (_req, reply) => {
    const report = app.liveness.report();
    reply.header("cache-control", "no-store");
    reply.code(report.ok ? 200 : 503);
    return report;
  });

  // GET /api/v1/book?depth=20 -> latest bids (descending) and asks (ascending)
  app.get("/book", async (req, reply) => {
    const parsed = z
      .object({
        depth: z.coerce.number().int().min(1).max(1000).default(50),
      })
      .safeParse(req.query ?? {});

    if (!parsed.success) {
      reply.code(400);
      return { error: "invalid_query", issues: parsed.error.issues.map((i) => i.message) };
    }

    const { depth } = parsed.data;
    const { bids, asks } = app.orderbook.latest();

    reply.header("cache-control", "no-store");
    return {
      bids: bids.slice(0, depth).map(orderToJson),
      asks: asks.slice(0, depth).map(orderToJson),
      bidCount: bids.length,
      askCount: asks.length,
    };
  });
}
