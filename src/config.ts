import "dotenv/config";
import { z } from "zod";

import type { MarketScaling } from "./book/types.js";

export const env = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(8080),
    LOG_LEVEL: z.string().default("info"),

    CORS_ORIGINS: z.string().optional(),

    SOLANA_RPC_URL: z.string().url(),
    SOLANA_WS_URL: z.string().url().optional(),
    COMMITMENT: z.enum(["processed", "confirmed", "finalized"]).default("processed"),

    // book side accounts of the watched market
    BIDS: z.string().min(32),
    ASKS: z.string().min(32),

    // market description (not stored in the book side accounts)
    BASE_DECIMALS: z.coerce.number().int().min(0).max(255),
    QUOTE_DECIMALS: z.coerce.number().int().min(0).max(255),
    BASE_LOT_SIZE: z.coerce.bigint().positive(),
    QUOTE_LOT_SIZE: z.coerce.bigint().positive(),

    BOOK_NODES: z.coerce.number().int().min(1).max(65_536).default(1024),

    LIVENESS_SILENCE_SEC: z.coerce.number().int().min(1).max(86_400).default(60),

    // periodic top-of-book log line
    BOOK_LOG_DEPTH: z.coerce.number().int().min(0).max(100).default(5),
    BOOK_LOG_EVERY_SEC: z.coerce.number().int().min(0).max(3600).default(15),
  })
  .parse(process.env);

const csv = (s: string) =>
  s
    .split(",")
    .map((x) => x.trim())
    .filter(Boolean);

export const corsOrigins = env.CORS_ORIGINS ? csv(env.CORS_ORIGINS) : [];

export const marketScaling: MarketScaling = {
  baseDecimals: env.BASE_DECIMALS,
  quoteDecimals: env.QUOTE_DECIMALS,
  baseLotSize: env.BASE_LOT_SIZE,
  quoteLotSize: env.QUOTE_LOT_SIZE,
};
