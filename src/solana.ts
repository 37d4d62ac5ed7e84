import { Connection, PublicKey } from "@solana/web3.js";
import { env } from "./config.js";

export const connection = new Connection(env.SOLANA_RPC_URL, {
  commitment: env.COMMITMENT,
  wsEndpoint: env.SOLANA_WS_URL,
});

export const pk = (v: string) => new PublicKey(v);
