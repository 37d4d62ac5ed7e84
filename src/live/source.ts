import type { Commitment, Connection, PublicKey } from "@solana/web3.js";

import type { RawAccount } from "../book/types.js";

export type Unsubscribe = () => Promise<void>;

/**
 * Transport the watchers sit on: a one-shot fetch plus a push subscription
 * delivering the full account bytes on every change.
 */
export type AccountSource = {
  fetch(address: PublicKey): Promise<RawAccount | null>;
  subscribe(address: PublicKey, onAccount: (account: RawAccount) => void): Promise<Unsubscribe>;
};

/** The part of a web3.js `Connection` the source calls. */
export type AccountConnection = Pick<
  Connection,
  "getAccountInfoAndContext" | "onAccountChange" | "removeAccountChangeListener"
>;

export function createConnectionSource(
  connection: AccountConnection,
  commitment: Commitment = "processed"
): AccountSource {
  return {
    async fetch(address) {
      const { context, value } = await connection.getAccountInfoAndContext(address, commitment);
      if (!value?.data) return null;
      return { address, data: Buffer.from(value.data), owner: value.owner, slot: context.slot };
    },

    async subscribe(address, onAccount) {
      const subId = connection.onAccountChange(
        address,
        (info, ctx) => {
          onAccount({ address, data: Buffer.from(info.data), owner: info.owner, slot: ctx.slot });
        },
        { commitment }
      );

      return async () => {
        await connection.removeAccountChangeListener(subId);
      };
    },
  };
}
