import type { PublicKey } from "@solana/web3.js";
import type { Logger } from "pino";

import { AccountNotFound, MalformedUpdate } from "../book/errors.js";
import type { RawAccount } from "../book/types.js";
import { createSnapshotCell } from "./cell.js";
import type { LivenessRegistry } from "./liveness.js";
import type { AccountSource, Unsubscribe } from "./source.js";

export type Watcher<T> = {
  readonly name: string;
  latest(): T;
  dispose(): Promise<void>;
  isDisposed(): boolean;
};

export type WatchAccountParams<T> = {
  source: AccountSource;
  address: PublicKey;
  name: string;
  decode: (account: RawAccount) => T;
  liveness?: LivenessRegistry;
  logger?: Logger;
  onError?: (err: MalformedUpdate) => void;
};

/**
 * Seed a snapshot from one fetch, then keep it current from the account's
 * change notifications.
 *
 * The initial fetch and decode must succeed or nothing is subscribed. Later
 * payloads that fail to decode are reported and dropped; the previous
 * snapshot stays readable. Payloads from a slot older than the snapshot's are
 * skipped.
 */
export async function watchAccount<T>(params: WatchAccountParams<T>): Promise<Watcher<T>> {
  const { source, address, name, decode, logger, onError } = params;
  const addressStr = address.toBase58();

  const initial = await source.fetch(address);
  if (!initial) throw new AccountNotFound(addressStr);

  const cell = createSnapshotCell(decode(initial));
  const feed = params.liveness?.register(name);
  let disposed = false;
  let lastSlot = initial.slot;

  const olderThanSnapshot = (slot: number | undefined, orEqual: boolean) =>
    slot !== undefined && lastSlot !== undefined && (orEqual ? slot <= lastSlot : slot < lastSlot);

  const apply = (account: RawAccount) => {
    let next: T;
    try {
      next = decode(account);
    } catch (e) {
      const err = new MalformedUpdate(addressStr, e);
      logger?.warn({ err, feed: name, address: addressStr, slot: account.slot }, "dropped malformed update");
      onError?.(err);
      return;
    }

    cell.write(next);
    if (account.slot !== undefined) lastSlot = account.slot;
  };

  const onAccount = (account: RawAccount) => {
    if (disposed) return;
    feed?.ping();

    if (olderThanSnapshot(account.slot, false)) {
      logger?.debug({ feed: name, address: addressStr, slot: account.slot, lastSlot }, "skipped stale update");
      return;
    }

    apply(account);
  };

  let unsubscribe: Unsubscribe;
  try {
    unsubscribe = await source.subscribe(address, onAccount);
  } catch (e) {
    disposed = true;
    feed?.dispose();
    throw e;
  }

  // A change landing between the first fetch and the subscription is never
  // notified, so read the account once more now that updates are flowing.
  try {
    const fresh = await source.fetch(address);
    if (fresh && !olderThanSnapshot(fresh.slot, true)) apply(fresh);
  } catch (e) {
    disposed = true;
    feed?.dispose();
    await unsubscribe();
    throw e;
  }

  logger?.debug({ feed: name, address: addressStr }, "watcher started");

  let disposing: Promise<void> | null = null;

  return {
    name,

    latest() {
      return cell.read();
    },

    dispose() {
      if (!disposing) {
        disposed = true;
        feed?.dispose();
        disposing = unsubscribe().then(() => {
          logger?.debug({ feed: name, address: addressStr }, "watcher disposed");
        });
      }
      return disposing;
    },

    isDisposed() {
      return disposed;
    },
  };
}

/**
 * A watcher whose value is computed from other watchers on every read.
 * Nothing is cached and there is nothing to release.
 */
export function deriveWatcher<T>(name: string, compute: () => T): Watcher<T> {
  let disposed = false;
  return {
    name,
    latest: compute,
    async dispose() {
      disposed = true;
    },
    isDisposed() {
      return disposed;
    },
  };
}
