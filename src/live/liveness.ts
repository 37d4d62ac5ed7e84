export type LivenessFeed = {
  readonly id: number;
  readonly name: string;
  ping(): void;
  dispose(): void;
};

export type FeedStatus = {
  id: number;
  name: string;
  registeredAt: number;
  lastActiveAt: number | null;
  silentMs: number;
  active: boolean;
};

export type LivenessReport = {
  ok: boolean;
  allSilent: boolean;
  silenceMs: number;
  feeds: FeedStatus[];
};

export type LivenessRegistry = {
  register(name: string): LivenessFeed;
  report(): LivenessReport;
  size(): number;
};

type FeedEntry = {
  id: number;
  name: string;
  registeredAt: number;
  lastActiveAt: number | null;
};

/**
 * Passive record of "a notification arrived" per registered feed. It never
 * touches the feeds themselves. Owned by whoever wires the watchers together.
 */
export function createLivenessRegistry(params: {
  silenceMs: number;
  now?: () => number;
}): LivenessRegistry {
  const { silenceMs } = params;
  const now = params.now ?? Date.now;
  const feeds = new Map<number, FeedEntry>();
  let nextId = 1;

  function status(entry: FeedEntry, t: number): FeedStatus {
    const silentMs = Math.max(0, t - (entry.lastActiveAt ?? entry.registeredAt));
    return {
      id: entry.id,
      name: entry.name,
      registeredAt: entry.registeredAt,
      lastActiveAt: entry.lastActiveAt,
      silentMs,
      active: silentMs <= silenceMs,
    };
  }

  return {
    register(name) {
      const entry: FeedEntry = { id: nextId++, name, registeredAt: now(), lastActiveAt: null };
      feeds.set(entry.id, entry);

      return {
        id: entry.id,
        name,
        ping() {
          if (feeds.has(entry.id)) entry.lastActiveAt = now();
        },
        dispose() {
          feeds.delete(entry.id);
        },
      };
    },

    report() {
      const t = now();
      const list = [...feeds.values()].map((e) => status(e, t));
      return {
        ok: list.every((f) => f.active),
        allSilent: list.length > 0 && list.every((f) => !f.active),
        silenceMs,
        feeds: list,
      };
    },

    size() {
      return feeds.size;
    },
  };
}
