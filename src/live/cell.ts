/**
 * Single-slot holder of the latest decoded value.
 *
 * Writes swap the reference in one assignment, so a reader on the event loop
 * sees either the old value or the new one, never a mix. Nothing older than
 * the current value is kept.
 */
export type SnapshotCell<T> = {
  read(): T;
  write(value: T): void;
  /** Number of writes since construction (0 for the seed value). */
  version(): number;
  updatedAt(): number;
};

export function createSnapshotCell<T>(initial: T, now: () => number = Date.now): SnapshotCell<T> {
  let current = initial;
  let writes = 0;
  let at = now();

  return {
    read() {
      return current;
    },

    write(value) {
      current = value;
      writes++;
      at = now();
    },

    version() {
      return writes;
    },

    updatedAt() {
      return at;
    },
  };
}
