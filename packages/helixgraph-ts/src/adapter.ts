/**
 * Durable key-value storage used by the offline queue. Implementations only need these four
 * operations; entries are written once and deleted, never updated in place.
 */
export interface KeyValueStore {
  put(key: string, value: string): Promise<void> | void;
  /** All entries, in no particular order. */
  getAll(): Promise<Array<[key: string, value: string]>> | Array<[key: string, value: string]>;
  delete(key: string): Promise<void> | void;
  clear(): Promise<void> | void;
  close?(): Promise<void> | void;
}

export function createMemoryKeyValueStore(initial: Iterable<[string, string]> = []): KeyValueStore & {
  size: () => number;
} {
  const entries = new Map<string, string>(initial);
  return {
    put: (key, value) => {
      entries.set(key, value);
    },
    getAll: () => Array.from(entries.entries()),
    delete: (key) => {
      entries.delete(key);
    },
    clear: () => {
      entries.clear();
    },
    size: () => entries.size,
  };
}
