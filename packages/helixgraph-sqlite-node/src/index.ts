import Database from "better-sqlite3";

import { buildKvClear, buildKvDelete, buildKvList, buildKvPut, buildKvSchema } from "@helixgraph/interface/sqlite";
import type { SqlCall, SqlParam } from "@helixgraph/interface/sqlite";
import { isRecord } from "@helixgraph/interface";
import type { KeyValueStore } from "@helixgraph/interface";

export type SqliteKeyValueStoreOptions = {
  /** Entries of different queues can share one table under different namespaces. */
  namespace: string;
  table?: string;
  nowMs?: () => number;
};

function toBindings(params: SqlParam[]): Record<number, SqlParam> {
  return params.reduce<Record<number, SqlParam>>((acc, val, idx) => {
    acc[idx + 1] = val;
    return acc;
  }, {});
}

function run(db: Database.Database, call: SqlCall): void {
  db.prepare(call.sql).run(toBindings(call.params));
}

/**
 * Key-value store for the offline queue, backed by a better-sqlite3 database the caller owns.
 */
export function createSqliteKeyValueStore(db: Database.Database, opts: SqliteKeyValueStoreOptions): KeyValueStore {
  const table = opts.table ?? "helixgraph_kv";
  const nowMs = opts.nowMs ?? (() => Date.now());
  if (opts.namespace.length === 0) throw new Error("namespace must not be empty");
  db.exec(buildKvSchema(table));

  return {
    put: (key, value) => run(db, buildKvPut(table, { namespace: opts.namespace, key, value, createdAtMs: nowMs() })),
    getAll: () => {
      const { sql, params } = buildKvList(table, opts.namespace);
      const rows = db.prepare(sql).all(toBindings(params));
      const out: Array<[string, string]> = [];
      for (const row of rows) {
        if (!isRecord(row) || typeof row["key"] !== "string" || typeof row["value"] !== "string") {
          throw new Error(`unexpected row in ${table}`);
        }
        out.push([row["key"], row["value"]]);
      }
      return out;
    },
    delete: (key) => run(db, buildKvDelete(table, opts.namespace, key)),
    clear: () => run(db, buildKvClear(table, opts.namespace)),
  };
}

/**
 * Opens (or creates) a database file and returns a store that closes it on `close()`.
 */
export function openSqliteKeyValueStore(
  path: string,
  opts: SqliteKeyValueStoreOptions
): KeyValueStore & { db: Database.Database } {
  const db = new Database(path);
  db.pragma("journal_mode = WAL");
  const store = createSqliteKeyValueStore(db, opts);
  return {
    ...store,
    db,
    close: () => {
      db.close();
    },
  };
}
