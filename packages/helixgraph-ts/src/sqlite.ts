export type SqlParam = number | string | Uint8Array | null;

export type SqlCall = {
  sql: string;
  params: SqlParam[];
};

const TABLE_NAME_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function assertTableName(table: string): string {
  if (!TABLE_NAME_RE.test(table)) throw new Error(`invalid table name: ${table}`);
  return table;
}

export function buildKvSchema(table: string): string {
  const t = assertTableName(table);
  return `
CREATE TABLE IF NOT EXISTS ${t} (
  namespace TEXT NOT NULL,
  key TEXT NOT NULL,
  value TEXT NOT NULL,
  created_at_ms INTEGER NOT NULL,
  PRIMARY KEY (namespace, key)
);
`;
}

export function buildKvPut(
  table: string,
  entry: { namespace: string; key: string; value: string; createdAtMs: number }
): SqlCall {
  return {
    sql: `INSERT OR REPLACE INTO ${assertTableName(table)} (namespace, key, value, created_at_ms) VALUES (?1, ?2, ?3, ?4)`,
    params: [entry.namespace, entry.key, entry.value, entry.createdAtMs],
  };
}

export function buildKvList(table: string, namespace: string): SqlCall {
  return {
    sql: `SELECT key, value FROM ${assertTableName(table)} WHERE namespace = ?1 ORDER BY created_at_ms ASC, key ASC`,
    params: [namespace],
  };
}

export function buildKvDelete(table: string, namespace: string, key: string): SqlCall {
  return {
    sql: `DELETE FROM ${assertTableName(table)} WHERE namespace = ?1 AND key = ?2`,
    params: [namespace, key],
  };
}

export function buildKvClear(table: string, namespace: string): SqlCall {
  return {
    sql: `DELETE FROM ${assertTableName(table)} WHERE namespace = ?1`,
    params: [namespace],
  };
}
