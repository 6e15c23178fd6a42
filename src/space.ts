import type { DatabaseRunner } from "./runners.js";
import type { Persistence, RelationKind, Row, SpaceEntry } from "./types.js";
import { toNumber } from "./utils.js";

const RELATION_KINDS: Record<string, RelationKind> = {
  r: "table",
  v: "view",
  m: "materialized view",
};

const PERSISTENCE: Record<string, Persistence> = {
  p: "permanent",
  u: "unlogged",
  t: "temporary",
};

// dataBytes is the main fork only; totalBytes adds indexes, TOAST and free space maps.
const SPACE_QUERY = `SELECT
  c.relname AS name,
  c.relkind::text AS relkind,
  c.relpersistence::text AS relpersistence,
  pg_relation_size(c.oid)::float8 AS data_bytes,
  pg_total_relation_size(c.oid)::float8 AS total_bytes,
  mv.ispopulated AS populated
FROM pg_class c
JOIN pg_namespace n ON n.oid = c.relnamespace
LEFT JOIN pg_matviews mv ON mv.schemaname = n.nspname AND mv.matviewname = c.relname
WHERE n.nspname = 'public' AND c.relkind IN ('r', 'v', 'm')
ORDER BY c.relname`;

function toEntry(row: Row): SpaceEntry {
  const relkind = String(row.relkind);
  const kind = RELATION_KINDS[relkind];
  if (!kind) throw new Error(`Unexpected relkind "${relkind}"`);
  const persistence = PERSISTENCE[String(row.relpersistence)] ?? "permanent";
  return {
    name: String(row.name),
    kind,
    persistence,
    dataBytes: toNumber(row.data_bytes),
    totalBytes: toNumber(row.total_bytes),
    populated: typeof row.populated === "boolean" ? row.populated : null,
  };
}

/**
 * On-disk size of the tables, views and materialized views in the public
 * schema, optionally restricted to `names`.
 */
export async function inspectSpace(
  runner: DatabaseRunner,
  names?: readonly string[]
): Promise<SpaceEntry[]> {
  const rows = await runner.execute(SPACE_QUERY);
  const entries = rows.map(toEntry);
  return names ? entries.filter((e) => names.includes(e.name)) : entries;
}
