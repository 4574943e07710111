import type Database from "better-sqlite3";
import { IndexNotFoundError, SchemaConflictError } from "../utils/errors.js";

export type IndexFieldType = "string" | "double";

export type IndexField = {
  name: string;
  type: IndexFieldType;
  key?: boolean;
  searchable?: boolean;
  filterable?: boolean;
  sortable?: boolean;
};

export type IndexSchema = readonly IndexField[];

export const INVOICE_INDEX_SCHEMA: IndexSchema = [
  { name: "invoice_id", type: "string", key: true, filterable: true, sortable: true },
  { name: "vendor", type: "string", searchable: true, filterable: true },
  { name: "invoice_date", type: "string", filterable: true, sortable: true },
  { name: "due_date", type: "string", filterable: true, sortable: true },
  { name: "currency", type: "string", filterable: true },
  { name: "subtotal", type: "double", filterable: true, sortable: true },
  { name: "tax", type: "double", filterable: true, sortable: true },
  { name: "shipping", type: "double", filterable: true, sortable: true },
  { name: "total", type: "double", filterable: true, sortable: true },
  { name: "content", type: "string", searchable: true },
  { name: "source_file", type: "string" },
];

// Derived facet columns stored next to the schema fields.
export const FACET_COLUMNS = ["invoice_month", "amount_band", "indexed_at"] as const;

const INDEX_NAME_PATTERN = /^[a-z][a-z0-9_]{0,47}$/;

export type IndexTables = { docs: string; fts: string };

export type IndexInfo = {
  name: string;
  createdAt: string;
  documentCount: number;
};

function nowIso(now?: Date) {
  return (now ?? new Date()).toISOString();
}

function quote(identifier: string) {
  return `"${identifier}"`;
}

export function indexTables(indexName: string): IndexTables {
  if (!INDEX_NAME_PATTERN.test(indexName)) {
    throw new Error(`Invalid index name "${indexName}": use lowercase letters, digits and underscores`);
  }
  return { docs: quote(`${indexName}_docs`), fts: quote(`${indexName}_fts`) };
}

function ensureRegistry(db: Database.Database) {
  db.exec(`
    CREATE TABLE IF NOT EXISTS search_indexes (
      name TEXT PRIMARY KEY,
      schemaJson TEXT NOT NULL,
      createdAt TEXT NOT NULL
    );
  `);
}

function columnSql(field: IndexField) {
  const type = field.type === "double" ? "REAL" : "TEXT";
  if (field.key) return `${field.name} TEXT PRIMARY KEY`;
  if (field.name === "total") return `${field.name} ${type} NOT NULL`;
  if (field.name === "content" || field.name === "source_file") return `${field.name} TEXT NOT NULL`;
  return `${field.name} ${type}`;
}

function expectedColumns(schema: IndexSchema) {
  return [...schema.map((f) => f.name), ...FACET_COLUMNS];
}

function tableColumns(db: Database.Database, table: string): string[] {
  const rows = db.prepare(`PRAGMA table_info(${table})`).all() as Array<{ name: string }>;
  return rows.map((r) => r.name);
}

function registeredSchema(db: Database.Database, indexName: string): string | null {
  ensureRegistry(db);
  const row = db
    .prepare(`SELECT schemaJson FROM search_indexes WHERE name = ?`)
    .get(indexName) as { schemaJson: string } | undefined;
  return row?.schemaJson ?? null;
}

export function indexExists(db: Database.Database, indexName: string): boolean {
  indexTables(indexName);
  return registeredSchema(db, indexName) !== null;
}

export function requireIndex(db: Database.Database, indexName: string): IndexTables {
  const tables = indexTables(indexName);
  if (registeredSchema(db, indexName) === null) throw new IndexNotFoundError(indexName);
  return tables;
}

/**
 * Create the index tables if they do not exist. Re-running with the same
 * schema is a no-op; any difference is a SchemaConflictError and the index
 * has to be reset explicitly.
 */
export function ensureSchema(
  db: Database.Database,
  indexName: string,
  schema: IndexSchema = INVOICE_INDEX_SCHEMA,
  now?: Date
): "created" | "unchanged" {
  const tables = indexTables(indexName);
  const schemaJson = JSON.stringify(schema);

  const stored = registeredSchema(db, indexName);
  if (stored !== null) {
    if (stored !== schemaJson) throw new SchemaConflictError(indexName, "registered field definitions differ");
    const actual = tableColumns(db, tables.docs);
    const expected = expectedColumns(schema);
    if (actual.join(",") !== expected.join(",")) {
      throw new SchemaConflictError(indexName, `columns ${actual.join(",") || "(none)"} != ${expected.join(",")}`);
    }
    return "unchanged";
  }

  const existing = tableColumns(db, tables.docs);
  if (existing.length > 0) {
    throw new SchemaConflictError(indexName, "unregistered table with the same name exists");
  }

  const key = schema.find((f) => f.key);
  if (!key) throw new SchemaConflictError(indexName, "schema declares no key field");
  const searchable = schema.filter((f) => f.searchable && f.name === "content");
  if (searchable.length === 0) throw new SchemaConflictError(indexName, "schema declares no searchable content field");

  const create = db.transaction(() => {
    db.exec(`
      CREATE TABLE ${tables.docs} (
        ${schema.map(columnSql).join(",\n        ")},
        invoice_month TEXT,
        amount_band TEXT NOT NULL,
        indexed_at TEXT NOT NULL
      );
      CREATE VIRTUAL TABLE ${tables.fts} USING fts5(
        ${key.name} UNINDEXED,
        content,
        tokenize = 'unicode61 remove_diacritics 2'
      );
    `);

    for (const f of schema) {
      if (f.key || !(f.filterable || f.sortable)) continue;
      db.exec(`CREATE INDEX ${quote(`idx_${indexName}_${f.name}`)} ON ${tables.docs}(${f.name})`);
    }

    db.prepare(`INSERT INTO search_indexes (name, schemaJson, createdAt) VALUES (?, ?, ?)`).run(
      indexName,
      schemaJson,
      nowIso(now)
    );
  });
  create();

  return "created";
}

export function resetIndex(db: Database.Database, indexName: string): boolean {
  const tables = indexTables(indexName);
  ensureRegistry(db);

  const drop = db.transaction(() => {
    db.exec(`DROP TABLE IF EXISTS ${tables.fts}; DROP TABLE IF EXISTS ${tables.docs};`);
    return db.prepare(`DELETE FROM search_indexes WHERE name = ?`).run(indexName).changes > 0;
  });
  return drop();
}

export function listIndexes(db: Database.Database): IndexInfo[] {
  ensureRegistry(db);
  const rows = db
    .prepare(`SELECT name, createdAt FROM search_indexes ORDER BY name`)
    .all() as Array<{ name: string; createdAt: string }>;

  return rows.map((r) => {
    const { docs } = indexTables(r.name);
    const count = db.prepare(`SELECT COUNT(*) AS n FROM ${docs}`).get() as { n: number };
    return { name: r.name, createdAt: r.createdAt, documentCount: count.n };
  });
}
