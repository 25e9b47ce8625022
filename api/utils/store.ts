import initSqlJs, { type Database, type SqlJsStatic, type SqlValue } from "sql.js";
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { buildColumn } from "../../app/src/lib/import/buildTable";
import type { CellValue, Column, ColumnKind, Table } from "../../app/src/lib/import/types";

export type Store = Database;

export type StoreMode = "read" | "write";
const relationNamePattern = /^[A-Za-z_][A-Za-z0-9_]{0,62}$/;

export class RelationNameError extends Error {
  relation: string;

  constructor(relation: string) {
    super(
      `Invalid table name "${relation}". Use letters, digits and underscores, starting with a letter or underscore.`
    );
    this.name = "RelationNameError";
    this.relation = relation;
  }
}

export class RelationNotFoundError extends Error {
  relation: string;

  constructor(relation: string) {
    super(`Table "${relation}" does not exist.`);
    this.name = "RelationNotFoundError";
    this.relation = relation;
  }
}

export const isValidRelationName = (name: string): boolean =>
  relationNamePattern.test(name) && !name.toLowerCase().startsWith("sqlite_");

export const assertRelationName = (name: string): string => {
  if (!isValidRelationName(name)) {
    throw new RelationNameError(name);
  }
  return name;
};

export const quoteIdentifier = (identifier: string): string =>
  `"${identifier.replace(/"/g, '""')}"`;

const declaredTypes: Record<ColumnKind, string> = {
  integer: "INTEGER",
  float: "REAL",
  text: "TEXT",
  boolean: "BOOLEAN",
  null: ""
};

const kindForDeclaredType = (declared: string): ColumnKind | null => {
  const upper = declared.trim().toUpperCase();
  if (upper === "BOOLEAN") {
    return "boolean";
  }
  if (upper.includes("INT")) {
    return "integer";
  }
  if (upper.includes("REAL") || upper.includes("FLOA") || upper.includes("DOUB")) {
    return "float";
  }
  if (upper.includes("CHAR") || upper.includes("CLOB") || upper.includes("TEXT")) {
    return "text";
  }
  return null;
};

let engine: Promise<SqlJsStatic> | null = null;

const loadEngine = (): Promise<SqlJsStatic> => {
  if (!engine) {
    engine = initSqlJs();
  }
  return engine;
};

/** Loads the database file into memory, or starts an empty one. */
export const openStore = async (path: string): Promise<Store> => {
  const SQL = await loadEngine();
  if (path !== ":memory:" && existsSync(path)) {
    return new SQL.Database(readFileSync(path));
  }
  return new SQL.Database();
};

const saveStore = (db: Store, path: string) => {
  if (path === ":memory:") {
    return;
  }
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, db.export());
};

/**
 * Opens the store for a single interaction and always closes it.
 * In write mode the database is written back to its file once `run` returns.
 */
export const withStore = async <T>(
  path: string,
  run: (db: Store) => T,
  mode: StoreMode = "read"
): Promise<T> => {
  const db = await openStore(path);
  try {
    const result = run(db);
    if (mode === "write") {
      saveStore(db, path);
    }
    return result;
  } finally {
    db.close();
  }
};

const queryRows = (db: Store, sql: string, params: SqlValue[] = []): SqlValue[][] => {
  const statement = db.prepare(sql, params);
  try {
    const rows: SqlValue[][] = [];
    while (statement.step()) {
      rows.push(statement.get());
    }
    return rows;
  } finally {
    statement.free();
  }
};

export const listRelations = (db: Store): string[] =>
  queryRows(
    db,
    "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite\\_%' ESCAPE '\\' ORDER BY name"
  ).map(([name]) => String(name));

/** Stored spelling of a table name; SQLite matches names without regard to case. */
export const findRelation = (db: Store, name: string): string | null => {
  const [row] = queryRows(
    db,
    "SELECT name FROM sqlite_master WHERE type = 'table' AND name = ? COLLATE NOCASE",
    [name]
  );
  return row ? String(row[0]) : null;
};

const toStoredValue = (value: CellValue): SqlValue => {
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  return value;
};

/**
 * Replaces the relation wholesale: drop, create and insert run in one
 * transaction so a failed write leaves the previous contents in place.
 */
export const persistRelation = (db: Store, name: string, table: Table): void => {
  const relation = quoteIdentifier(assertRelationName(name));
  const columnDefinitions = table.columns
    .map((column) => `${quoteIdentifier(column.name)} ${declaredTypes[column.kind]}`.trim())
    .join(", ");

  db.exec("BEGIN");
  try {
    db.exec(`DROP TABLE IF EXISTS ${relation}`);
    if (table.columns.length > 0) {
      db.exec(`CREATE TABLE ${relation} (${columnDefinitions})`);
      const placeholders = table.columns.map(() => "?").join(", ");
      const insert = db.prepare(`INSERT INTO ${relation} VALUES (${placeholders})`);
      try {
        for (let rowIndex = 0; rowIndex < table.rowCount; rowIndex += 1) {
          insert.run(table.columns.map((column) => toStoredValue(column.values[rowIndex] ?? null)));
        }
      } finally {
        insert.free();
      }
    }
    db.exec("COMMIT");
  } catch (error) {
    db.exec("ROLLBACK");
    throw error;
  }
};

type ColumnInfo = {
  name: string;
  type: string;
};

const toCell = (value: unknown): CellValue => {
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "bigint") {
    return Number(value);
  }
  if (value instanceof Uint8Array) {
    return new TextDecoder().decode(value);
  }
  return value === null || value === undefined ? null : String(value);
};

const restoreColumn = (info: ColumnInfo, stored: unknown[]): Column => {
  const kind = kindForDeclaredType(info.type);
  // untyped columns (all-null on write, or created elsewhere) take their kind from the values
  if (kind === null) {
    return buildColumn(info.name, stored.map(toCell));
  }
  const values = stored.map((value): CellValue => {
    if (value === null || value === undefined) {
      return null;
    }
    if (kind === "boolean") {
      return value === 1 || value === "1" || value === true;
    }
    if (kind === "integer" || kind === "float") {
      return typeof value === "number" ? value : Number(value);
    }
    return toCell(value);
  });
  return { name: info.name, kind, values };
};

export const retrieveRelation = (db: Store, name: string): Table => {
  const stored = findRelation(db, assertRelationName(name));
  if (stored === null) {
    throw new RelationNotFoundError(name);
  }
  const quoted = quoteIdentifier(stored);
  const infos = queryRows(db, `PRAGMA table_info(${quoted})`).map(
    ([, columnName, declared]): ColumnInfo => ({
      name: String(columnName),
      type: typeof declared === "string" ? declared : ""
    })
  );
  const rows = queryRows(db, `SELECT * FROM ${quoted} ORDER BY rowid`);

  return {
    columns: infos.map((info, columnIndex) =>
      restoreColumn(
        info,
        rows.map((row) => row[columnIndex] ?? null)
      )
    ),
    rowCount: rows.length
  };
};
