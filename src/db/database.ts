import fs from "node:fs";
import path from "node:path";
import initSqlJs from "sql.js";
import { StorageError } from "@/lib/errors";

export const IN_MEMORY = ":memory:";

export type SqliteDatabase = initSqlJs.Database;

/**
 * An open database and the file it is saved to. In-memory handles are
 * never written anywhere.
 */
export interface DatabaseHandle {
  db: SqliteDatabase;
  filename: string;
}

let sqlJs: Promise<initSqlJs.SqlJsStatic> | undefined;

const loadSqlJs = () => {
  sqlJs ??= initSqlJs();
  return sqlJs;
};

/**
 * Opens the SQLite file at `filename`, or a fresh database when it does not
 * exist yet. Its directory is created up front so the first save succeeds.
 */
export async function openDatabase(filename: string): Promise<DatabaseHandle> {
  try {
    const SQL = await loadSqlJs();
    if (filename === IN_MEMORY) {
      return { db: new SQL.Database(), filename };
    }

    const resolved = path.resolve(filename);
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
    const contents = fs.existsSync(resolved) ? fs.readFileSync(resolved) : undefined;
    return { db: new SQL.Database(contents), filename: resolved };
  } catch (error) {
    throw new StorageError(`Could not open database at ${filename}`, error);
  }
}

// Write to a sibling file first so a crash mid-write leaves the old copy intact.
export function saveDatabase({ db, filename }: DatabaseHandle): void {
  if (filename === IN_MEMORY) return;
  const tempFile = `${filename}.tmp`;
  fs.writeFileSync(tempFile, db.export());
  fs.renameSync(tempFile, filename);
}
