import Database from "better-sqlite3";
import fs from "fs";
import path from "path";

const MIGRATIONS_DIR = path.resolve(__dirname, "../../migrations");

/**
 * Apply every migrations/*.sql file in name order.
 * Statements are idempotent (CREATE ... IF NOT EXISTS).
 */
export function migrate(db: Database.Database, dir: string = MIGRATIONS_DIR): string[] {
  const files = fs
    .readdirSync(dir)
    .filter((f) => f.endsWith(".sql"))
    .sort();

  for (const file of files) {
    db.exec(fs.readFileSync(path.join(dir, file), "utf8"));
  }
  return files;
}

export function openDatabase(filename: string): Database.Database {
  if (filename !== ":memory:") {
    fs.mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
  }

  const db = new Database(filename);
  db.pragma("journal_mode = WAL");

  const applied = migrate(db);
  console.log(`[Store] Opened ${filename} (${applied.length} migration file(s))`);
  return db;
}
