/**
 * Database connection — creates the SQLite instance and sets pragmas.
 *
 * Imported by schema.ts (CREATE TABLE) and queries.ts (prepared statements).
 * The barrel `../db.ts` re-exports everything.
 *
 * DB_PATH overrides the default file; `:memory:` gives a throwaway store
 * (the test suite runs that way).
 */

import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import Database, { type Database as DatabaseType } from 'better-sqlite3'

const __dirname = path.dirname(fileURLToPath(import.meta.url))
export const DB_PATH = process.env.DB_PATH ?? path.join(__dirname, '..', '..', 'data', 'scores.db')

if (DB_PATH !== ':memory:') {
  fs.mkdirSync(path.dirname(DB_PATH), { recursive: true })
}

export const db: DatabaseType = new Database(DB_PATH)

// A scoring run replaces the whole table at once; WAL lets lookups keep
// reading the previous table while that transaction is open.
if (DB_PATH !== ':memory:') db.pragma('journal_mode = WAL')
db.pragma('synchronous = NORMAL')
db.pragma('foreign_keys = ON')
