/**
 * Barrel for the score store. Importing it opens the database, creates the
 * tables and prepares the statements, in that order.
 */
export { db, DB_PATH } from './db/connection.js'
import './db/schema.js'
export * from './db/queries.js'
