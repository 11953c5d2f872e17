export { Migrator, MIGRATIONS_TABLE } from './migrator.js'
export type { Migration, MigrationRecord, MigrateOptions } from './migrator.js'
