import type { Logger } from 'pino'
import type { Connection } from '../database/connection.js'
import { Converters } from '../database/converters.js'
import { DatabaseMisuseError, ExecutionError, MigrationError } from '../database/errors.js'
import type { DatabaseAccess } from '../database/interface.js'
import { required } from '../database/row.js'
import { getDefaultLogger } from '../logging/logger.js'
import { projection } from '../model/projection.js'

/** Reserved table recording applied migrations. Only the Migrator writes it. */
export const MIGRATIONS_TABLE = 'rowkeeper_migrations'

/**
 * A named schema change: SQL text (may hold several statements) or a block
 * run with the connection.
 */
export interface Migration {
  name: string
  description?: string
  up: string | ((db: Connection) => void)
}

/** One applied migration as persisted in the migrations table. */
export interface MigrationRecord {
  name: string
  appliedOrder: number
  appliedAt: string
}

export interface MigrateOptions {
  /** Stop after applying this migration. */
  upTo?: string
}

const MigrationRecordRow = projection({
  name: required(Converters.text, 'identifier'),
  appliedOrder: required(Converters.integer, 'applied_order'),
  appliedAt: required(Converters.text, 'applied_at'),
})

function ensureMigrationsTable(db: Connection): void {
  db.executeScript(`
    CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
      identifier TEXT NOT NULL PRIMARY KEY,
      applied_order INTEGER NOT NULL UNIQUE,
      applied_at TEXT NOT NULL
    )
  `)
}

function checkForeignKeys(db: Connection): void {
  const enabled = db.fetchOne(required(Converters.boolean), 'PRAGMA foreign_keys')
  if (!enabled) return
  const violations = db.fetchAll('PRAGMA foreign_key_check')
  if (violations.length > 0) {
    const table = violations[0].decode(Converters.text, 'table') ?? 'unknown'
    throw new ExecutionError(
      `Foreign key check failed: ${violations.length} violation(s), first in table ${table}`,
      'SQLITE_CONSTRAINT_FOREIGNKEY',
    )
  }
}

/**
 * Ordered registry of schema migrations.
 *
 * Migrations apply in registration order, each in its own transaction, and
 * are recorded in the same transaction that applied them. A failing
 * migration rolls back alone: earlier ones stay applied, later ones are not
 * attempted, and the next `migrate` call starts again from the failed one.
 */
export class Migrator {
  private readonly migrations: Migration[] = []
  private readonly logger: Logger

  constructor(options: { logger?: Logger } = {}) {
    this.logger = (options.logger ?? getDefaultLogger()).child({ component: 'migrator' })
  }

  /**
   * Register a migration after those already registered.
   *
   * @throws DatabaseMisuseError when the name is already registered
   */
  registerMigration(name: string, up: Migration['up'], description?: string): this {
    if (name.length === 0) {
      throw new DatabaseMisuseError('Migration names must not be empty')
    }
    if (this.migrations.some((m) => m.name === name)) {
      throw new DatabaseMisuseError(`Migration "${name}" is already registered`)
    }
    this.migrations.push({ name, up, description })
    return this
  }

  get migrationNames(): string[] {
    return this.migrations.map((m) => m.name)
  }

  /**
   * Apply every registered migration not yet recorded, in registration order.
   *
   * @returns names of the migrations applied by this call
   * @throws MigrationError wrapping the error of the first failing migration
   */
  migrate(queue: DatabaseAccess, options: MigrateOptions = {}): string[] {
    const pending = this.pendingUpTo(options.upTo)
    queue.inDatabase(ensureMigrationsTable)
    const applied = new Set(this.appliedMigrations(queue).map((r) => r.name))

    const appliedNow: string[] = []
    for (const migration of pending) {
      if (applied.has(migration.name)) continue
      try {
        queue.write((db) => {
          if (typeof migration.up === 'string') {
            db.executeScript(migration.up)
          } else {
            migration.up(db)
          }
          checkForeignKeys(db)
          db.execute(
            `INSERT INTO ${MIGRATIONS_TABLE} (identifier, applied_order, applied_at)
             VALUES (?, (SELECT COALESCE(MAX(applied_order), 0) + 1 FROM ${MIGRATIONS_TABLE}), ?)`,
            [migration.name, new Date().toISOString()],
          )
        })
      } catch (err) {
        this.logger.error({ err, migration: migration.name }, 'migration failed')
        throw new MigrationError(migration.name, err)
      }
      this.logger.info({ migration: migration.name, description: migration.description }, 'applied migration')
      appliedNow.push(migration.name)
    }
    return appliedNow
  }

  /** Applied migrations in the order they were applied. */
  appliedMigrations(queue: DatabaseAccess): MigrationRecord[] {
    return queue.inDatabase((db) => {
      const exists = db.fetchOne("SELECT 1 FROM sqlite_master WHERE type = 'table' AND name = ?", [MIGRATIONS_TABLE])
      if (exists === null) return []
      return db.fetchAll(MigrationRecordRow, `SELECT * FROM ${MIGRATIONS_TABLE} ORDER BY applied_order`)
    })
  }

  /** True when every registered migration has been applied. */
  hasCompletedMigrations(queue: DatabaseAccess): boolean {
    const applied = new Set(this.appliedMigrations(queue).map((r) => r.name))
    return this.migrations.every((m) => applied.has(m.name))
  }

  private pendingUpTo(upTo: string | undefined): Migration[] {
    if (upTo === undefined) return [...this.migrations]
    const index = this.migrations.findIndex((m) => m.name === upTo)
    if (index === -1) {
      throw new DatabaseMisuseError(`No migration named "${upTo}" is registered`)
    }
    return this.migrations.slice(0, index + 1)
  }
}
