/**
 * E2E: schema migrations across reopened queues.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { MigrationError, Migrator } from '../src/index.js'
import { DatabaseHarness, silentLogger } from './helpers/database-harness.js'

function buildMigrator(): Migrator {
  return new Migrator({ logger: silentLogger })
    .registerMigration('createPersons', 'CREATE TABLE persons (id INTEGER PRIMARY KEY, name TEXT NOT NULL)')
    .registerMigration('createPets', (db) => {
      db.executeScript(`
        CREATE TABLE pets (
          id INTEGER PRIMARY KEY,
          name TEXT NOT NULL,
          ownerId INTEGER NOT NULL REFERENCES persons(id) ON DELETE CASCADE
        );
        CREATE INDEX pets_owner ON pets(ownerId);
      `)
    })
}

describe('E2E: migrations', () => {
  let harness: DatabaseHarness

  beforeEach(() => {
    harness = new DatabaseHarness()
  })

  afterEach(() => {
    harness.cleanup()
  })

  it('should record createPersons and createPets once each, in order', () => {
    const queue = harness.open()
    const migrator = buildMigrator()

    expect(migrator.migrate(queue)).toEqual(['createPersons', 'createPets'])
    expect(migrator.migrate(queue)).toEqual([])
    expect(migrator.migrate(queue)).toEqual([])

    const records = migrator.appliedMigrations(queue)
    expect(records.map((r) => r.name)).toEqual(['createPersons', 'createPets'])
    expect(records.map((r) => r.appliedOrder)).toEqual([1, 2])
  })

  it('should see applied migrations from a reopened database', () => {
    buildMigrator().migrate(harness.open())
    const reopened = harness.open()
    expect(buildMigrator().hasCompletedMigrations(reopened)).toBe(true)
    expect(buildMigrator().migrate(reopened)).toEqual([])
  })

  it('should stop at a failing migration in the middle and resume later', () => {
    const queue = harness.open()
    const failing = buildMigrator()
      .registerMigration('addAge', 'ALTER TABLE persons ADD COLUMN age INTEGER; ALTER TABLE nowhere ADD COLUMN x')
      .registerMigration('addEmail', 'ALTER TABLE persons ADD COLUMN email TEXT')

    expect(() => failing.migrate(queue)).toThrow(MigrationError)
    expect(failing.appliedMigrations(queue).map((r) => r.name)).toEqual(['createPersons', 'createPets'])
    const columns = queue.inDatabase((db) => db.fetchAll('PRAGMA table_info(persons)').map((row) => row.toObject().name))
    expect(columns).toEqual([
      { kind: 'text', value: 'id' },
      { kind: 'text', value: 'name' },
    ])

    const repaired = buildMigrator()
      .registerMigration('addAge', 'ALTER TABLE persons ADD COLUMN age INTEGER')
      .registerMigration('addEmail', 'ALTER TABLE persons ADD COLUMN email TEXT')
    expect(repaired.migrate(queue)).toEqual(['addAge', 'addEmail'])
    expect(repaired.appliedMigrations(queue).map((r) => r.appliedOrder)).toEqual([1, 2, 3, 4])
  })
})
