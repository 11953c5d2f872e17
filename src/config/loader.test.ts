import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { writeFileSync, mkdtempSync, rmSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { loadConfig, ConfigError } from './loader.js'
import { resolveDatabaseOptions } from './options.js'
import { ConnectionError } from '../database/errors.js'

describe('loadConfig', () => {
  let tempDir: string
  let configPath: string

  const validConfig = {
    database: { path: '/var/lib/app/app.db' },
  }

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'rowkeeper-test-'))
    configPath = join(tempDir, 'rowkeeper.config.json')
  })

  afterEach(() => {
    for (const key of Object.keys(process.env)) {
      if (key.startsWith('ROWKEEPER_')) {
        delete process.env[key]
      }
    }
    rmSync(tempDir, { recursive: true, force: true })
  })

  describe('successful loading', () => {
    it('should load a valid config file and return typed RowkeeperConfig', () => {
      writeFileSync(configPath, JSON.stringify(validConfig))
      const config = loadConfig(configPath)
      expect(config.database.path).toBe('/var/lib/app/app.db')
    })

    it('should apply defaults for missing fields', () => {
      writeFileSync(configPath, JSON.stringify({}))
      const config = loadConfig(configPath)
      expect(config.database.path).toBe('./data/app.db')
      expect(config.database.readonly).toBe(false)
      expect(config.database.create).toBe(true)
      expect(config.database.timeoutMs).toBe(5000)
      expect(config.database.journalMode).toBe('wal')
      expect(config.database.foreignKeys).toBe(true)
      expect(config.logging.level).toBe('warn')
      expect(config.logging.pretty).toBe(false)
    })

    it('should override defaults with user-specified values', () => {
      writeFileSync(
        configPath,
        JSON.stringify({ database: { journalMode: 'delete', timeoutMs: 250 }, logging: { level: 'debug' } }),
      )
      const config = loadConfig(configPath)
      expect(config.database.journalMode).toBe('delete')
      expect(config.database.timeoutMs).toBe(250)
      expect(config.database.path).toBe('./data/app.db')
      expect(config.logging.level).toBe('debug')
    })
  })

  describe('environment variable overrides', () => {
    it('should override nested config with double underscore (ROWKEEPER_DATABASE__TIMEOUTMS)', () => {
      writeFileSync(configPath, JSON.stringify(validConfig))
      process.env.ROWKEEPER_DATABASE__TIMEOUTMS = '100'
      const config = loadConfig(configPath)
      expect(config.database.timeoutMs).toBe(100)
    })

    it('should coerce boolean env vars (ROWKEEPER_DATABASE__FOREIGNKEYS=false)', () => {
      writeFileSync(configPath, JSON.stringify(validConfig))
      process.env.ROWKEEPER_DATABASE__FOREIGNKEYS = 'false'
      const config = loadConfig(configPath)
      expect(config.database.foreignKeys).toBe(false)
    })

    it('should keep string values as strings', () => {
      writeFileSync(configPath, JSON.stringify(validConfig))
      process.env.ROWKEEPER_DATABASE__PATH = '/tmp/other.db'
      const config = loadConfig(configPath)
      expect(config.database.path).toBe('/tmp/other.db')
    })

    it('should match option names against the defaults regardless of case', () => {
      writeFileSync(configPath, JSON.stringify(validConfig))
      const config = loadConfig(configPath, { ROWKEEPER_LOGGING__PRETTY: 'true', ROWKEEPER_DATABASE__JOURNALMODE: 'delete' })
      expect(config.logging.pretty).toBe(true)
      expect(config.database.journalMode).toBe('delete')
    })

    it('should reject an override for an unknown option', () => {
      writeFileSync(configPath, JSON.stringify(validConfig))
      expect(() => loadConfig(configPath, { ROWKEEPER_DATABASE__POOLSIZE: '4' })).toThrow(ConfigError)
    })

    it('should reject an override that does not convert', () => {
      writeFileSync(configPath, JSON.stringify(validConfig))
      try {
        loadConfig(configPath, { ROWKEEPER_DATABASE__TIMEOUTMS: 'soon' })
        expect.fail('Should have thrown')
      } catch (err) {
        expect(err).toBeInstanceOf(ConfigError)
        const configErr = err as ConfigError
        expect(configErr.code).toBe('INVALID')
        expect(configErr.fields.some((f) => f.path === '/database/timeoutMs')).toBe(true)
      }
    })

    it('should ignore variables without a nested path', () => {
      writeFileSync(configPath, JSON.stringify(validConfig))
      process.env.ROWKEEPER_LOG_LEVEL = 'debug'
      const config = loadConfig(configPath)
      expect(config.logging.level).toBe('warn')
    })
  })

  describe('error handling', () => {
    it('should throw ConfigError for missing config file', () => {
      const missing = join(tempDir, 'missing.json')
      expect(() => loadConfig(missing)).toThrow(ConfigError)
      expect(() => loadConfig(missing)).toThrow('Configuration file not found')
      try {
        loadConfig(missing)
        expect.fail('Should have thrown')
      } catch (err) {
        expect(err).toBeInstanceOf(ConfigError)
        expect((err as ConfigError).code).toBe('NOT_FOUND')
      }
    })

    it('should throw ConfigError for invalid JSON', () => {
      writeFileSync(configPath, '{ invalid json }')
      expect(() => loadConfig(configPath)).toThrow(ConfigError)
      expect(() => loadConfig(configPath)).toThrow('Invalid JSON')
    })

    it('should tag malformed files with INVALID_JSON', () => {
      writeFileSync(configPath, '{ invalid json }')
      try {
        loadConfig(configPath)
        expect.fail('Should have thrown')
      } catch (err) {
        expect(err).toBeInstanceOf(ConfigError)
        expect((err as ConfigError).code).toBe('INVALID_JSON')
      }
    })

    it('should throw ConfigError when the file holds an array', () => {
      writeFileSync(configPath, '[]')
      expect(() => loadConfig(configPath)).toThrow('must contain a JSON object')
    })

    it('should report field-level details for invalid values', () => {
      writeFileSync(configPath, JSON.stringify({ database: { journalMode: 'sideways' } }))
      try {
        loadConfig(configPath)
        expect.fail('Should have thrown')
      } catch (err) {
        expect(err).toBeInstanceOf(ConfigError)
        const configErr = err as ConfigError
        expect(configErr.message).toContain('Configuration invalid')
        expect(configErr.fields.some((f) => f.path === '/database/journalMode')).toBe(true)
      }
    })

    it('should reject unknown database keys', () => {
      writeFileSync(configPath, JSON.stringify({ database: { poolSize: 4 } }))
      expect(() => loadConfig(configPath)).toThrow(ConfigError)
    })
  })

  describe('config immutability', () => {
    it('should deeply freeze the config object', () => {
      writeFileSync(configPath, JSON.stringify(validConfig))
      const config = loadConfig(configPath)
      expect(Object.isFrozen(config)).toBe(true)
      expect(Object.isFrozen(config.database)).toBe(true)
      expect(Object.isFrozen(config.logging)).toBe(true)
    })
  })
})

describe('resolveDatabaseOptions', () => {
  it('should return the defaults when given nothing', () => {
    expect(resolveDatabaseOptions()).toEqual({
      readonly: false,
      create: true,
      timeoutMs: 5000,
      journalMode: 'wal',
      foreignKeys: true,
    })
  })

  it('should keep defaults for keys explicitly set to undefined', () => {
    expect(resolveDatabaseOptions({ timeoutMs: undefined, readonly: true })).toMatchObject({
      timeoutMs: 5000,
      readonly: true,
    })
  })

  it('should throw ConnectionError with INVALID_OPTIONS for a negative timeout', () => {
    try {
      resolveDatabaseOptions({ timeoutMs: -1 })
      expect.fail('Should have thrown')
    } catch (err) {
      expect(err).toBeInstanceOf(ConnectionError)
      const connectionErr = err as ConnectionError
      expect(connectionErr.code).toBe('INVALID_OPTIONS')
      expect(connectionErr.message).toContain('Database options invalid')
      expect(connectionErr.fields[0].path).toBe('/timeoutMs')
    }
  })
})
