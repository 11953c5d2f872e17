import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtempSync, rmSync, existsSync, readFileSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import type { Command } from 'commander'
import { createProgram as buildProgram } from './program.js'
import { formatCell } from './output.js'
import { NULL, blob, integer, text } from '../database/value.js'

describe('CLI', () => {
  let tempDir: string
  let dbPath: string
  let missingConfig: string

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'rowkeeper-cli-test-'))
    dbPath = join(tempDir, 'app.db')
    missingConfig = join(tempDir, 'none.config.json')
  })

  afterEach(() => {
    vi.restoreAllMocks()
    vi.clearAllMocks()
    rmSync(tempDir, { recursive: true, force: true })
  })

  function createProgram(): Command {
    return buildProgram().exitOverride()
  }

  function run(...args: string[]): void {
    createProgram().parse(['node', 'rowkeeper', ...args])
  }

  function stdoutOf(spy: { mock: { calls: unknown[][] } }): string {
    return spy.mock.calls.map((c) => String(c[0])).join('')
  }

  describe('help output', () => {
    it('should list all commands in help', () => {
      const help = createProgram().helpInformation()
      expect(help).toContain('init')
      expect(help).toContain('query')
      expect(help).toContain('exec')
      expect(help).toContain('migrations')
    })
  })

  describe('init command', () => {
    it('should create a valid config file', () => {
      const configPath = join(tempDir, 'rowkeeper.config.json')
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)
      vi.spyOn(process.stdout, 'write').mockReturnValue(true)

      run('init', '--output', configPath, '--database', dbPath)

      expect(exitSpy).not.toHaveBeenCalled()
      expect(existsSync(configPath)).toBe(true)
      const config = JSON.parse(readFileSync(configPath, 'utf-8'))
      expect(config.database.path).toBe(dbPath)
      expect(config.database.journalMode).toBe('wal')
      expect(config.logging.level).toBe('warn')
    })

    it('should refuse to overwrite existing config', () => {
      const configPath = join(tempDir, 'existing.config.json')
      writeFileSync(configPath, '{}')
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)
      const stderrSpy = vi.spyOn(process.stderr, 'write').mockReturnValue(true)

      run('init', '--output', configPath)

      expect(exitSpy).toHaveBeenCalledWith(1)
      expect(stderrSpy).toHaveBeenCalledWith(`Error: Configuration file already exists: ${configPath}\n`)
      expect(readFileSync(configPath, 'utf-8')).toBe('{}')
    })
  })

  describe('exec and query commands', () => {
    it('should report changed rows and print query results', () => {
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)
      const stdoutSpy = vi.spyOn(process.stdout, 'write').mockReturnValue(true)

      run('exec', 'CREATE TABLE persons (name TEXT, age INTEGER)', '-d', dbPath, '-c', missingConfig)
      run('exec', 'INSERT INTO persons VALUES (?, 36)', 'Arthur', '-d', dbPath, '-c', missingConfig)
      run('query', 'SELECT name, age FROM persons', '-d', dbPath, '-c', missingConfig)

      expect(exitSpy).not.toHaveBeenCalled()
      expect(stdoutOf(stdoutSpy)).toBe(
        'OK: 0 row(s) changed\n' + 'OK: 1 row(s) changed\n' + 'name    age\n' + '------  ---\n' + 'Arthur  36 \n',
      )
    })

    it('should print a marker for an empty result', () => {
      const stdoutSpy = vi.spyOn(process.stdout, 'write').mockReturnValue(true)
      run('query', "SELECT 1 WHERE 0", '-d', dbPath, '-c', missingConfig)
      expect(stdoutOf(stdoutSpy)).toBe('(no rows)\n')
    })

    it('should read the database path from the config file', () => {
      const configPath = join(tempDir, 'rowkeeper.config.json')
      writeFileSync(configPath, JSON.stringify({ database: { path: dbPath } }))
      const stdoutSpy = vi.spyOn(process.stdout, 'write').mockReturnValue(true)

      run('query', "SELECT 'hello' AS greeting", '-c', configPath)

      expect(stdoutOf(stdoutSpy)).toBe('greeting\n' + '--------\n' + 'hello   \n')
      expect(existsSync(dbPath)).toBe(true)
    })

    it('should exit with 1 and print the engine message on bad SQL', () => {
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)
      const stderrSpy = vi.spyOn(process.stderr, 'write').mockReturnValue(true)

      run('query', 'SELEC 1', '-d', dbPath, '-c', missingConfig)

      expect(exitSpy).toHaveBeenCalledWith(1)
      expect(stderrSpy).toHaveBeenCalledWith('Error: near "SELEC": syntax error\n')
    })

    it('should refuse writes from query', () => {
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)
      vi.spyOn(process.stdout, 'write').mockReturnValue(true)
      vi.spyOn(process.stderr, 'write').mockReturnValue(true)

      run('exec', 'CREATE TABLE t (x)', '-d', dbPath, '-c', missingConfig)
      run('query', 'INSERT INTO t VALUES (1) RETURNING x', '-d', dbPath, '-c', missingConfig)

      expect(exitSpy).toHaveBeenCalledWith(1)
    })

    it('should exit with 1 when no config file exists and no database is given', () => {
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)
      const stderrSpy = vi.spyOn(process.stderr, 'write').mockReturnValue(true)

      run('query', 'SELECT 1', '-c', missingConfig)

      expect(exitSpy).toHaveBeenCalledWith(1)
      expect(stderrSpy).toHaveBeenCalledWith(`Error: Configuration file not found: ${missingConfig}\n`)
    })
  })

  describe('migrations command', () => {
    it('should report when nothing has been applied', () => {
      const stdoutSpy = vi.spyOn(process.stdout, 'write').mockReturnValue(true)
      run('migrations', '-d', dbPath, '-c', missingConfig)
      expect(stdoutOf(stdoutSpy)).toBe('No migrations applied\n')
    })

    it('should list applied migrations in order', () => {
      const stdoutSpy = vi.spyOn(process.stdout, 'write').mockReturnValue(true)
      run(
        'exec',
        'CREATE TABLE rowkeeper_migrations (identifier TEXT NOT NULL PRIMARY KEY, applied_order INTEGER NOT NULL UNIQUE, applied_at TEXT NOT NULL)',
        '-d',
        dbPath,
        '-c',
        missingConfig,
      )
      run(
        'exec',
        "INSERT INTO rowkeeper_migrations VALUES ('createPersons', 1, '2024-01-01T00:00:00.000Z')",
        '-d',
        dbPath,
        '-c',
        missingConfig,
      )
      stdoutSpy.mockClear()

      run('migrations', '-d', dbPath, '-c', missingConfig)

      const lines = stdoutOf(stdoutSpy).split('\n')
      expect(lines[0]).toBe('Order  Name           Applied At              ')
      expect(lines[2]).toBe('1      createPersons  2024-01-01T00:00:00.000Z')
    })
  })
})

describe('formatCell', () => {
  it('should print text verbatim and other kinds as described', () => {
    expect(formatCell(text('Arthur'))).toBe('Arthur')
    expect(formatCell(integer(36n))).toBe('36')
    expect(formatCell(NULL)).toBe('NULL')
    expect(formatCell(blob(new Uint8Array(2)))).toBe('<2 bytes>')
  })
})
