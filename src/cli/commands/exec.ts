import type { Command } from 'commander'
import { openDatabase, type DatabaseCommandOptions } from '../database.js'
import { output } from '../output.js'

/**
 * Register the `exec` command on the Commander program.
 *
 * Runs one statement in a transaction and reports the number of changed rows.
 */
export function registerExecCommand(program: Command): void {
  program
    .command('exec')
    .description('Execute a statement and print the number of changed rows')
    .argument('<sql>', 'SQL text with ? placeholders')
    .argument('[params...]', 'positional parameter values')
    .option('-c, --config <path>', 'configuration file path', 'rowkeeper.config.json')
    .option('-d, --database <path>', 'database file (overrides config)')
    .action((sql: string, params: string[], options: DatabaseCommandOptions) => {
      try {
        const queue = openDatabase(options)
        try {
          const result = queue.write((db) => db.execute(sql, params))
          output.success(`${result.changes} row(s) changed`)
        } finally {
          queue.close()
        }
      } catch (err) {
        output.error(err instanceof Error ? err.message : String(err))
        process.exit(1)
      }
    })
}
