import type { Command } from 'commander'
import { openDatabase, type DatabaseCommandOptions } from '../database.js'
import { output } from '../output.js'

/**
 * Register the `query` command on the Commander program.
 *
 * Runs one SELECT with positional parameters and prints the rows.
 */
export function registerQueryCommand(program: Command): void {
  program
    .command('query')
    .description('Run a query and print the rows')
    .argument('<sql>', 'SQL text with ? placeholders')
    .argument('[params...]', 'positional parameter values')
    .option('-c, --config <path>', 'configuration file path', 'rowkeeper.config.json')
    .option('-d, --database <path>', 'database file (overrides config)')
    .action((sql: string, params: string[], options: DatabaseCommandOptions) => {
      try {
        const queue = openDatabase(options)
        try {
          const rows = queue.read((db) => db.fetchAll(sql, params))
          output.rows(rows)
        } finally {
          queue.close()
        }
      } catch (err) {
        output.error(err instanceof Error ? err.message : String(err))
        process.exit(1)
      }
    })
}
