import type { Command } from 'commander'
import { Migrator } from '../../migration/index.js'
import { openDatabase, type DatabaseCommandOptions } from '../database.js'
import { output } from '../output.js'

/**
 * Register the `migrations` command on the Commander program.
 *
 * Lists the migrations recorded as applied, oldest first.
 */
export function registerMigrationsCommand(program: Command): void {
  program
    .command('migrations')
    .description('List applied migrations')
    .option('-c, --config <path>', 'configuration file path', 'rowkeeper.config.json')
    .option('-d, --database <path>', 'database file (overrides config)')
    .action((options: DatabaseCommandOptions) => {
      try {
        const queue = openDatabase(options)
        try {
          const records = new Migrator().appliedMigrations(queue)
          if (records.length === 0) {
            output.info('No migrations applied')
            return
          }
          output.table(
            records.map((r) => ({
              Order: String(r.appliedOrder),
              Name: r.name,
              'Applied At': r.appliedAt,
            })),
          )
        } finally {
          queue.close()
        }
      } catch (err) {
        output.error(err instanceof Error ? err.message : String(err))
        process.exit(1)
      }
    })
}
