import { existsSync, writeFileSync } from 'node:fs'
import type { Command } from 'commander'
import { DEFAULT_CONFIG } from '../../config/index.js'
import { output } from '../output.js'

/**
 * Register the `init` command on the Commander program.
 *
 * Generates a starter rowkeeper.config.json with default values.
 */
export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Write a starter configuration file')
    .option('-o, --output <path>', 'output file path', 'rowkeeper.config.json')
    .option('-d, --database <path>', 'database file the configuration points at')
    .action((options: { output: string; database?: string }) => {
      const configPath = options.output

      if (existsSync(configPath)) {
        output.error(`Configuration file already exists: ${configPath}`)
        process.exit(1)
        return
      }

      const starterConfig = {
        database: {
          ...DEFAULT_CONFIG.database,
          path: options.database ?? DEFAULT_CONFIG.database.path,
        },
        logging: DEFAULT_CONFIG.logging,
      }

      writeFileSync(configPath, JSON.stringify(starterConfig, null, 2) + '\n')
      output.info(`Configuration written to ${configPath}`)
    })
}
