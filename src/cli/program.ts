import { Command } from 'commander'
import { registerInitCommand } from './commands/init.js'
import { registerQueryCommand } from './commands/query.js'
import { registerExecCommand } from './commands/exec.js'
import { registerMigrationsCommand } from './commands/migrations.js'

/** Build the rowkeeper command-line program. */
export function createProgram(): Command {
  const program = new Command()

  program
    .name('rowkeeper')
    .description('Inspect and modify a rowkeeper database')
    .version('0.1.0')

  registerInitCommand(program)
  registerQueryCommand(program)
  registerExecCommand(program)
  registerMigrationsCommand(program)

  return program
}
