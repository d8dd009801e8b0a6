import { Command } from 'commander'
import { createConvertCommand } from './commands/convert'
import { createIdentityCommand } from './commands/identity'
import { createInspectCommand } from './commands/inspect'

export function createProgram(): Command {
  return new Command('heappack')
    .description('Inspect and convert serialization packets')
    .version('0.1.0')
    .addCommand(createIdentityCommand())
    .addCommand(createInspectCommand())
    .addCommand(createConvertCommand())
}
