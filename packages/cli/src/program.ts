import { Command } from 'commander'
import { createDisasmCommand } from './commands/disasm'
import { createDumpCommand } from './commands/dump'
import { createRunCommand } from './commands/run'

export function createProgram(): Command {
  return new Command('nipvm')
    .description('Run and inspect message procedures in a paged message file')
    .version('0.1.0')
    .addCommand(createRunCommand())
    .addCommand(createDisasmCommand())
    .addCommand(createDumpCommand())
}
