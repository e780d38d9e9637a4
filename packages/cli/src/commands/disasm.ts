import { logger } from '@nipvm/core'
import { MessageDisassembler } from '@nipvm/vm'
import { Command } from 'commander'
import { openMessageStore } from '../utils/store'
import { parseAddress, parsePositiveInt } from '../utils/validation'

export interface DisasmOptions {
  maxSymbols?: number
}

export function createDisasmCommand(): Command {
  return new Command('disasm')
    .description('List the text and control operations of a message')
    .argument('<file>', 'Message file')
    .argument('<address>', 'Record address of the message', parseAddress)
    .option(
      '--max-symbols <count>',
      'Symbols to examine before cutting the listing off',
      parsePositiveInt,
    )
    .action((file: string, address: number, options: DisasmOptions) => {
      process.exitCode = executeDisasmCommand(file, address, options)
    })
}

export function executeDisasmCommand(
  file: string,
  address: number,
  options: DisasmOptions,
  write: (text: string) => void = (text) => process.stdout.write(text),
): number {
  const [error, opened] = openMessageStore(file)
  if (error) {
    logger.error('Failed to open message file', error)
    return 1
  }

  try {
    const [listError, lines] = new MessageDisassembler(opened.store).disassemble(
      address,
      { maxSymbols: options.maxSymbols },
    )
    if (listError) {
      logger.error('Disassembly failed', listError)
      return 1
    }
    for (const line of lines) {
      write(`${String(line.position).padStart(5)}  ${line.text}\n`)
    }
    return 0
  } finally {
    opened.source.close()
  }
}
