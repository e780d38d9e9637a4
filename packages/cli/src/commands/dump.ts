import { hexDump, logger, toHex } from '@nipvm/core'
import { MessageDisassembler } from '@nipvm/vm'
import { Command } from 'commander'
import { openMessageStore } from '../utils/store'
import { parseAddress, parseNonNegativeInt, parsePositiveInt } from '../utils/validation'

export interface DumpOptions {
  start: number
  count: number
  page?: boolean
}

export function createDumpCommand(): Command {
  return new Command('dump')
    .description('Dump the raw symbols of a message')
    .argument('<file>', 'Message file')
    .argument('<address>', 'Record address of the message', parseAddress)
    .option('--start <offset>', 'First symbol offset (0 = header)', parseNonNegativeInt, 0)
    .option('--count <count>', 'Number of symbols', parsePositiveInt, 64)
    .option('--page', 'Also hex dump the page holding the message start')
    .action((file: string, address: number, options: DumpOptions) => {
      process.exitCode = executeDumpCommand(file, address, options)
    })
}

export function executeDumpCommand(
  file: string,
  address: number,
  options: DumpOptions,
  write: (text: string) => void = (text) => process.stdout.write(text),
): number {
  const [error, opened] = openMessageStore(file)
  if (error) {
    logger.error('Failed to open message file', error)
    return 1
  }

  const { store, source } = opened
  try {
    const [dumpError, entries] = new MessageDisassembler(store).dumpSymbols(
      address,
      options.start,
      options.count,
    )
    if (dumpError) {
      logger.error('Dump failed', dumpError)
      return 1
    }

    if (options.page) {
      const pageNumber = Math.floor(address / store.format.chunksPerPage)
      const page = store.getPage(pageNumber)
      for (const line of hexDump(page.data, pageNumber * store.format.pageSize)) {
        write(`${line}\n`)
      }
    }

    let record = -1
    for (const entry of entries) {
      if (entry.record !== record) {
        record = entry.record
        write(`record ${record}  ${toHex(store.readChunk(record))}\n`)
      }
      write(
        `${String(entry.position).padStart(5)}  ${String(entry.symbol).padStart(2)}  ${JSON.stringify(entry.character)}\n`,
      )
    }
    return 0
  } finally {
    source.close()
  }
}
