/**
 * Message Disassembler
 *
 * Linear listing of one message: header, text runs, control operations with
 * decoded operands, and case entry headers. The walk follows the stream in
 * storage order without taking jumps, and stops at an EndSym outside any case
 * block.
 */

import {
  CONTROL_CHARS,
  FILLER_CHAR,
  type SymbolCodec,
  symbolCodec,
} from '@nipvm/codec'
import type { Nip, Safe } from '@nipvm/types'
import { safeError, safeResult } from '@nipvm/types'
import { MessageCursor } from './cursor'
import { readCaseEntryHeader } from './instructions/case-dispatch'
import { ControlInstructionRegistry } from './instructions/registry'
import type { PagedMessageStore } from './message-store'

export interface DisassemblyLine {
  /** Symbol offset from the message base (the header occupies 0 and 1) */
  position: number
  text: string
}

export interface SymbolDumpEntry {
  position: number
  record: number
  symbol: Nip
  character: string
}

export interface DisassembleOptions {
  /** Symbols examined before the listing is cut off */
  maxSymbols?: number
}

const DEFAULT_MAX_SYMBOLS = 4096

interface PendingCaseBlock {
  remaining: number
  nextEntry: number
}

export class MessageDisassembler {
  private readonly registry = new ControlInstructionRegistry()

  constructor(
    private readonly store: PagedMessageStore,
    private readonly codec: SymbolCodec = symbolCodec,
  ) {}

  disassemble(
    address: number,
    options: DisassembleOptions = {},
  ): Safe<DisassemblyLine[]> {
    if (!this.store.isValidAddress(address)) {
      return safeError(new RangeError(`No message at address ${address}`))
    }

    const cursor = new MessageCursor(this.store, this.codec)
    cursor.open(address)
    const lines: DisassemblyLine[] = [
      { position: 0, text: `HEADER length=${cursor.declaredLength}` },
    ]
    const cases: PendingCaseBlock[] = []
    const limit = cursor.offset + (options.maxSymbols ?? DEFAULT_MAX_SYMBOLS)

    let run = ''
    let runStart = 0
    const flush = (): void => {
      if (run.length > 0) {
        lines.push({ position: runStart, text: `TEXT ${JSON.stringify(run)}` })
        run = ''
      }
    }

    let ended = false
    while (cursor.offset < limit) {
      const pending = cases[cases.length - 1]
      if (pending && cursor.offset >= pending.nextEntry) {
        flush()
        if (pending.remaining === 0) {
          cases.pop()
          continue
        }
        const position = cursor.offset
        const entry = readCaseEntryHeader(cursor)
        pending.remaining--
        pending.nextEntry = entry.bodyPosition + entry.skip
        lines.push({
          position,
          text: `ENTRY value=${entry.value} skip=${entry.skip}`,
        })
        continue
      }

      const position = cursor.offset
      const character = cursor.nextCharacter()

      if (character === CONTROL_CHARS.END) {
        flush()
        lines.push({ position, text: 'END' })
        if (cases.length === 0) {
          ended = true
          break
        }
        continue
      }

      const handler = this.registry.getHandler(character)
      if (handler) {
        flush()
        const disassembly = handler.disassemble(cursor)
        lines.push({ position, text: disassembly.text })
        if (disassembly.caseEntries !== undefined) {
          cases.push({
            remaining: disassembly.caseEntries,
            nextEntry: cursor.offset,
          })
        }
        continue
      }

      if (character === FILLER_CHAR) continue
      if (run.length === 0) runStart = position
      run += character
    }

    flush()
    if (!ended) {
      lines.push({ position: cursor.offset, text: 'TRUNCATED' })
    }
    return safeResult(lines)
  }

  /**
   * Raw symbols of a message, counted from the message base
   */
  dumpSymbols(address: number, start: number, count: number): Safe<SymbolDumpEntry[]> {
    if (!this.store.isValidAddress(address)) {
      return safeError(new RangeError(`No message at address ${address}`))
    }
    const cursor = new MessageCursor(this.store, this.codec)
    cursor.open(address)
    cursor.jumpAbsolute(start)

    const entries: SymbolDumpEntry[] = []
    for (let i = 0; i < count; i++) {
      const position = cursor.offset
      const record = cursor.recordIndex
      const symbol = cursor.nextSymbol()
      entries.push({
        position,
        record,
        symbol,
        character: this.codec.decode(symbol),
      })
    }
    return safeResult(entries)
  }
}
