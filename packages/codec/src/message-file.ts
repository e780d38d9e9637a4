/**
 * Message File Builder
 *
 * Lays messages out as chunk records and renders the paged byte image the
 * message store reads. Record 0 is never allocated: address 0 is the null
 * message address.
 */

import type { ChunkData, MessageFileFormat, Nip } from '@nipvm/types'
import { packChunk } from './chunk'
import { MESSAGE_FILE_FORMAT, SYMBOL_CONFIG, validateFormat } from './config'

export interface PlaceMessageOptions {
  /** Value stored in the two-symbol header; defaults to the content length */
  declaredLength?: number
}

/**
 * Split a 12-bit value into its two big-endian symbols
 */
export function operandSymbols(value: number): [Nip, Nip] {
  if (!Number.isInteger(value) || value < 0 || value > SYMBOL_CONFIG.MAX_OPERAND) {
    throw new RangeError(`Operand ${value} does not fit in 12 bits`)
  }
  return [value >> SYMBOL_CONFIG.BITS, value & SYMBOL_CONFIG.MASK]
}

export class MessageFileBuilder {
  private readonly records = new Map<number, ChunkData>()
  private nextRecord = 1

  constructor(
    private readonly format: MessageFileFormat = MESSAGE_FILE_FORMAT,
  ) {
    if (
      !validateFormat(format) ||
      format.chunkSymbols !== MESSAGE_FILE_FORMAT.chunkSymbols
    ) {
      throw new RangeError('Unsupported message file geometry')
    }
  }

  /** Number of chunk records needed for a message of `contentLength` symbols */
  recordsFor(contentLength: number): number {
    return Math.ceil((contentLength + 2) / this.format.chunkSymbols)
  }

  /**
   * Reserve records for a message placed later (forward calls)
   * @returns the reserved address
   */
  reserve(contentLength: number): number {
    const address = this.nextRecord
    this.nextRecord += this.recordsFor(contentLength)
    return address
  }

  /**
   * Append a message at the next free record
   * @returns the message address
   */
  addMessage(content: readonly Nip[], options: PlaceMessageOptions = {}): number {
    const address = this.reserve(content.length)
    this.placeMessage(address, content, options)
    return address
  }

  placeMessage(
    address: number,
    content: readonly Nip[],
    options: PlaceMessageOptions = {},
  ): void {
    if (!Number.isInteger(address) || address < 1) {
      throw new RangeError(`Cannot place a message at address ${address}`)
    }
    const declared =
      options.declaredLength ?? Math.min(content.length, SYMBOL_CONFIG.MAX_OPERAND)
    const stream = [...operandSymbols(declared), ...content]

    for (let i = 0; i < stream.length; i += this.format.chunkSymbols) {
      const record = address + i / this.format.chunkSymbols
      this.records.set(
        record,
        packChunk(stream.slice(i, i + this.format.chunkSymbols)),
      )
    }
    this.nextRecord = Math.max(
      this.nextRecord,
      address + this.recordsFor(content.length),
    )
  }

  get recordCount(): number {
    return this.nextRecord
  }

  /**
   * Render whole pages covering every allocated record
   */
  build(): Uint8Array {
    const { pageSize, pageHeaderSize, pageHeaderFill, chunkWidth, chunksPerPage } =
      this.format
    const pageCount = Math.ceil(this.nextRecord / chunksPerPage)
    const image = new Uint8Array(pageCount * pageSize)

    for (let page = 0; page < pageCount; page++) {
      image.fill(pageHeaderFill, page * pageSize, page * pageSize + pageHeaderSize)
    }
    for (const [record, chunk] of this.records) {
      const page = Math.floor(record / chunksPerPage)
      const offset =
        page * pageSize + pageHeaderSize + (record % chunksPerPage) * chunkWidth
      image.set(chunk, offset)
    }
    return image
  }
}
