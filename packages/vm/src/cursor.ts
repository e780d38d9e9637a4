import { getNip, SYMBOL_CONFIG, type SymbolCodec, symbolCodec } from '@nipvm/codec'
import type { ChunkData, CursorSnapshot, Nip } from '@nipvm/types'
import { INTERPRETER_CONFIG } from './config'
import type { PagedMessageStore } from './message-store'

/**
 * Message Cursor
 *
 * A position (base record, symbol offset) within an unbounded message
 * stream. Offset n reads record `base + floor(n / chunkSymbols)`, symbol
 * `n mod chunkSymbols`, so chunk and page boundaries are crossed
 * transparently. Messages end at EndSym in the stream; the header length is
 * informational only.
 */
export class MessageCursor {
  base = 0
  offset = 0
  declaredLength = 0

  private chunk: ChunkData
  private chunkRecord = -1

  constructor(
    private readonly store: PagedMessageStore,
    private readonly codec: SymbolCodec = symbolCodec,
  ) {
    this.chunk = new Uint8Array(store.format.chunkWidth)
  }

  get position(): number {
    return this.offset
  }

  get recordIndex(): number {
    return this.base + Math.floor(this.offset / this.store.format.chunkSymbols)
  }

  get pageNumber(): number {
    return Math.floor(this.recordIndex / this.store.format.chunksPerPage)
  }

  get symbolInChunk(): number {
    return this.offset % this.store.format.chunkSymbols
  }

  /**
   * Reset to the start of the message at `address` and consume its header
   */
  open(address: number): void {
    this.base = address
    this.offset = 0
    this.locate()
    let length = 0
    for (let i = 0; i < INTERPRETER_CONFIG.HEADER_SYMBOLS; i++) {
      length = (length << SYMBOL_CONFIG.BITS) | this.nextSymbol()
    }
    this.declaredLength = length
  }

  nextSymbol(): Nip {
    this.locate()
    const nip = getNip(this.chunk, this.symbolInChunk)
    this.offset++
    return nip
  }

  nextCharacter(): string {
    return this.codec.decode(this.nextSymbol())
  }

  /**
   * Two symbols as a 12-bit big-endian value
   */
  readOperand(): number {
    const hi = this.nextSymbol()
    const lo = this.nextSymbol()
    return (hi << SYMBOL_CONFIG.BITS) | lo
  }

  /**
   * Move by `delta` symbols
   * @returns true when the target was negative and clamped to 0
   */
  jumpRelative(delta: number): boolean {
    return this.jumpAbsolute(this.offset + delta)
  }

  /**
   * Move to an offset from the message base
   * @returns true when the target was negative and clamped to 0
   */
  jumpAbsolute(position: number): boolean {
    const clamped = position < 0
    this.offset = clamped ? 0 : Math.trunc(position)
    this.locate()
    return clamped
  }

  snapshot(): CursorSnapshot {
    return {
      base: this.base,
      offset: this.offset,
      declaredLength: this.declaredLength,
    }
  }

  restore(snapshot: CursorSnapshot): void {
    this.base = snapshot.base
    this.offset = snapshot.offset
    this.declaredLength = snapshot.declaredLength
    this.locate()
  }

  private locate(): void {
    const record = this.recordIndex
    if (record !== this.chunkRecord) {
      this.chunk = this.store.readChunk(record)
      this.chunkRecord = record
    }
  }
}
