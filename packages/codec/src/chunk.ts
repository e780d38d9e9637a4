/**
 * 6-bit Chunk Packing
 *
 * A chunk is 6 bytes holding 8 symbols, most significant bits first:
 * symbol 0 is the top six bits of byte 0. The 48 bits split into two 24-bit
 * groups of four symbols each, which keeps the arithmetic in 32-bit range.
 */

import type { ChunkData, Nip } from '@nipvm/types'
import { MESSAGE_FILE_FORMAT, SYMBOL_CONFIG } from './config'

const SYMBOLS_PER_GROUP = 4
const BYTES_PER_GROUP = 3

function checkIndex(index: number): void {
  if (
    !Number.isInteger(index) ||
    index < 0 ||
    index >= MESSAGE_FILE_FORMAT.chunkSymbols
  ) {
    throw new RangeError(`Symbol index ${index} outside chunk`)
  }
}

function readGroup(chunk: ChunkData, group: number): number {
  const at = group * BYTES_PER_GROUP
  return (chunk[at] << 16) | (chunk[at + 1] << 8) | chunk[at + 2]
}

function writeGroup(chunk: ChunkData, group: number, value: number): void {
  const at = group * BYTES_PER_GROUP
  chunk[at] = (value >>> 16) & 0xff
  chunk[at + 1] = (value >>> 8) & 0xff
  chunk[at + 2] = value & 0xff
}

function shiftFor(index: number): number {
  return 18 - (index % SYMBOLS_PER_GROUP) * SYMBOL_CONFIG.BITS
}

export function getNip(chunk: ChunkData, index: number): Nip {
  checkIndex(index)
  const group = readGroup(chunk, Math.floor(index / SYMBOLS_PER_GROUP))
  return (group >>> shiftFor(index)) & SYMBOL_CONFIG.MASK
}

export function setNip(chunk: ChunkData, index: number, nip: Nip): void {
  checkIndex(index)
  if (!Number.isInteger(nip) || nip < 0 || nip > SYMBOL_CONFIG.MASK) {
    throw new RangeError(`Symbol value ${nip} is not 6-bit`)
  }
  const groupIndex = Math.floor(index / SYMBOLS_PER_GROUP)
  const shift = shiftFor(index)
  const group = readGroup(chunk, groupIndex)
  const cleared = group & ~(SYMBOL_CONFIG.MASK << shift)
  writeGroup(chunk, groupIndex, cleared | (nip << shift))
}

/**
 * Pack up to 8 symbols into a fresh chunk; missing trailing symbols are 0
 */
export function packChunk(nips: readonly Nip[]): ChunkData {
  if (nips.length > MESSAGE_FILE_FORMAT.chunkSymbols) {
    throw new RangeError(`${nips.length} symbols do not fit in one chunk`)
  }
  const chunk = new Uint8Array(MESSAGE_FILE_FORMAT.chunkWidth)
  nips.forEach((nip, i) => setNip(chunk, i, nip))
  return chunk
}

export function unpackChunk(chunk: ChunkData): Nip[] {
  const nips: Nip[] = []
  for (let i = 0; i < MESSAGE_FILE_FORMAT.chunkSymbols; i++) {
    nips.push(getNip(chunk, i))
  }
  return nips
}
