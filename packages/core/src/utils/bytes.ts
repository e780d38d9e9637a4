import { bytesToHex, type Hex } from 'viem'

/**
 * Hex dump of a byte range, 16 bytes per line, prefixed with the offset
 */
export function hexDump(bytes: Uint8Array, baseOffset = 0): string[] {
  const lines: string[] = []
  for (let i = 0; i < bytes.length; i += 16) {
    const row = bytes.subarray(i, Math.min(i + 16, bytes.length))
    const cells = Array.from(row, (b) => b.toString(16).padStart(2, '0'))
    lines.push(
      `${(baseOffset + i).toString(16).padStart(6, '0')}  ${cells.join(' ')}`,
    )
  }
  return lines
}

export function toHex(bytes: Uint8Array): Hex {
  return bytesToHex(bytes)
}

/**
 * Copy `source` into a new array of exactly `length` bytes, zero-filling
 * any shortfall
 */
export function zeroPad(source: Uint8Array, length: number): Uint8Array {
  const out = new Uint8Array(length)
  out.set(source.subarray(0, length))
  return out
}
