/**
 * Symbol Codec
 *
 * Bidirectional mapping between 6-bit symbols and characters. Letters are
 * scattered over symbols 0-25 by the permutation (j * 7) mod 26; the other
 * slots hold space, punctuation, control markers and digits.
 */

import type { Nip } from '@nipvm/types'
import { CONTROL_CHARS, CONTROL_SYMBOLS, FILLER_CHAR, SYMBOL_CONFIG } from './config'

const PUNCTUATION: ReadonlyArray<readonly [Nip, string]> = [
  [CONTROL_SYMBOLS.SPACE, ' '],
  [CONTROL_SYMBOLS.JUMP, CONTROL_CHARS.JUMP],
  [CONTROL_SYMBOLS.JUMP_IF_FALSE, CONTROL_CHARS.JUMP_IF_FALSE],
  [CONTROL_SYMBOLS.CASE, CONTROL_CHARS.CASE],
  [CONTROL_SYMBOLS.ACTION, CONTROL_CHARS.ACTION],
  [CONTROL_SYMBOLS.TEST, CONTROL_CHARS.TEST],
  [CONTROL_SYMBOLS.EDIT, CONTROL_CHARS.EDIT],
  [CONTROL_SYMBOLS.END, CONTROL_CHARS.END],
  [CONTROL_SYMBOLS.DELIMITER, '#'],
  [35, '.'],
  [36, ','],
  [37, '-'],
  [38, '?'],
  [39, '"'],
  [40, ';'],
  [41, "'"],
  [42, '!'],
  [43, ':'],
  [CONTROL_SYMBOLS.TEST_REF, CONTROL_CHARS.TEST_REF],
  [CONTROL_SYMBOLS.EDIT_REF, CONTROL_CHARS.EDIT_REF],
  [CONTROL_SYMBOLS.ACTION_REF, CONTROL_CHARS.ACTION_REF],
  [CONTROL_SYMBOLS.CALL, CONTROL_CHARS.CALL],
]

const ASCII_RANGE = 128

/** Symbol carrying letter index j (0 = 'a') */
export function letterSymbol(j: number): Nip {
  return (j * 7) % 26
}

export class SymbolCodec {
  private readonly forward: string[]
  private readonly reverse: Uint8Array

  constructor() {
    this.forward = new Array<string>(SYMBOL_CONFIG.COUNT).fill(FILLER_CHAR)

    for (let j = 0; j < 26; j++) {
      this.forward[letterSymbol(j)] = String.fromCharCode(0x61 + j)
    }
    for (const [nip, ch] of PUNCTUATION) {
      this.forward[nip] = ch
    }
    for (let d = 0; d < 10; d++) {
      this.forward[CONTROL_SYMBOLS.DIGIT_ZERO + d] = String.fromCharCode(
        0x30 + d,
      )
    }

    this.reverse = new Uint8Array(ASCII_RANGE).fill(CONTROL_SYMBOLS.END)
    this.forward.forEach((ch, nip) => {
      if (ch !== FILLER_CHAR) {
        this.reverse[ch.charCodeAt(0)] = nip
      }
    })
    for (let j = 0; j < 26; j++) {
      this.reverse[0x41 + j] = letterSymbol(j)
    }
  }

  /**
   * Character for a symbol; out-of-range values decode to EndSym
   */
  decode(nip: Nip): string {
    if (!Number.isInteger(nip) || nip < 0 || nip >= SYMBOL_CONFIG.COUNT) {
      return CONTROL_CHARS.END
    }
    return this.forward[nip]
  }

  /**
   * Symbol for the first character of `char`; anything unmapped encodes to
   * EndSym, upper-case letters share the lower-case symbols
   */
  encode(char: string): Nip {
    const code = char.charCodeAt(0)
    if (Number.isNaN(code) || code >= ASCII_RANGE) {
      return CONTROL_SYMBOLS.END
    }
    return this.reverse[code]
  }

  /** True when the symbol has a printable or control character assigned */
  isAssigned(nip: Nip): boolean {
    return this.decode(nip) !== FILLER_CHAR
  }

  encodeText(text: string): Nip[] {
    return Array.from(text, (ch) => this.encode(ch))
  }

  decodeSymbols(nips: readonly Nip[]): string {
    return nips.map((nip) => this.decode(nip)).join('')
  }
}

export const symbolCodec = new SymbolCodec()
