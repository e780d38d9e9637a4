/**
 * Message File Format Constants
 *
 * 512-byte pages, a 2-byte page header, then 85 chunks of 6 bytes, each chunk
 * packing 8 six-bit symbols MSB-first (2 + 85 * 6 = 512).
 */

import type { MessageFileFormat } from '@nipvm/types'

export const MESSAGE_FILE_FORMAT: Readonly<MessageFileFormat> = {
  pageSize: 512,
  pageHeaderSize: 2,
  pageHeaderFill: 0xe5,
  chunkWidth: 6,
  chunkSymbols: 8,
  chunksPerPage: 85,
}

export const SYMBOL_CONFIG = {
  BITS: 6,
  MASK: 0x3f,
  COUNT: 64,
  /** Largest value a two-symbol operand can carry */
  MAX_OPERAND: 0xfff,
} as const

/**
 * Symbol values with a fixed meaning in the instruction stream
 */
export const CONTROL_SYMBOLS = {
  SPACE: 26,
  JUMP: 27,
  JUMP_IF_FALSE: 28,
  CASE: 29,
  ACTION: 30,
  TEST: 31,
  EDIT: 32,
  END: 33,
  DELIMITER: 34,
  TEST_REF: 44,
  EDIT_REF: 45,
  ACTION_REF: 46,
  CALL: 47,
  DIGIT_ZERO: 52,
} as const

/**
 * Characters the interpreter treats as control operations
 */
export const CONTROL_CHARS = {
  JUMP: '^',
  JUMP_IF_FALSE: '|',
  CASE: '*',
  ACTION: '(',
  ACTION_REF: '+',
  TEST: '$',
  TEST_REF: '&',
  EDIT: '%',
  EDIT_REF: '=',
  CALL: '\\',
  END: '@',
} as const

export type ControlChar = (typeof CONTROL_CHARS)[keyof typeof CONTROL_CHARS]

/** Decoded value of unassigned symbols; never emitted */
export const FILLER_CHAR = '\0'

/**
 * Validate that a format's chunks fit in its pages
 */
export function validateFormat(format: MessageFileFormat): boolean {
  return (
    format.chunkWidth * 8 === format.chunkSymbols * SYMBOL_CONFIG.BITS &&
    format.pageHeaderSize + format.chunksPerPage * format.chunkWidth <=
      format.pageSize
  )
}
