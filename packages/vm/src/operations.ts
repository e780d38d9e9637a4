/**
 * Operation table
 *
 * Opcode symbols are category-relative: the operation number is the symbol
 * plus the category base. The table names every operation number for logs
 * and disassembly.
 */

import type { Nip, Opcode, OpcodeCategory } from '@nipvm/types'
import { NUM_OPERATIONS, OPCODE_BASES } from './config'
import operationNames from './data/operations.json'

const CODES_BY_NAME = new Map<string, number>(
  operationNames.map((name, code): [string, number] => [name, code]),
)

export function isKnownOperation(code: number): boolean {
  return Number.isInteger(code) && code >= 0 && code < NUM_OPERATIONS
}

export function operationName(code: number): string {
  return isKnownOperation(code) ? operationNames[code] : `unknown(${code})`
}

export function operationCode(name: string): number | undefined {
  return CODES_BY_NAME.get(name)
}

export function decodeOpcode(
  category: OpcodeCategory,
  nip: Nip,
  reference?: number,
): Opcode {
  return {
    category,
    code: nip + OPCODE_BASES[category],
    hasReference: reference !== undefined,
    reference: reference ?? 0,
  }
}

/**
 * Symbol that selects `code` within `category`, or undefined when the
 * category cannot reach it
 */
export function opcodeSymbol(
  category: OpcodeCategory,
  code: number,
): Nip | undefined {
  const nip = code - OPCODE_BASES[category]
  return nip >= 0 && nip < 64 ? nip : undefined
}
