/**
 * Validation and parsing for CLI arguments
 */

import { SYMBOL_CONFIG } from '@nipvm/codec'
import { InvalidArgumentError } from 'commander'

/**
 * Validates if a string is a usable file path
 */
export function isValidPath(path: string): boolean {
  if (!path || typeof path !== 'string') {
    return false
  }

  return path.length > 0 && !/[<>"|?*]/.test(path)
}

function parseInteger(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Not an integer.')
  }
  return Number.parseInt(value, 10)
}

export function parseNonNegativeInt(value: string): number {
  return parseInteger(value)
}

export function parsePositiveInt(value: string): number {
  const parsed = parseInteger(value)
  if (parsed < 1) {
    throw new InvalidArgumentError('Must be at least 1.')
  }
  return parsed
}

/**
 * Message address: a non-null record index that fits a call operand
 */
export function parseAddress(value: string): number {
  const parsed = parseInteger(value)
  if (parsed < 1 || parsed > SYMBOL_CONFIG.MAX_OPERAND) {
    throw new InvalidArgumentError(
      `Address must be between 1 and ${SYMBOL_CONFIG.MAX_OPERAND}.`,
    )
  }
  return parsed
}
