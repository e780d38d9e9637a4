/**
 * Message VM Configuration Constants
 */

import type { VmEnv } from '@nipvm/core'
import type {
  CaseKind,
  InterpreterOptions,
  OpcodeCategory,
} from '@nipvm/types'

export const INTERPRETER_CONFIG = {
  /** Dispatch iterations per executeMessage before the watchdog trips */
  MAX_STEPS: 5000,
  MAX_CALL_DEPTH: 32,
  /** Symbols in a message header (informational length) */
  HEADER_SYMBOLS: 2,
} as const

export const STORE_CONFIG = {
  /** Pages held by the cache before least-recently-used eviction */
  DEFAULT_CAPACITY: 200,
} as const

/**
 * Operation number = symbol + category base
 */
export const OPCODE_BASES: Record<OpcodeCategory, number> = {
  action: 50,
  test: 87,
  edit: 135,
}

/** Size of the operation table; codes at or above are unknown */
export const NUM_OPERATIONS = 166

/**
 * Operation numbers used by the generic built-in handlers
 */
export const OPERATIONS = {
  ASG: 83,
  LESS: 87,
  EQ: 88,
  LEQ: 89,
  INCR: 90,
  DECR: 91,
  RAND: 123,
  CAP: 161,
  FORCE: 163,
  SPK: 164,
} as const

/** Case kind tags as stored in the stream */
export const CASE_KINDS: readonly CaseKind[] = [
  'random',
  'by_word',
  'by_synonym',
  'by_reference',
]

export function caseKindTag(kind: CaseKind): number {
  return CASE_KINDS.indexOf(kind)
}

export const DEFAULT_INTERPRETER_OPTIONS: Required<InterpreterOptions> = {
  maxSteps: INTERPRETER_CONFIG.MAX_STEPS,
  maxCallDepth: INTERPRETER_CONFIG.MAX_CALL_DEPTH,
  outputCase: 'as-is',
  suppressText: false,
}

/**
 * Map validated environment settings onto interpreter options
 */
export function resolveInterpreterOptions(
  env: Pick<VmEnv, 'NIPVM_MAX_STEPS' | 'NIPVM_MAX_CALL_DEPTH' | 'NIPVM_OUTPUT_CASE'>,
  overrides: InterpreterOptions = {},
): Required<InterpreterOptions> {
  return {
    maxSteps: overrides.maxSteps ?? env.NIPVM_MAX_STEPS,
    maxCallDepth: overrides.maxCallDepth ?? env.NIPVM_MAX_CALL_DEPTH,
    outputCase: overrides.outputCase ?? env.NIPVM_OUTPUT_CASE,
    suppressText:
      overrides.suppressText ?? DEFAULT_INTERPRETER_OPTIONS.suppressText,
  }
}
