/**
 * Message VM Types
 *
 * Types shared by the interpreter, its control instructions and the opcode
 * host that performs per-opcode effects.
 */

import type { EndReason, VMAnomalyKind } from './errors'

export type OpcodeCategory = 'action' | 'test' | 'edit'

/**
 * Decoded opcode invocation
 * `code` is the absolute operation number (symbol + category base)
 */
export interface Opcode {
  category: OpcodeCategory
  code: number
  hasReference: boolean
  /** 12-bit reference operand, 0 when absent */
  reference: number
}

export type CaseKind = 'random' | 'by_word' | 'by_synonym' | 'by_reference'

export type InterpreterStatus = 'running' | 'awaiting_call' | 'ended'

/**
 * Saved cursor position
 * `kind` distinguishes subroutine calls from the implicit frame pushed when a
 * case entry matches (resumes after the case block).
 */
export interface CallFrame {
  kind: 'call' | 'case'
  base: number
  offset: number
  declaredLength: number
}

export interface CursorSnapshot {
  base: number
  offset: number
  declaredLength: number
}

export interface Anomaly {
  kind: VMAnomalyKind
  /** Message base (record address) active when the anomaly occurred */
  base: number
  /** Symbol offset within that message */
  position: number
  detail: string
}

export interface ExecutionResult {
  reason: EndReason
  /** Dispatch iterations performed */
  steps: number
  /** Call-stack depth when execution stopped */
  callDepth: number
  /** Characters handed to the output sink */
  emitted: number
  anomalies: Anomaly[]
}

/**
 * Handle given to opcode effects so they can steer the output stage
 */
export interface InterpreterControl {
  /** Upper-case the next emitted letter */
  capitalizeNext(): void
  clearCapitalize(): void
  setTextSuppressed(suppressed: boolean): void
  readonly textSuppressed: boolean
  readonly testFlag: boolean
}

/**
 * External collaborator performing opcode effects and answering case queries
 */
export interface OpcodeHost {
  emit(character: string): void
  invokeAction(
    code: number,
    hasRef: boolean,
    refValue: number,
    control: InterpreterControl,
  ): void
  invokeTest(
    code: number,
    hasRef: boolean,
    refValue: number,
    control: InterpreterControl,
  ): boolean
  invokeEdit(
    code: number,
    hasRef: boolean,
    refValue: number,
    control: InterpreterControl,
  ): void
  resolveCaseReference(refCode: number): number
  currentVerbCode(): number
  randomInt(bound: number): number
}

/** Generic field access into the game world model */
export interface WorldModel {
  readField(ref: number): number
  writeField(ref: number, value: number): void
  currentVerb(): number
}

export interface OutputSink {
  write(character: string): void
  newline(): void
}

/** Returns an integer in [0, bound) */
export type RandomSource = (bound: number) => number

export type OutputCase = 'as-is' | 'upper'

export interface InterpreterOptions {
  /** Dispatch iterations allowed per executeMessage call */
  maxSteps?: number
  maxCallDepth?: number
  outputCase?: OutputCase
  /** Initial text suppression state */
  suppressText?: boolean
}

export interface ExecuteOptions {
  /** Cooperative cancellation, checked once per dispatch iteration */
  signal?: AbortSignal
}
