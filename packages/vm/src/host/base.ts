import type {
  InterpreterControl,
  OpcodeCategory,
  OutputSink,
  RandomSource,
  WorldModel,
} from '@nipvm/types'

/**
 * Scratch state shared by the handlers of one registry
 */
export interface OpcodeHostState {
  /** Value loaded by `asg` and compared by the relational tests */
  accumulator: number
}

export interface OpcodeHandlerContext {
  code: number
  hasReference: boolean
  reference: number
  control: InterpreterControl
  world: WorldModel
  output: OutputSink
  random: RandomSource
  state: OpcodeHostState
}

/**
 * Base abstract class for all opcode handlers
 *
 * Handlers are registered under their category and absolute operation
 * number and perform the effect of one operation.
 */
export abstract class BaseOpcodeHandler {
  abstract readonly category: OpcodeCategory

  /** Absolute operation number (symbol + category base) */
  abstract readonly code: number

  abstract readonly name: string

  /**
   * Perform the operation
   * @returns the predicate result for tests; ignored for actions and edits
   */
  abstract execute(context: OpcodeHandlerContext): boolean
}
