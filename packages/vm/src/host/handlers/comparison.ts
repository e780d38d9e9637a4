/**
 * Relational tests against the accumulator, and the percentage roll
 */

import { OPERATIONS } from '../../config'
import { BaseOpcodeHandler, type OpcodeHandlerContext } from '../base'

export class LessOpcodeHandler extends BaseOpcodeHandler {
  readonly category = 'test'
  readonly code = OPERATIONS.LESS
  readonly name = 'less'

  execute(context: OpcodeHandlerContext): boolean {
    return context.state.accumulator < context.reference
  }
}

export class EqOpcodeHandler extends BaseOpcodeHandler {
  readonly category = 'test'
  readonly code = OPERATIONS.EQ
  readonly name = 'eq'

  execute(context: OpcodeHandlerContext): boolean {
    return context.state.accumulator === context.reference
  }
}

export class LeqOpcodeHandler extends BaseOpcodeHandler {
  readonly category = 'test'
  readonly code = OPERATIONS.LEQ
  readonly name = 'leq'

  execute(context: OpcodeHandlerContext): boolean {
    return context.state.accumulator <= context.reference
  }
}

/** True with probability ref percent */
export class RandOpcodeHandler extends BaseOpcodeHandler {
  readonly category = 'test'
  readonly code = OPERATIONS.RAND
  readonly name = 'rand'

  execute(context: OpcodeHandlerContext): boolean {
    return context.random(100) < context.reference
  }
}
