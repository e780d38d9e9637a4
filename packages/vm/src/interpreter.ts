/**
 * Message Interpreter
 *
 * Fetch/decode/dispatch loop over a message stream. Ordinary characters go
 * through the output stage to the host; control characters dispatch to the
 * control instruction registry; EndSym either returns from the innermost
 * frame or ends the message. Every anomaly is recovered locally, and the only
 * forced termination is the iteration watchdog (or cancellation).
 */

import { CONTROL_CHARS, FILLER_CHAR } from '@nipvm/codec'
import { logger } from '@nipvm/core'
import type {
  Anomaly,
  CursorSnapshot,
  EndReason,
  ExecuteOptions,
  ExecutionResult,
  InterpreterControl,
  InterpreterOptions,
  InterpreterStatus,
  OpcodeHost,
  VMAnomalyKind,
} from '@nipvm/types'
import { END_REASONS } from '@nipvm/types'
import { MessageCallStack } from './call-stack'
import { DEFAULT_INTERPRETER_OPTIONS } from './config'
import { MessageCursor } from './cursor'
import type { InstructionContext } from './instructions/base'
import { ControlInstructionRegistry } from './instructions/registry'
import type { PagedMessageStore } from './message-store'

const LETTER = /^[a-z]$/

export class MessageInterpreter {
  readonly options: Required<InterpreterOptions>
  readonly control: InterpreterControl

  private readonly cursor: MessageCursor
  private readonly callStack: MessageCallStack
  private readonly registry = new ControlInstructionRegistry()
  private readonly context: InstructionContext

  private readonly state: {
    status: InterpreterStatus
    testFlag: boolean
    textSuppressed: boolean
    capitalizeNext: boolean
    endReason: EndReason
  }
  private anomalies: Anomaly[] = []
  private emitted = 0

  constructor(
    private readonly store: PagedMessageStore,
    private readonly host: OpcodeHost,
    options: InterpreterOptions = {},
  ) {
    this.options = {
      maxSteps: options.maxSteps ?? DEFAULT_INTERPRETER_OPTIONS.maxSteps,
      maxCallDepth:
        options.maxCallDepth ?? DEFAULT_INTERPRETER_OPTIONS.maxCallDepth,
      outputCase: options.outputCase ?? DEFAULT_INTERPRETER_OPTIONS.outputCase,
      suppressText:
        options.suppressText ?? DEFAULT_INTERPRETER_OPTIONS.suppressText,
    }
    this.cursor = new MessageCursor(store)
    this.callStack = new MessageCallStack(this.options.maxCallDepth)
    this.state = {
      status: 'ended',
      testFlag: false,
      textSuppressed: this.options.suppressText,
      capitalizeNext: false,
      endReason: END_REASONS.INVALID_ADDRESS,
    }

    const state = this.state
    this.control = {
      capitalizeNext: () => {
        state.capitalizeNext = true
      },
      clearCapitalize: () => {
        state.capitalizeNext = false
      },
      setTextSuppressed: (suppressed: boolean) => {
        state.textSuppressed = suppressed
      },
      get textSuppressed() {
        return state.textSuppressed
      },
      get testFlag() {
        return state.testFlag
      },
    }

    this.context = {
      cursor: this.cursor,
      callStack: this.callStack,
      host: this.host,
      control: this.control,
      setTestFlag: (value) => {
        state.testFlag = value
      },
      setStatus: (status) => {
        state.status = status
      },
      isValidAddress: (address) => this.isValidAddress(address),
      recordAnomaly: (kind, detail) => this.recordAnomaly(kind, detail),
      log: (message, data) => {
        logger.debug(`MessageInterpreter: ${message}`, data)
      },
    }
  }

  get status(): InterpreterStatus {
    return this.state.status
  }

  get testFlag(): boolean {
    return this.state.testFlag
  }

  get callDepth(): number {
    return this.callStack.getDepth()
  }

  get position(): CursorSnapshot {
    return this.cursor.snapshot()
  }

  isValidAddress(address: number): boolean {
    return this.store.isValidAddress(address)
  }

  /**
   * Position at the start of a message and reset per-message state
   * @returns false when the address holds no message (status ends at once)
   */
  openMessage(address: number): boolean {
    this.callStack.clear()
    this.anomalies = []
    this.emitted = 0
    this.state.capitalizeNext = false
    this.state.textSuppressed = this.options.suppressText

    if (!this.isValidAddress(address)) {
      logger.warn('MessageInterpreter: no message at address', { address })
      this.end(END_REASONS.INVALID_ADDRESS)
      return false
    }

    this.cursor.open(address)
    this.state.status = 'running'
    logger.debug('MessageInterpreter: opened message', {
      address,
      declaredLength: this.cursor.declaredLength,
    })
    return true
  }

  /**
   * Run until the message ends, the watchdog trips or `signal` aborts
   */
  executeMessage(options: ExecuteOptions = {}): ExecutionResult {
    const { signal } = options
    let steps = 0

    while (this.state.status !== 'ended') {
      if (signal?.aborted) {
        logger.info('MessageInterpreter: execution cancelled', {
          ...this.cursor.snapshot(),
        })
        this.end(END_REASONS.CANCELLED)
        break
      }
      if (steps >= this.options.maxSteps) {
        logger.warn('MessageInterpreter: iteration limit reached, ending message', {
          maxSteps: this.options.maxSteps,
          ...this.cursor.snapshot(),
        })
        this.end(END_REASONS.RUNAWAY)
        break
      }
      steps++
      this.step()
    }

    return {
      reason: this.state.endReason,
      steps,
      callDepth: this.callStack.getDepth(),
      emitted: this.emitted,
      anomalies: [...this.anomalies],
    }
  }

  /**
   * Open and execute in one call
   */
  displayMessage(address: number, options: ExecuteOptions = {}): ExecutionResult {
    this.openMessage(address)
    return this.executeMessage(options)
  }

  private step(): void {
    const character = this.cursor.nextCharacter()

    if (character === CONTROL_CHARS.END) {
      this.endOrReturn()
      return
    }

    const handler = this.registry.getHandler(character)
    if (handler) {
      const result = handler.execute(this.context)
      if (result.endReason !== null) {
        this.end(result.endReason)
      }
      return
    }

    this.output(character)
  }

  private endOrReturn(): void {
    const frame = this.callStack.popFrame()
    if (!frame) {
      this.end(END_REASONS.END_OF_MESSAGE)
      return
    }
    logger.debug('MessageInterpreter: return', {
      kind: frame.kind,
      base: frame.base,
      offset: frame.offset,
      depth: this.callStack.getDepth(),
    })
    this.cursor.restore(frame)
  }

  private output(character: string): void {
    if (character === FILLER_CHAR || this.state.textSuppressed) return

    let text = character
    if (this.state.capitalizeNext) {
      if (LETTER.test(text)) text = text.toUpperCase()
      this.state.capitalizeNext = false
    }
    if (this.options.outputCase === 'upper') {
      text = text.toUpperCase()
    }
    this.host.emit(text)
    this.emitted++
  }

  private end(reason: EndReason): void {
    this.state.status = 'ended'
    this.state.endReason = reason
  }

  private recordAnomaly(kind: VMAnomalyKind, detail: string): void {
    const anomaly: Anomaly = {
      kind,
      base: this.cursor.base,
      position: this.cursor.offset,
      detail,
    }
    this.anomalies.push(anomaly)
    logger.warn(`MessageInterpreter: ${detail}`, {
      kind,
      base: anomaly.base,
      position: anomaly.position,
    })
  }
}
