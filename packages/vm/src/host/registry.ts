import type {
  InterpreterControl,
  OpcodeCategory,
  OpcodeHost,
  OutputSink,
  RandomSource,
  WorldModel,
} from '@nipvm/types'
import { logger } from '@nipvm/core'
import { operationName } from '../operations'
import type { BaseOpcodeHandler, OpcodeHostState } from './base'
import { AsgOpcodeHandler, DecrOpcodeHandler, IncrOpcodeHandler } from './handlers/arithmetic'
import {
  EqOpcodeHandler,
  LeqOpcodeHandler,
  LessOpcodeHandler,
  RandOpcodeHandler,
} from './handlers/comparison'
import {
  CapOpcodeHandler,
  ForceOpcodeHandler,
  SpkOpcodeHandler,
} from './handlers/output'
import { TextOutput } from './output'
import { createRandomSource } from './random'
import { MapWorldModel } from './world'

export interface OpcodeRegistryOptions {
  world?: WorldModel
  output?: OutputSink
  random?: RandomSource
  /** Register the generic built-in handlers (default true) */
  builtins?: boolean
}

/**
 * Registry of opcode handlers
 *
 * The OpcodeHost the interpreter talks to: maps (category, operation) to a
 * registered handler and gives handlers the world model, output sink and
 * random source. Operations without a handler are logged no-ops; unhandled
 * tests answer false.
 */
export class OpcodeRegistry implements OpcodeHost {
  readonly world: WorldModel
  readonly output: OutputSink
  readonly random: RandomSource
  readonly state: OpcodeHostState = { accumulator: 0 }

  private readonly handlers = new Map<string, BaseOpcodeHandler>()

  constructor(options: OpcodeRegistryOptions = {}) {
    this.world = options.world ?? new MapWorldModel()
    this.output = options.output ?? new TextOutput()
    this.random = options.random ?? createRandomSource()
    if (options.builtins ?? true) {
      this.registerBuiltins()
    }
  }

  private registerBuiltins(): void {
    // Field arithmetic
    this.register(new AsgOpcodeHandler())
    this.register(new IncrOpcodeHandler())
    this.register(new DecrOpcodeHandler())

    // Tests
    this.register(new LessOpcodeHandler())
    this.register(new EqOpcodeHandler())
    this.register(new LeqOpcodeHandler())
    this.register(new RandOpcodeHandler())

    // Output control
    this.register(new CapOpcodeHandler())
    this.register(new ForceOpcodeHandler())
    this.register(new SpkOpcodeHandler())
  }

  register(handler: BaseOpcodeHandler): void {
    this.handlers.set(this.key(handler.category, handler.code), handler)
  }

  get(category: OpcodeCategory, code: number): BaseOpcodeHandler | undefined {
    return this.handlers.get(this.key(category, code))
  }

  emit(character: string): void {
    this.output.write(character)
  }

  invokeAction(
    code: number,
    hasRef: boolean,
    refValue: number,
    control: InterpreterControl,
  ): void {
    this.dispatch('action', code, hasRef, refValue, control)
  }

  invokeTest(
    code: number,
    hasRef: boolean,
    refValue: number,
    control: InterpreterControl,
  ): boolean {
    return this.dispatch('test', code, hasRef, refValue, control)
  }

  invokeEdit(
    code: number,
    hasRef: boolean,
    refValue: number,
    control: InterpreterControl,
  ): void {
    this.dispatch('edit', code, hasRef, refValue, control)
  }

  resolveCaseReference(refCode: number): number {
    return this.world.readField(refCode)
  }

  currentVerbCode(): number {
    return this.world.currentVerb()
  }

  randomInt(bound: number): number {
    return this.random(bound)
  }

  private dispatch(
    category: OpcodeCategory,
    code: number,
    hasReference: boolean,
    reference: number,
    control: InterpreterControl,
  ): boolean {
    const handler = this.get(category, code)
    if (!handler) {
      logger.debug('OpcodeRegistry: no handler, ignoring', {
        category,
        code,
        operation: operationName(code),
      })
      return false
    }
    return handler.execute({
      code,
      hasReference,
      reference,
      control,
      world: this.world,
      output: this.output,
      random: this.random,
      state: this.state,
    })
  }

  private key(category: OpcodeCategory, code: number): string {
    return `${category}:${code}`
  }
}
