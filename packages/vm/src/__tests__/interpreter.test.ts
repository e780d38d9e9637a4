import {
  CONTROL_SYMBOLS,
  MessageFileBuilder,
  symbolCodec,
} from '@nipvm/codec'
import type { InterpreterOptions } from '@nipvm/types'
import { describe, expect, it } from 'vitest'
import { MessageAssembler } from '../assembler'
import { BufferByteSource } from '../byte-source'
import { OPERATIONS } from '../config'
import { MessageInterpreter } from '../interpreter'
import { PagedMessageStore } from '../message-store'
import { RecordingHost, storeWith } from './test-utils'

const asm = () => new MessageAssembler()

function run(
  messages: readonly MessageAssembler[],
  options: InterpreterOptions = {},
  host = new RecordingHost(),
) {
  const { store, addresses } = storeWith(messages)
  const vm = new MessageInterpreter(store, host, options)
  const result = vm.displayMessage(addresses[addresses.length - 1])
  return { vm, host, result, addresses }
}

describe('MessageInterpreter', () => {
  describe('text and termination', () => {
    it('should emit HI and end with an empty call stack', () => {
      const builder = new MessageFileBuilder()
      const address = builder.addMessage(symbolCodec.encodeText('HI@'), {
        declaredLength: 0,
      })
      const store = new PagedMessageStore(new BufferByteSource(builder.build()))
      const host = new RecordingHost()
      const vm = new MessageInterpreter(store, host, { outputCase: 'upper' })

      expect(vm.openMessage(address)).toBe(true)
      expect(vm.status).toBe('running')
      const result = vm.executeMessage()

      expect(host.emits).toEqual(['H', 'I'])
      expect(vm.status).toBe('ended')
      expect(result).toEqual({
        reason: 'end_of_message',
        steps: 3,
        callDepth: 0,
        emitted: 2,
        anomalies: [],
      })
    })

    it('should emit letters as stored by default', () => {
      const { host } = run([asm().text('Hi there.').end()])
      expect(host.output).toBe('hi there.')
    })

    it('should skip unassigned filler symbols', () => {
      const { host, result } = run([asm().text('a').raw(48).text('b').end()])
      expect(host.output).toBe('ab')
      expect(result.emitted).toBe(2)
    })

    it('should end at once for the null address', () => {
      const { store } = storeWith([asm().text('x').end()])
      const vm = new MessageInterpreter(store, new RecordingHost())

      expect(vm.openMessage(0)).toBe(false)
      expect(vm.status).toBe('ended')
      expect(vm.executeMessage()).toMatchObject({
        reason: 'invalid_address',
        steps: 0,
        emitted: 0,
      })
    })

    it('should reject an address past the end of the file', () => {
      const { store } = storeWith([asm().text('x').end()])
      const vm = new MessageInterpreter(store, new RecordingHost())

      expect(vm.displayMessage(85).reason).toBe('invalid_address')
    })
  })

  describe('jumps', () => {
    it('should jump over inline content', () => {
      const { host } = run([
        asm().text('a').jumpOver(asm().text('bc')).text('d').end(),
      ])
      expect(host.output).toBe('ad')
    })

    it('should run a guarded block only when the test passes', () => {
      const message = asm()
        .test(OPERATIONS.EQ)
        .ifTrue(asm().text('yes'))
        .text('!')
        .end()

      const passing = new RecordingHost()
      passing.testResults.set(OPERATIONS.EQ, true)
      const taken = run([message], {}, passing)
      const skipped = run([message])

      expect(taken.host.output).toBe('yes!')
      expect(taken.vm.testFlag).toBe(true)
      expect(skipped.host.output).toBe('!')
      expect(skipped.vm.testFlag).toBe(false)
    })

    it('should carry the test flag into the next message', () => {
      const { store, addresses } = storeWith([
        asm().test(OPERATIONS.EQ).end(),
        asm().ifTrue(asm().text('kept')).text('.').end(),
      ])
      const host = new RecordingHost()
      host.testResults.set(OPERATIONS.EQ, true)
      const vm = new MessageInterpreter(store, host)

      vm.displayMessage(addresses[0])
      expect(vm.openMessage(addresses[1])).toBe(true)
      expect(vm.testFlag).toBe(true)
      vm.executeMessage()

      expect(host.output).toBe('kept.')
    })

    it('should take exactly one branch of an if/else', () => {
      const message = asm()
        .test(OPERATIONS.LESS, 3)
        .ifElse(asm().text('then'), asm().text('else'))
        .end()

      const passing = new RecordingHost()
      passing.testResults.set(OPERATIONS.LESS, true)

      expect(run([message], {}, passing).host.output).toBe('then')
      expect(run([message]).host.output).toBe('else')
    })
  })

  describe('opcodes', () => {
    it('should pass operation numbers and references to the host', () => {
      const { host } = run([
        asm().action(OPERATIONS.ASG, 7).edit(OPERATIONS.CAP).test(100).end(),
      ])

      expect(host.invocations).toEqual([
        { category: 'action', code: 83, hasRef: true, refValue: 7 },
        { category: 'edit', code: 161, hasRef: false, refValue: 0 },
        { category: 'test', code: 100, hasRef: false, refValue: 0 },
      ])
    })

    it('should ignore an operation outside the table and continue', () => {
      const { host, result } = run([
        asm().text('a').raw(CONTROL_SYMBOLS.EDIT, 40).text('b').end(),
      ])

      expect(host.invocations).toEqual([])
      expect(host.output).toBe('ab')
      expect(result.anomalies).toEqual([
        {
          kind: 'unknown_opcode',
          base: 1,
          position: 5,
          detail: 'EDIT: operation 175 outside the operation table',
        },
      ])
    })

    it('should leave the test flag alone on an unknown operation', () => {
      const host = new RecordingHost()
      host.testResults.set(OPERATIONS.EQ, true)
      const { vm, result } = run(
        [asm().test(OPERATIONS.EQ).raw(CONTROL_SYMBOLS.EDIT, 40).end()],
        {},
        host,
      )

      expect(result.anomalies.map((anomaly) => anomaly.kind)).toEqual([
        'unknown_opcode',
      ])
      expect(vm.testFlag).toBe(true)
    })
  })

  describe('calls', () => {
    it('should return to the symbol after the call operand', () => {
      const callee = asm().text('b').end()
      const { host, result } = run([
        callee,
        asm().text('a').call(1).text('c').end(),
      ])

      expect(host.output).toBe('abc')
      expect(result.callDepth).toBe(0)
      expect(result.reason).toBe('end_of_message')
    })

    it('should nest calls up to the maximum depth', () => {
      const { host, result } = run(
        [
          asm().text('c').end(),
          asm().text('b').call(1).end(),
          asm().text('a').call(2).text('x').end(),
        ],
        { maxCallDepth: 2 },
      )

      expect(host.output).toBe('abcx')
      expect(result.anomalies).toEqual([])
    })

    it('should ignore a call once the stack is full', () => {
      const { host, result } = run(
        [
          asm().text('c').end(),
          asm().text('b').call(1).end(),
          asm().text('a').call(2).text('x').end(),
        ],
        { maxCallDepth: 1 },
      )

      expect(host.output).toBe('abx')
      expect(result.callDepth).toBe(0)
      expect(result.anomalies.map((anomaly) => anomaly.kind)).toEqual([
        'call_stack_overflow',
      ])
    })

    it('should ignore a call to the null address', () => {
      const { host, result } = run([asm().text('a').call(0).text('b').end()])

      expect(host.output).toBe('ab')
      expect(result.anomalies.map((anomaly) => anomaly.kind)).toEqual([
        'invalid_call_target',
      ])
    })
  })

  describe('case dispatch', () => {
    const byWord = asm()
      .caseBlock('by_word', [
        { value: 3, body: asm().text('three').end() },
        { value: 5, body: asm().text('five').end() },
      ])
      .text('!')
      .end()

    it('should run the matching entry and resume after the block', () => {
      const host = new RecordingHost()
      host.verb = 5
      const { result } = run([byWord], {}, host)

      expect(host.output).toBe('five!')
      expect(result.callDepth).toBe(0)
      expect(result.reason).toBe('end_of_message')
    })

    it('should skip the whole block when nothing matches', () => {
      const host = new RecordingHost()
      host.verb = 9
      run([byWord], {}, host)

      expect(host.output).toBe('!')
    })

    it('should treat value 0 as a wildcard and take the first match', () => {
      const message = asm()
        .caseBlock('by_synonym', [
          { value: 0, body: asm().text('any').end() },
          { value: 5, body: asm().text('five').end() },
        ])
        .end()
      const host = new RecordingHost()
      host.verb = 5
      run([message], {}, host)

      expect(host.output).toBe('any')
    })

    it('should pick the entry at the random index', () => {
      const message = asm()
        .caseBlock('random', [
          { body: asm().text('a').end() },
          { body: asm().text('b').end() },
          { body: asm().text('c').end() },
        ])
        .text('.')
        .end()
      const host = new RecordingHost()
      host.randomValue = 1
      run([message], {}, host)

      expect(host.output).toBe('b.')
      expect(host.randomBounds).toEqual([3])
    })

    it('should match nothing in an empty random block', () => {
      const host = new RecordingHost()
      run([asm().caseBlock('random', []).text('z').end()], {}, host)

      expect(host.output).toBe('z')
      expect(host.randomBounds).toEqual([])
    })

    it('should compare against a resolved reference', () => {
      const message = asm()
        .caseBlock(
          'by_reference',
          [
            { value: 4, body: asm().text('four').end() },
            { value: 7, body: asm().text('seven').end() },
          ],
          12,
        )
        .end()
      const host = new RecordingHost()
      host.references.set(12, 7)
      run([message], {}, host)

      expect(host.output).toBe('seven')
    })

    it('should match only wildcards for an unknown kind', () => {
      const message = asm()
        .raw(CONTROL_SYMBOLS.CASE, 9, 1)
        .operand(5)
        .raw(0)
        .operand(2)
        .text('w')
        .end()
        .text('!')
        .end()
      const { host, result } = run([message])

      expect(host.output).toBe('w!')
      expect(result.anomalies.map((anomaly) => anomaly.kind)).toEqual([
        'unknown_case_kind',
      ])
    })

    it('should record an overrun when entries pass the block end', () => {
      const message = asm()
        .raw(CONTROL_SYMBOLS.CASE, 1, 1)
        .operand(0)
        .raw(3)
        .operand(1)
        .text('x')
        .text('!')
        .end()
      const host = new RecordingHost()
      host.verb = 5
      const { result } = run([message], {}, host)

      expect(host.output).toBe('!')
      expect(result.anomalies.map((anomaly) => anomaly.kind)).toEqual([
        'case_block_overrun',
      ])
    })

    it('should end the message at the body end when no frame fits', () => {
      const host = new RecordingHost()
      host.verb = 5
      const { result } = run([byWord], { maxCallDepth: 0 }, host)

      expect(host.output).toBe('five')
      expect(result.reason).toBe('end_of_message')
      expect(result.anomalies.map((anomaly) => anomaly.kind)).toEqual([
        'call_stack_overflow',
      ])
    })
  })

  describe('termination guards', () => {
    it('should stop an unterminated message at the iteration limit', () => {
      const { host, result } = run([asm().text('x')])

      expect(result.reason).toBe('runaway')
      expect(result.steps).toBe(5000)
      expect(result.emitted).toBe(5000)
      expect(host.output).toBe(`x${'a'.repeat(4999)}`)
    })

    it('should honour a configured step limit', () => {
      const { result } = run([asm().text('abcdef').end()], { maxSteps: 4 })

      expect(result.reason).toBe('runaway')
      expect(result.steps).toBe(4)
      expect(result.emitted).toBe(4)
    })

    it('should not start when already cancelled', () => {
      const { store } = storeWith([asm().text('abc').end()])
      const host = new RecordingHost()
      const vm = new MessageInterpreter(store, host)
      const controller = new AbortController()
      controller.abort()

      const result = vm.displayMessage(1, { signal: controller.signal })

      expect(result.reason).toBe('cancelled')
      expect(result.steps).toBe(0)
      expect(host.output).toBe('')
      expect(vm.status).toBe('ended')
    })

    it('should stop between iterations once cancelled', () => {
      const { store } = storeWith([asm().text('abc').end()])
      const host = new RecordingHost()
      const controller = new AbortController()
      host.onEmit = () => controller.abort()
      const vm = new MessageInterpreter(store, host)

      const result = vm.displayMessage(1, { signal: controller.signal })

      expect(result.reason).toBe('cancelled')
      expect(result.steps).toBe(1)
      expect(host.output).toBe('a')
    })
  })
})
