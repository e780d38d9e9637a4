import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { MessageFileBuilder } from '@nipvm/codec'
import { MessageAssembler, OPERATIONS } from '@nipvm/vm'
import { InvalidArgumentError } from 'commander'
import { afterAll, beforeAll, describe, expect, it } from 'vitest'
import { executeDisasmCommand } from '../commands/disasm'
import { executeDumpCommand } from '../commands/dump'
import { createRunCommand, executeRunCommand } from '../commands/run'
import { createProgram } from '../program'
import {
  isValidPath,
  parseAddress,
  parseNonNegativeInt,
  parsePositiveInt,
} from '../utils/validation'

function capture(): { write: (text: string) => void; text: () => string } {
  const parts: string[] = []
  return { write: (text) => parts.push(text), text: () => parts.join('') }
}

describe('CLI Arguments', () => {
  describe('Validation Functions', () => {
    it('should validate paths correctly', () => {
      expect(isValidPath('/valid/path')).toBe(true)
      expect(isValidPath('relative/path')).toBe(true)
      expect(isValidPath('')).toBe(false)
      expect(isValidPath('path<with>invalid|chars')).toBe(false)
    })

    it('should parse integers and reject junk', () => {
      expect(parseNonNegativeInt('0')).toBe(0)
      expect(parsePositiveInt('12')).toBe(12)
      expect(() => parsePositiveInt('0')).toThrow(InvalidArgumentError)
      expect(() => parseNonNegativeInt('-1')).toThrow(InvalidArgumentError)
      expect(() => parseNonNegativeInt('1.5')).toThrow(InvalidArgumentError)
    })

    it('should accept only non-null 12-bit addresses', () => {
      expect(parseAddress('1')).toBe(1)
      expect(parseAddress('4095')).toBe(4095)
      expect(() => parseAddress('0')).toThrow(InvalidArgumentError)
      expect(() => parseAddress('4096')).toThrow(InvalidArgumentError)
    })
  })

  describe('Commands', () => {
    it('should register run, disasm and dump', () => {
      const names = createProgram().commands.map((command) => command.name())
      expect(names).toEqual(['run', 'disasm', 'dump'])
    })

    it('should expose the run options', () => {
      const options = createRunCommand().options.map((option) => option.long)
      expect(options).toEqual(['--verb', '--seed', '--max-steps', '--upper'])
    })
  })

  describe('Execution', () => {
    let dir: string
    let file: string
    let loopAddress: number

    beforeAll(() => {
      dir = mkdtempSync(join(tmpdir(), 'nipvm-cli-'))
      file = join(dir, 'messages.dat')
      const builder = new MessageFileBuilder()
      builder.addMessage(
        new MessageAssembler()
          .edit(OPERATIONS.CAP)
          .text('you see ')
          .caseBlock('by_word', [
            { value: 2, body: new MessageAssembler().text('a door').end() },
            { value: 0, body: new MessageAssembler().text('nothing').end() },
          ])
          .text('.')
          .end()
          .toSymbols(),
      )
      loopAddress = builder.addMessage(
        new MessageAssembler().text('loop').toSymbols(),
      )
      writeFileSync(file, builder.build())
    })

    afterAll(() => {
      rmSync(dir, { recursive: true, force: true })
    })

    it('should print the text of a message', () => {
      const out = capture()
      const code = executeRunCommand(file, 1, { verb: 2 }, out.write)

      expect(code).toBe(0)
      expect(out.text()).toBe('You see a door.\n')
    })

    it('should fall through to the wildcard entry in upper case', () => {
      const out = capture()
      executeRunCommand(file, 1, { verb: 7, upper: true }, out.write)

      expect(out.text()).toBe('YOU SEE NOTHING.\n')
    })

    it('should fail when the watchdog stops a message', () => {
      const out = capture()
      const code = executeRunCommand(
        file,
        loopAddress,
        { verb: 0, maxSteps: 3 },
        out.write,
      )

      expect(code).toBe(1)
      expect(out.text()).toBe('loo\n')
    })

    it('should fail for a missing file', () => {
      const out = capture()
      const code = executeRunCommand(
        join(dir, 'absent.dat'),
        1,
        { verb: 0 },
        out.write,
      )

      expect(code).toBe(1)
      expect(out.text()).toBe('')
    })

    it('should list a message', () => {
      const out = capture()
      const code = executeDisasmCommand(
        file,
        loopAddress,
        { maxSymbols: 2 },
        out.write,
      )

      expect(code).toBe(0)
      expect(out.text()).toBe(
        '    0  HEADER length=4\n    2  TEXT "lo"\n    4  TRUNCATED\n',
      )
    })

    it('should dump symbols grouped by record', () => {
      const out = capture()
      const code = executeDumpCommand(
        file,
        loopAddress,
        { start: 2, count: 2 },
        out.write,
      )

      expect(code).toBe(0)
      expect(out.text().split('\n')).toEqual([
        expect.stringMatching(new RegExp(`^record ${loopAddress} {2}0x[0-9a-f]{12}$`)),
        '    2  25  "l"',
        '    3  20  "o"',
        '',
      ])
    })
  })
})
