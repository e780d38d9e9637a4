import { logger } from '@nipvm/core'
import {
  createRandomSource,
  MapWorldModel,
  MessageInterpreter,
  OpcodeRegistry,
  resolveInterpreterOptions,
  TextOutput,
} from '@nipvm/vm'
import { Command } from 'commander'
import { openMessageStore } from '../utils/store'
import { parseAddress, parseNonNegativeInt, parsePositiveInt } from '../utils/validation'

export interface RunOptions {
  verb: number
  seed?: string
  maxSteps?: number
  upper?: boolean
}

export function createRunCommand(): Command {
  const command = new Command('run')
    .description('Execute a message and print the text it produces')
    .argument('<file>', 'Message file')
    .argument('<address>', 'Record address of the message', parseAddress)
    .option('--verb <code>', 'Current input verb code', parseNonNegativeInt, 0)
    .option('--seed <seed>', 'Seed for random case selection and rolls')
    .option(
      '--max-steps <count>',
      'Dispatch iterations before the message is stopped',
      parsePositiveInt,
    )
    .option('--upper', 'Print all output in upper case')
    .action((file: string, address: number, options: RunOptions) => {
      process.exitCode = executeRunCommand(file, address, options)
    })

  return command
}

/**
 * @returns process exit code
 */
export function executeRunCommand(
  file: string,
  address: number,
  options: RunOptions,
  write: (text: string) => void = (text) => process.stdout.write(text),
): number {
  const [error, opened] = openMessageStore(file)
  if (error) {
    logger.error('Failed to open message file', error)
    return 1
  }

  const { env, source, store } = opened
  try {
    const host = new OpcodeRegistry({
      world: new MapWorldModel([], options.verb),
      output: new TextOutput(write),
      random: createRandomSource(options.seed),
    })
    const interpreter = new MessageInterpreter(
      store,
      host,
      resolveInterpreterOptions(env, {
        maxSteps: options.maxSteps,
        outputCase: options.upper ? 'upper' : undefined,
      }),
    )

    const result = interpreter.displayMessage(address)
    write('\n')

    logger.debug('Run finished', { ...result, cache: store.stats })
    if (result.reason !== 'end_of_message') {
      logger.error(`Message ${address} ended abnormally: ${result.reason}`)
      return 1
    }
    return 0
  } finally {
    source.close()
  }
}
