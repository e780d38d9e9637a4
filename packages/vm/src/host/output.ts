import type { OutputSink } from '@nipvm/types'

/**
 * Output sink collecting emitted text, optionally forwarding each piece
 */
export class TextOutput implements OutputSink {
  private buffer = ''

  constructor(private readonly writer?: (text: string) => void) {}

  get text(): string {
    return this.buffer
  }

  write(character: string): void {
    this.buffer += character
    this.writer?.(character)
  }

  newline(): void {
    this.write('\n')
  }

  clear(): void {
    this.buffer = ''
  }
}
