import type { CallFrame } from '@nipvm/types'
import { INTERPRETER_CONFIG } from './config'

/**
 * Bounded call stack
 *
 * Holds the frames for subroutine calls and matched case entries. Depth
 * never goes negative and never exceeds `maxDepth`; a push on a full stack
 * is refused.
 */
export class MessageCallStack {
  public frames: CallFrame[] = []

  constructor(readonly maxDepth: number = INTERPRETER_CONFIG.MAX_CALL_DEPTH) {}

  /**
   * @returns false when the stack is full and the frame was not pushed
   */
  pushFrame(frame: CallFrame): boolean {
    if (this.isFull()) return false
    this.frames.push(frame)
    return true
  }

  popFrame(): CallFrame | undefined {
    return this.frames.pop()
  }

  getCurrentFrame(): CallFrame | undefined {
    return this.frames[this.frames.length - 1]
  }

  isFull(): boolean {
    return this.frames.length >= this.maxDepth
  }

  getDepth(): number {
    return this.frames.length
  }

  clear(): void {
    this.frames = []
  }
}
