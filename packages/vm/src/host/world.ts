import type { WorldModel } from '@nipvm/types'

/**
 * In-memory world model: numbered fields plus the current input verb.
 * Unset fields read as 0.
 */
export class MapWorldModel implements WorldModel {
  private readonly fields: Map<number, number>

  constructor(
    fields: Iterable<readonly [number, number]> = [],
    private verb = 0,
  ) {
    this.fields = new Map(fields)
  }

  readField(ref: number): number {
    return this.fields.get(ref) ?? 0
  }

  writeField(ref: number, value: number): void {
    this.fields.set(ref, value)
  }

  currentVerb(): number {
    return this.verb
  }

  setVerb(verb: number): void {
    this.verb = verb
  }
}
