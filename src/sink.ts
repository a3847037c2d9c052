import { InspectOptions } from 'util'

/**
 * Formatting hints inherited by everything rendered into a sink, such as
 * whether to emit colors. Mirrors the matching `util.inspect` options.
 */
export type DisplayContext = Pick<
  InspectOptions,
  | 'colors'
  | 'compact'
  | 'breakLength'
  | 'depth'
  | 'maxArrayLength'
  | 'maxStringLength'
>

/**
 * Destination for rendered text. Any writable stream, including
 * `process.stdout`, satisfies this interface.
 */
export interface TextSink {
  write(text: string): unknown
  readonly context?: DisplayContext
}

/**
 * Sink that collects written text in memory.
 */
export class StringSink implements TextSink {
  private chunks: string[] = []

  constructor(readonly context?: DisplayContext) {}

  write(text: string): void {
    this.chunks.push(text)
  }

  toString(): string {
    return this.chunks.join('')
  }
}
