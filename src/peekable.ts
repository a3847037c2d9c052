/**
 * Iterator wrapper with one element of lookahead.
 */
export class PeekableIterator<T> {
  private readonly source: Iterator<T>
  private buffered: IteratorResult<T> | undefined

  constructor(iterable: Iterable<T>) {
    this.source = iterable[Symbol.iterator]()
  }

  /**
   * Returns the next result without consuming it.
   */
  peek(): IteratorResult<T> {
    if (this.buffered === undefined) {
      this.buffered = this.source.next()
    }
    return this.buffered
  }

  next(): IteratorResult<T> {
    const result = this.peek()
    if (!result.done) this.buffered = undefined
    return result
  }

  get done(): boolean {
    return this.peek().done === true
  }
}
