/**
 * Incremental line splitter for relaying an upstream SSE body. Bytes are
 * decoded as a UTF-8 stream so multi-byte characters split across chunks stay
 * intact. Lines end at `\n`, `\r\n` or a lone `\r` and are returned without
 * their terminator.
 */
export class LineSplitter {
  private readonly decoder = new TextDecoder()
  private buffer = ''

  push(chunk: Uint8Array): string[] {
    this.buffer += this.decoder.decode(chunk, { stream: true })
    return this.drain(false)
  }

  /** Returns whatever is left once the upstream has ended. */
  flush(): string[] {
    this.buffer += this.decoder.decode()
    const lines = this.drain(true)
    if (this.buffer.length > 0) {
      lines.push(this.buffer)
      this.buffer = ''
    }
    return lines
  }

  private drain(final: boolean): string[] {
    const lines: string[] = []
    let start = 0
    for (let index = 0; index < this.buffer.length; index += 1) {
      const char = this.buffer[index]
      if (char === '\n') {
        lines.push(this.buffer.slice(start, index))
        start = index + 1
      } else if (char === '\r') {
        // A trailing `\r` may be the first half of a `\r\n` split across chunks.
        if (index === this.buffer.length - 1 && !final) break
        lines.push(this.buffer.slice(start, index))
        if (this.buffer[index + 1] === '\n') index += 1
        start = index + 1
      }
    }
    this.buffer = this.buffer.slice(start)
    return lines
  }
}
