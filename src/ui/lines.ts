/**
 * Incremental newline splitter for byte chunks read from a growing file.
 *
 * Partial trailing data is held until its newline arrives, so a line that is
 * still being written is never handed out half-finished.
 */
export class LineSplitter {
  private decoder = new TextDecoder()
  private buffer = ""

  public push(chunk: Uint8Array | string): string[] {
    this.buffer += typeof chunk === "string" ? chunk : this.decoder.decode(chunk, { stream: true })

    const lines: string[] = []
    while (true) {
      const idx = this.buffer.indexOf("\n")
      if (idx === -1) break
      const line = this.buffer.slice(0, idx)
      this.buffer = this.buffer.slice(idx + 1)
      lines.push(stripCarriageReturn(line))
    }
    return lines
  }

  public get pending(): string {
    return this.buffer
  }

  /** Returns whatever is held without a newline and empties the splitter. */
  public flush(): string | null {
    this.buffer += this.decoder.decode()
    const rest = this.buffer
    this.buffer = ""
    return rest.length > 0 ? stripCarriageReturn(rest) : null
  }

  public reset(): void {
    this.decoder = new TextDecoder()
    this.buffer = ""
  }
}

export async function* readLinesFromStream(
  stream: AsyncIterable<Uint8Array | string> | null
): AsyncGenerator<string> {
  if (!stream) return

  const splitter = new LineSplitter()
  for await (const chunk of stream) {
    yield* splitter.push(chunk)
  }

  const rest = splitter.flush()
  if (rest !== null) yield rest
}

function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line
}
