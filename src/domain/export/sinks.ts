/**
 * Output sinks. The serializer only ever calls `write`; where the bytes go
 * is the caller's decision.
 */
import { closeSync, openSync, writeSync } from 'node:fs'

export interface RowSink {
  /** Must throw when the text could not be written */
  write(chunk: string): void
}

export interface MemorySink extends RowSink {
  text(): string
}

export function createMemorySink(): MemorySink {
  const chunks: string[] = []
  return {
    write: (chunk) => {
      chunks.push(chunk)
    },
    text: () => chunks.join(''),
  }
}

/**
 * UTF-8 file sink. The file is created (or truncated, unless appending) on
 * the first write, so a device pair with no rows leaves no file behind.
 */
export class FileSink implements RowSink {
  readonly path: string
  private readonly append: boolean
  private fd: number | null = null

  constructor(path: string, options: { append?: boolean } = {}) {
    this.path = path
    this.append = options.append ?? false
  }

  get opened(): boolean {
    return this.fd !== null
  }

  write(chunk: string): void {
    if (this.fd === null) {
      this.fd = openSync(this.path, this.append ? 'a' : 'w')
    }
    writeSync(this.fd, chunk, null, 'utf8')
  }

  close(): void {
    if (this.fd === null) return
    closeSync(this.fd)
    this.fd = null
  }
}
