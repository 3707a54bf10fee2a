import { describe, it, expect, afterEach, beforeEach } from 'vitest'
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { FileSink, createMemorySink } from './sinks'

describe('sinks', () => {
  let dir = ''

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'vbus-sink-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('collects text in memory', () => {
    const sink = createMemorySink()
    sink.write('a\n')
    sink.write('b\n')
    expect(sink.text()).toBe('a\nb\n')
  })

  it('creates the file on first write only', () => {
    const path = join(dir, 'out.csv')
    const sink = new FileSink(path)
    expect(existsSync(path)).toBe(false)

    sink.write('header\n')
    sink.write('row\n')
    expect(sink.opened).toBe(true)
    sink.close()

    expect(readFileSync(path, 'utf8')).toBe('header\nrow\n')
  })

  it('appends when asked', () => {
    const path = join(dir, 'out.csv')
    writeFileSync(path, 'header\n')

    const sink = new FileSink(path, { append: true })
    sink.write('row\n')
    sink.close()

    expect(readFileSync(path, 'utf8')).toBe('header\nrow\n')
  })
})
