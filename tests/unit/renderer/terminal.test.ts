import { describe, it, expect, vi } from 'vitest'
import { PassThrough, Writable } from 'stream'
import { TerminalApp } from '../../../src/renderer/terminal'
import { createVaultStore } from '../../../src/renderer/store/vault.store'
import type { Entry, VaultApi } from '../../../src/renderer/api/vault-api'

const RESTORE = '\u001b[?25h\u001b[?1049l'

function createStreams(isTTY = true) {
  const input = Object.assign(new PassThrough(), { isTTY, setRawMode: vi.fn() })
  let written = ''
  const sink = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      written += String(chunk)
      callback()
    }
  })
  const output = Object.assign(sink, { columns: 80, rows: 24 })
  return { input, output, written: () => written }
}

function createApi(revealPassword: VaultApi['revealPassword']): VaultApi {
  const entries: Entry[] = [{ account: 'gmail', password: { kind: 'encrypted', payload: 'bm9uY2U=:ZGF0YQ==' } }]
  return {
    listEntries: () => entries,
    addEntry: () => ({ success: true, data: undefined }),
    revealPassword
  }
}

describe('TerminalApp', () => {
  it('should refuse to start without an interactive terminal', () => {
    const streams = createStreams(false)
    const app = new TerminalApp(createVaultStore(createApi(() => ({ success: true, data: '' }))), streams)

    expect(() => app.run()).toThrow('Passvault needs an interactive terminal (stdin is not a TTY).')
  })

  it('should restore the terminal and resolve when the operator quits', async () => {
    const streams = createStreams()
    const app = new TerminalApp(createVaultStore(createApi(() => ({ success: true, data: '' }))), streams)

    const running = app.run()
    streams.input.write('q')
    await running

    expect(streams.input.setRawMode.mock.calls).toEqual([[true], [false]])
    expect(streams.written().endsWith(RESTORE)).toBe(true)
  })

  it('should restore the terminal and reject when a key handler throws', async () => {
    const streams = createStreams()
    const store = createVaultStore(
      createApi(() => {
        throw new TypeError('reveal exploded')
      })
    )
    const app = new TerminalApp(store, streams)

    const running = app.run()
    streams.input.write('v')

    await expect(running).rejects.toThrow('reveal exploded')
    expect(streams.input.setRawMode.mock.calls).toEqual([[true], [false]])
    expect(streams.written().endsWith(RESTORE)).toBe(true)
    expect(streams.input.listenerCount('keypress')).toBe(0)
  })
})
