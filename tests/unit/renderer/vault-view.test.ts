import { describe, it, expect } from 'vitest'
import { HINT, maskPayload, renderVaultView } from '../../../src/renderer/views/vault-view'
import { panel, sideBySide } from '../../../src/renderer/components/panel'
import { fit, paint } from '../../../src/renderer/components/style'
import type { Entry } from '../../../src/renderer/api/vault-api'

function entry(account: string): Entry {
  return { account, password: { kind: 'encrypted', payload: `bm9uY2U=:${account}` } }
}

const baseState = {
  entries: [] as Entry[],
  selected: 0,
  inputMode: 'normal' as const,
  accountInput: '',
  passwordInput: '',
  feedback: null
}

describe('style helpers', () => {
  it('should pad, centre and truncate by code points', () => {
    expect(fit('ab', 5)).toBe('ab   ')
    expect(fit('ab', 5, 'center')).toBe(' ab  ')
    expect(fit('abcdef', 3)).toBe('abc')
    expect(fit('🔑🔑', 3)).toBe('🔑🔑 ')
  })

  it('should only emit escape sequences when colour is on', () => {
    expect(paint('x', { fg: 'red', bold: true }, false)).toBe('x')
    expect(paint('x', { fg: 'red', bold: true }, true)).toBe('\u001b[1;31mx\u001b[0m')
    expect(paint('x', {}, true)).toBe('x')
  })
})

describe('panel', () => {
  it('should draw a titled box', () => {
    expect(panel([{ text: 'hello' }], { title: 'Box', width: 11, color: false })).toEqual([
      '┌Box──────┐',
      '│hello    │',
      '└─────────┘'
    ])
  })

  it('should pad to a fixed height', () => {
    expect(panel([], { title: 'T', width: 4, height: 2, color: false })).toEqual(['┌T─┐', '│  │', '│  │', '└──┘'])
  })

  it('should join blocks of different heights', () => {
    expect(sideBySide(['ab'], 2, ['x', 'y'])).toEqual(['abx', '  y'])
  })
})

describe('maskPayload', () => {
  it('should clamp between 1 and 32 asterisks', () => {
    expect(maskPayload('')).toBe('*')
    expect(maskPayload('abcd')).toBe('****')
    expect(maskPayload('x'.repeat(100))).toBe('*'.repeat(32))
  })
})

describe('renderVaultView', () => {
  it('should render the normal screen with the selected entry', () => {
    const lines = renderVaultView(
      { ...baseState, entries: [entry('gmail'), entry('bank')] },
      { width: 80 }
    )

    expect(lines).toHaveLength(20)
    expect(lines[0]).toBe('┌Password Manager - Status' + '─'.repeat(53) + '┐')
    expect(lines[1]).toBe('│' + 'Total entries: 2 | Mode: Normal'.padEnd(78) + '│')
    expect(lines[4]).toBe('│' + fit(HINT, 78, 'center') + '│')
    expect(lines[6]).toBe('┌Accounts' + '─'.repeat(22) + '┐' + '┌Account Details' + '─'.repeat(31) + '┐')
    expect(lines[7]).toBe('│' + '>> gmail'.padEnd(30) + '│' + '│' + 'Account: gmail'.padEnd(46) + '│')
    expect(lines[8]).toBe('│' + '   bank'.padEnd(30) + '│' + '│' + ' '.repeat(46) + '│')
    expect(lines[9]).toBe(
      '│' + ' '.repeat(30) + '│' + '│' + `Encrypted password (hidden): ${'*'.repeat(14)}`.padEnd(46) + '│'
    )
    expect(lines[15]).toBe('│' + '[Navigate] Up/Down arrows'.padEnd(78) + '│')
  })

  it('should show the empty-list hint in the details panel', () => {
    const lines = renderVaultView(baseState, { width: 80 })

    expect(lines[7]).toBe('│' + ' '.repeat(30) + '│' + '│' + 'No entries yet.'.padEnd(46) + '│')
    expect(lines[8]).toBe('│' + ' '.repeat(30) + '│' + '│' + "Press 'a' to add a new account.".padEnd(46) + '│')
  })

  it('should centre feedback in the notification panel', () => {
    const lines = renderVaultView(
      { ...baseState, entries: [entry('gmail')], feedback: { text: 'Password for gmail: s3cr3t', kind: 'info' } },
      { width: 80 }
    )

    expect(lines[4]).toBe('│' + ' '.repeat(26) + 'Password for gmail: s3cr3t' + ' '.repeat(26) + '│')
  })

  it('should scroll the list to keep the selection visible', () => {
    const entries = ['a', 'b', 'c', 'd', 'e'].map(entry)
    const lines = renderVaultView({ ...baseState, entries, selected: 4 }, { width: 80, listRows: 2 })

    expect(lines[7].slice(0, 32)).toBe('│' + '   d'.padEnd(30) + '│')
    expect(lines[8].slice(0, 32)).toBe('│' + '>> e'.padEnd(30) + '│')
  })

  it('should replace the list with the input popup while adding', () => {
    const lines = renderVaultView(
      { ...baseState, inputMode: 'editing_account', accountInput: 'gma' },
      { width: 80 }
    )
    const margin = ' '.repeat(16)

    expect(lines).toHaveLength(15)
    expect(lines[1]).toBe('│' + 'Total entries: 0 | Mode: Input Account'.padEnd(78) + '│')
    expect(lines[6]).toBe(margin + '┌New Entry - Account' + '─'.repeat(27) + '┐')
    expect(lines[7]).toBe(margin + '│' + ' '.repeat(21) + 'gma' + ' '.repeat(22) + '│')
    expect(lines[8]).toBe(margin + '│' + ' '.repeat(16) + 'Characters: 3' + ' '.repeat(17) + '│')
    expect(lines[11]).toBe('│' + 'Type the account name.'.padEnd(78) + '│')
  })

  it('should colour the status text when colour is on', () => {
    const lines = renderVaultView(baseState, { width: 80, color: true })

    expect(lines[1]).toBe('│\u001b[37m' + 'Total entries: 0 | Mode: Normal'.padEnd(78) + '\u001b[0m│')
  })
})
