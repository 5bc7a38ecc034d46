import { panel, sideBySide } from '../components/panel'
import type { StyledText, TextStyle } from '../components/style'
import type { Feedback, FeedbackKind, InputMode, VaultState } from '../store/vault.store'

export interface ViewOptions {
  /** Terminal width in columns. */
  width: number
  /** Inner rows of the account list and detail panels. */
  listRows?: number
  /** Emit ANSI colour sequences. */
  color?: boolean
}

type ViewState = Pick<
  VaultState,
  'entries' | 'selected' | 'inputMode' | 'accountInput' | 'passwordInput' | 'feedback'
>

const MIN_WIDTH = 40
const DEFAULT_LIST_ROWS = 6
const MAX_MASK_LENGTH = 32

export const HINT = "Use Up/Down to navigate, press 'a' to add an entry."

const MODE_LABELS: Record<InputMode, string> = {
  normal: 'Normal',
  editing_account: 'Input Account',
  editing_password: 'Input Password'
}

const INSTRUCTIONS: Record<InputMode, string[]> = {
  normal: ['[Navigate] Up/Down arrows', "[Add] 'a'", "[Show password] 'v'", "[Quit] 'q'"],
  editing_account: [
    'Type the account name.',
    'Enter to continue to the password.',
    'Esc to cancel the new entry.'
  ],
  editing_password: [
    'Type the password.',
    'Enter to save the entry.',
    'Esc to cancel the new entry.'
  ]
}

const FEEDBACK_COLORS: Record<FeedbackKind, TextStyle> = {
  info: { fg: 'cyan', bold: true },
  success: { fg: 'green', bold: true },
  error: { fg: 'red', bold: true }
}

/** Asterisks standing in for an encrypted payload, between 1 and 32 of them. */
export function maskPayload(payload: string): string {
  return '*'.repeat(Math.min(Math.max(payload.length, 1), MAX_MASK_LENGTH))
}

function feedbackLine(feedback: Feedback | null): StyledText {
  if (!feedback) {
    return { text: HINT, style: { fg: 'gray' }, align: 'center' }
  }
  return { text: feedback.text, style: FEEDBACK_COLORS[feedback.kind], align: 'center' }
}

/** First visible list row such that `selected` stays on screen. */
function scrollOffset(selected: number, total: number, rows: number): number {
  if (total <= rows) return 0
  return Math.min(Math.max(selected - rows + 1, 0), total - rows)
}

function accountList(state: ViewState, rows: number): StyledText[] {
  const offset = scrollOffset(state.selected, state.entries.length, rows)
  return state.entries.slice(offset, offset + rows).map((entry, i): StyledText => {
    const isSelected = offset + i === state.selected
    return isSelected
      ? { text: `>> ${entry.account}`, style: { fg: 'white', bg: 'blue', bold: true } }
      : { text: `   ${entry.account}`, style: { fg: 'white' } }
  })
}

function accountDetail(state: ViewState): StyledText[] {
  const entry = state.entries[state.selected]
  if (!entry) {
    return [{ text: 'No entries yet.' }, { text: "Press 'a' to add a new account." }]
  }
  return [
    { text: `Account: ${entry.account}`, style: { fg: 'yellow', bold: true } },
    { text: '' },
    { text: `Encrypted password (hidden): ${maskPayload(entry.password.payload)}` },
    { text: "Press 'v' to show the real password in the notification." }
  ]
}

function inputPopup(state: ViewState, width: number, color: boolean): string[] {
  const editingAccount = state.inputMode === 'editing_account'
  const value = editingAccount ? state.accountInput : state.passwordInput
  const popupWidth = Math.max(Math.floor(width * 0.6), 20)
  const margin = ' '.repeat(Math.floor((width - popupWidth) / 2))

  return panel(
    [
      { text: value, align: 'center' },
      { text: `Characters: ${Array.from(value).length}`, style: { fg: 'gray' }, align: 'center' }
    ],
    {
      title: editingAccount ? 'New Entry - Account' : 'New Entry - Password',
      width: popupWidth,
      color
    }
  ).map((line) => margin + line)
}

/**
 * Renders the whole screen for a UI state as a list of terminal lines.
 *
 * Layout, top to bottom: status, notification, account list beside the
 * selected entry's detail (replaced by the input popup while adding), and
 * the key instructions for the current mode.
 */
export function renderVaultView(state: ViewState, options: ViewOptions): string[] {
  const width = Math.max(options.width, MIN_WIDTH)
  const rows = options.listRows ?? DEFAULT_LIST_ROWS
  const color = options.color ?? false

  const status = panel(
    [
      {
        text: `Total entries: ${state.entries.length} | Mode: ${MODE_LABELS[state.inputMode]}`,
        style: { fg: 'white' }
      }
    ],
    { title: 'Password Manager - Status', width, color }
  )

  const notification = panel([feedbackLine(state.feedback)], { title: 'Notifications', width, color })

  let main: string[]
  if (state.inputMode === 'normal') {
    const listWidth = Math.floor(width * 0.4)
    const list = panel(accountList(state, rows), { title: 'Accounts', width: listWidth, height: rows, color })
    const detail = panel(accountDetail(state), {
      title: 'Account Details',
      width: width - listWidth,
      height: rows,
      color
    })
    main = sideBySide(list, listWidth, detail)
  } else {
    main = inputPopup(state, width, color)
  }

  const instructions = panel(
    INSTRUCTIONS[state.inputMode].map((text) => ({ text })),
    { title: 'Instructions', width, color }
  )

  return [...status, ...notification, ...main, ...instructions]
}
