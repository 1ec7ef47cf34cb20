/**
 * Vocabulary shared by every RobotKing firmware: field aliases, sentinel literals and command templates.
 * Firmware and API versions report the same concept with different strings, so sentinels are matched
 * by containment against the resolved value (e.g. "@STATE_END_W" is terminal).
 */

export const StateOptions = {
  NONE: '-',
} as const

export const STATE_POWER_OFF = 'STATE_POWER_OFF'
export const STATE_TERMINAL = ['STATE_END', 'STATE_COMPLETE'] as const
export const STATE_INITIAL = 'STATE_INITIAL'

export const ERROR_OFF = 'OFF'
export const ERROR_NO_ERROR: readonly string[] = ['ERROR_NOERROR', 'ERROR_NOERROR_TITLE', 'No Error', 'No_Error']

export const POWER_STATUS_KEY = ['State', 'state'] as const
export const ERROR_STATUS_KEY = ['Error', 'error'] as const

/** One candidate command: [group (ctrlKey), command, value] */
export type CommandCandidate = readonly [group: string, command: string | null, value: string | null]
export type CommandTemplate = readonly CommandCandidate[]

// Synonyms in preference order, first supported one wins
export const CMD_WAKE_UP: CommandTemplate = [
  ['Config', 'Wakeup', null],
  ['Set', 'Wakeup', null],
  ['WakeUp', null, null],
]

export const ADDITIONAL_POLL_INTERVAL = 300 // 5 minutes

export const ROBOT_KING_CATEGORY = 'robotKing'

export type FeatureKey = 'RUN_STATE' | 'ERROR_MSG'

export type TerminalState = (typeof STATE_TERMINAL)[number]

export type RunStateClass =
  | { kind: 'off' }
  | { kind: 'completed'; sentinel: TerminalState }
  | { kind: 'running'; value: string }

/**
 * Classify a resolved run state. Terminal sentinels are checked before the power-off one,
 * both as substrings of the resolved value.
 */
export function classifyRunState(runState: string): RunStateClass {
  const sentinel = STATE_TERMINAL.find((state) => runState.includes(state))
  if (sentinel) {
    return { kind: 'completed', sentinel }
  }
  if (runState.includes(STATE_POWER_OFF)) {
    return { kind: 'off' }
  }
  return { kind: 'running', value: runState }
}

export function isNoErrorState(error: string): boolean {
  return error === ERROR_OFF || ERROR_NO_ERROR.includes(error)
}
