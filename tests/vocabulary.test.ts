import { describe, expect, it } from 'vitest'
import {
  CMD_WAKE_UP,
  ERROR_NO_ERROR,
  ERROR_OFF,
  StateOptions,
  classifyRunState,
  isNoErrorState,
} from '../src/appliances/vocabulary.js'

describe('vocabulary', () => {
  describe('classifyRunState', () => {
    it('should classify terminal sentinels by containment', () => {
      expect(classifyRunState('STATE_END')).toEqual({ kind: 'completed', sentinel: 'STATE_END' })
      expect(classifyRunState('@STATE_COMPLETE_W')).toEqual({ kind: 'completed', sentinel: 'STATE_COMPLETE' })
    })

    it('should classify the power off sentinel by containment', () => {
      expect(classifyRunState('STATE_POWER_OFF')).toEqual({ kind: 'off' })
      expect(classifyRunState('@STATE_POWER_OFF_W')).toEqual({ kind: 'off' })
    })

    it('should treat any other vendor string as running', () => {
      expect(classifyRunState('@STATE_CLEANING_W')).toEqual({ kind: 'running', value: '@STATE_CLEANING_W' })
      expect(classifyRunState('end')).toEqual({ kind: 'running', value: 'end' })
    })
  })

  describe('isNoErrorState', () => {
    it.each([ERROR_OFF, ...ERROR_NO_ERROR])('should treat "%s" as no error', (value) => {
      expect(isNoErrorState(value)).toBe(true)
    })

    it('should match no-error variants by equality only', () => {
      expect(isNoErrorState('@ERROR_NOERROR_W')).toBe(false)
      expect(isNoErrorState('@ERROR_WHEEL_W')).toBe(false)
    })
  })

  it('should keep the wake up synonyms in preference order', () => {
    expect(CMD_WAKE_UP).toEqual([
      ['Config', 'Wakeup', null],
      ['Set', 'Wakeup', null],
      ['WakeUp', null, null],
    ])
  })

  it('should only define the none placeholder', () => {
    expect(StateOptions).toEqual({ NONE: '-' })
  })
})
