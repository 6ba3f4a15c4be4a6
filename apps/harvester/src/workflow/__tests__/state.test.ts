import { describe, expect, it } from 'vitest'
import { HarvestError } from '../../errors.js'
import { IllegalTransitionError, RunStateMachine } from '../state.js'

describe('RunStateMachine', () => {
  it('walks the normal lifecycle', () => {
    const machine = new RunStateMachine()
    expect(machine.state).toBe('idle')

    machine.transition('discovering')
    machine.transition('processing')
    machine.transition('finalized')

    expect(machine.state).toBe('finalized')
  })

  it('may finalize straight from discovery', () => {
    const machine = new RunStateMachine()
    machine.transition('discovering')

    expect(machine.canTransition('finalized')).toBe(true)
    machine.transition('finalized')
    expect(machine.state).toBe('finalized')
  })

  it('rejects skipping discovery', () => {
    const machine = new RunStateMachine()

    expect(machine.canTransition('processing')).toBe(false)
    expect(() => machine.transition('processing')).toThrow('Illegal run state transition idle -> processing')
    expect(machine.state).toBe('idle')
  })

  it('is terminal once finalized', () => {
    const machine = new RunStateMachine()
    machine.transition('discovering')
    machine.transition('finalized')

    let caught: unknown
    try {
      machine.transition('discovering')
    } catch (error) {
      caught = error
    }
    expect(caught).toBeInstanceOf(IllegalTransitionError)
    expect(caught).toBeInstanceOf(HarvestError)
    expect(caught).toMatchObject({ name: 'IllegalTransitionError', stage: 'run' })
  })
})
