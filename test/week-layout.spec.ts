import { rolesForSessions, ROLE_PRIORITY } from '../src/training-plan/plan-policy'
import type { SessionRequest } from '../src/training-plan/training-plan.types'
import { layoutWeek } from '../src/training-plan/week-layout'
import { DISCIPLINES, type WorkoutTemplate } from '../src/types/training.types'

const stubTemplate: WorkoutTemplate = {
  id: 'stub',
  version: 1,
  name: 'Stub',
  discipline: 'run',
  category: 'endurance',
  difficultyTier: 2,
  description: '',
  steps: [{ kind: 'main', durationSeconds: 600, target: { kind: 'zone', zone: 2 } }],
}

function sessionsFor(perDiscipline: number): SessionRequest[] {
  return DISCIPLINES.flatMap((discipline) =>
    rolesForSessions(perDiscipline).map((role) => ({
      discipline,
      role,
      priority: ROLE_PRIORITY[role],
      template: stubTemplate,
    })),
  )
}

function summary(perDiscipline: number): string[] {
  return layoutWeek(sessionsFor(perDiscipline)).map((s) => `${s.dayIndex}:${s.discipline}:${s.role}`)
}

describe('layoutWeek', () => {
  it('spreads one quality session per discipline across the week', () => {
    expect(summary(1)).toEqual(['0:swim:quality', '2:bike:quality', '4:run:quality'])
  })

  it('puts long sessions on their preferred days and keeps quality days apart', () => {
    expect(summary(2)).toEqual([
      '0:swim:quality',
      '2:bike:quality',
      '4:swim:long',
      '4:run:quality',
      '5:bike:long',
      '6:run:long',
    ])
  })

  it('fills easy sessions into the lightest days', () => {
    expect(summary(3)).toEqual([
      '0:swim:quality',
      '0:run:easy',
      '1:swim:easy',
      '2:bike:quality',
      '3:bike:easy',
      '4:swim:long',
      '4:run:quality',
      '5:bike:long',
      '6:run:long',
    ])
  })

  it('never repeats a discipline on one day', () => {
    for (const perDiscipline of [1, 2, 3]) {
      const placed = layoutWeek(sessionsFor(perDiscipline))
      const keys = placed.map((s) => `${s.dayIndex}:${s.discipline}`)
      expect(new Set(keys).size).toBe(keys.length)
      expect(placed).toHaveLength(perDiscipline * 3)
    }
  })
})
