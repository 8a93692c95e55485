import { NotFoundError, ValidationError } from '../common/errors'
import { daysBetween } from '../common/dates'
import {
  PHASE_ORDER,
  type PhaseBlock,
  type PriorityLevel,
  type TemplateCategory,
  type TrainingPhase,
  type User,
  type VolumeTier,
  type WorkoutTemplate,
} from '../types/training.types'
import { mapExperienceToVolumeTier } from '../biometrics/biometrics-calculator'
import type { SlotRole, TrainingPhaseConfig, VolumeTierConfig } from './training-plan.types'

export const VOLUME_TIERS: Record<VolumeTier, VolumeTierConfig> = {
  1: { tier: 1, weeklyHours: { min: 4, max: 6 }, sessionsPerWeek: { swim: 1, bike: 1, run: 1 } },
  2: { tier: 2, weeklyHours: { min: 7, max: 10 }, sessionsPerWeek: { swim: 2, bike: 2, run: 2 } },
  3: { tier: 3, weeklyHours: { min: 11, max: 15 }, sessionsPerWeek: { swim: 3, bike: 3, run: 3 } },
}

export const PHASE_CONFIGS: Record<TrainingPhase, TrainingPhaseConfig> = {
  BASE: { phase: 'BASE', intensityModifier: 0.85, volumeModifier: 1.0, zoneFocus: 'Zone 2' },
  BUILD: { phase: 'BUILD', intensityModifier: 1.0, volumeModifier: 0.9, zoneFocus: 'Zone 3/4' },
  PEAK: { phase: 'PEAK', intensityModifier: 1.1, volumeModifier: 0.8, zoneFocus: 'Zone 5' },
  TAPER: { phase: 'TAPER', intensityModifier: 0.9, volumeModifier: 0.5, zoneFocus: 'Zone 2/3' },
}

export const ROLE_PRIORITY: Record<SlotRole, PriorityLevel> = {
  long: 1,
  quality: 2,
  easy: 3,
}

export const PRIORITY_TARGET_RPE: Record<PriorityLevel, number> = {
  1: 7,
  2: 6,
  3: 4,
}

const ROLE_CATEGORIES: Record<SlotRole, readonly TemplateCategory[]> = {
  long: ['long'],
  quality: ['tempo', 'intervals'],
  easy: ['endurance', 'recovery'],
}

const QUALITY_TIER: Record<TrainingPhase, number> = {
  BASE: 3,
  BUILD: 4,
  PEAK: 5,
  TAPER: 3,
}

export function resolveVolumeTier(user: Pick<User, 'trainingVolumeTier' | 'experienceLevel'>): VolumeTier {
  return user.trainingVolumeTier ?? mapExperienceToVolumeTier(user.experienceLevel)
}

/** An explicit length wins; otherwise whole weeks from start to race day, rounded up. */
export function resolveTotalWeeks(input: {
  totalWeeks?: number
  raceDate?: string | null
  startDate: string
}): number {
  if (input.totalWeeks !== undefined) {
    if (!Number.isInteger(input.totalWeeks) || input.totalWeeks < 1) {
      throw new ValidationError('totalWeeks must be a positive integer')
    }
    return input.totalWeeks
  }
  if (!input.raceDate) {
    throw new ValidationError('A race or an explicit plan length is required')
  }
  const days = daysBetween(input.startDate, input.raceDate)
  if (days <= 0) {
    throw new ValidationError(`Race date ${input.raceDate} is not after the plan start ${input.startDate}`)
  }
  return Math.ceil(days / 7)
}

/**
 * Largest-remainder apportionment of `totalWeeks` over the phase split.
 * Ties on the remainder go to the earlier phase; empty phases are dropped.
 */
export function allocatePhases(totalWeeks: number, split: Record<TrainingPhase, number>): PhaseBlock[] {
  const total = PHASE_ORDER.reduce((sum, p) => sum + split[p], 0)
  const quotas = PHASE_ORDER.map((phase, order) => {
    const exact = (totalWeeks * split[phase]) / total
    return { phase, order, weeks: Math.floor(exact), remainder: exact - Math.floor(exact) }
  })

  let left = totalWeeks - quotas.reduce((sum, q) => sum + q.weeks, 0)
  const byRemainder = [...quotas].sort((a, b) => b.remainder - a.remainder || a.order - b.order)
  for (const q of byRemainder) {
    if (left <= 0) break
    q.weeks++
    left--
  }

  return quotas.filter((q) => q.weeks > 0).map(({ phase, weeks }) => ({ phase, weeks }))
}

export function phaseForWeek(phases: readonly PhaseBlock[], weekNumber: number): TrainingPhase {
  let end = 0
  for (const block of phases) {
    end += block.weeks
    if (weekNumber <= end) return block.phase
  }
  const last = phases[phases.length - 1]
  if (!last) throw new ValidationError('Plan has no phases')
  return last.phase
}

export function rolesForSessions(count: number): SlotRole[] {
  if (count <= 0) return []
  if (count === 1) return ['quality']
  if (count === 2) return ['quality', 'long']
  return ['quality', ...Array.from({ length: count - 2 }, (): SlotRole => 'easy'), 'long']
}

export function targetDifficultyTier(role: SlotRole, phase: TrainingPhase): number {
  switch (role) {
    case 'long':
      return 3
    case 'quality':
      return QUALITY_TIER[phase]
    case 'easy':
      return phase === 'TAPER' ? 1 : 2
  }
}

/**
 * Closest difficulty tier within the role's categories. Equally close
 * templates rotate week by week so consecutive weeks are not identical.
 */
export function selectTemplate(
  candidates: readonly WorkoutTemplate[],
  role: SlotRole,
  targetTier: number,
  weekNumber: number,
): WorkoutTemplate {
  const eligible = candidates.filter((t) => ROLE_CATEGORIES[role].includes(t.category))
  if (eligible.length === 0) {
    throw new NotFoundError(`No ${role} templates available`)
  }
  const best = Math.min(...eligible.map((t) => Math.abs(t.difficultyTier - targetTier)))
  const closest = eligible
    .filter((t) => Math.abs(t.difficultyTier - targetTier) === best)
    .sort((a, b) => a.id.localeCompare(b.id))
  const pick = closest[(weekNumber - 1) % closest.length]
  if (!pick) throw new NotFoundError(`No ${role} templates available`)
  return pick
}
