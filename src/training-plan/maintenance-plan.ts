import { daysBetween } from '../common/dates'
import { NotFoundError, ValidationError } from '../common/errors'
import {
  DISCIPLINES,
  type Discipline,
  type PriorityLevel,
  type TemplateCategory,
  type VolumeTier,
  type WorkoutTemplate,
} from '../types/training.types'

/**
 * Rolling base block for athletes without a race: three load weeks then a
 * recovery week, repeated for as long as the plan stays active.
 */
export type MaintenanceWeekPattern = {
  cycleWeek: number
  intensityModifier: number
  volumeModifier: number
  zoneFocus: 'Zone 2' | 'Zone 3'
  recovery: boolean
}

export const MAINTENANCE_PATTERNS: readonly MaintenanceWeekPattern[] = [
  { cycleWeek: 1, intensityModifier: 0.85, volumeModifier: 1.0, zoneFocus: 'Zone 2', recovery: false },
  { cycleWeek: 2, intensityModifier: 0.85, volumeModifier: 1.0, zoneFocus: 'Zone 2', recovery: false },
  { cycleWeek: 3, intensityModifier: 0.85, volumeModifier: 1.0, zoneFocus: 'Zone 3', recovery: false },
  { cycleWeek: 4, intensityModifier: 0.85, volumeModifier: 0.7, zoneFocus: 'Zone 2', recovery: true },
]

/** A notch below race preparation. */
export const MAINTENANCE_SESSIONS: Record<VolumeTier, Record<Discipline, number>> = {
  1: { swim: 1, bike: 1, run: 1 },
  2: { swim: 2, bike: 2, run: 2 },
  3: { swim: 2, bike: 3, run: 2 },
}

// Monday = 0. Sunday only carries the third ride of tier 3.
const MAINTENANCE_DAYS: Record<Discipline, readonly number[]> = {
  swim: [0, 3],
  bike: [1, 4, 6],
  run: [2, 5],
}

export const MAINTENANCE_INITIAL_WEEKS = 2
export const MAINTENANCE_HORIZON_DAYS = 14

export type MaintenanceSlot = {
  discipline: Discipline
  dayIndex: number
  priority: PriorityLevel
  categories: readonly TemplateCategory[]
}

export function maintenancePattern(weekNumber: number): MaintenanceWeekPattern {
  const pattern = MAINTENANCE_PATTERNS[(weekNumber - 1) % MAINTENANCE_PATTERNS.length]
  if (!pattern) throw new ValidationError(`Invalid maintenance week: ${weekNumber}`)
  return pattern
}

/**
 * The first session of each discipline is the week's key session and follows
 * the zone focus; the rest are aerobic fillers. Recovery weeks are all easy.
 */
export function maintenanceWeekSlots(tier: VolumeTier, pattern: MaintenanceWeekPattern): MaintenanceSlot[] {
  const slots: MaintenanceSlot[] = []
  for (const discipline of DISCIPLINES) {
    const days = MAINTENANCE_DAYS[discipline].slice(0, MAINTENANCE_SESSIONS[tier][discipline])
    days.forEach((dayIndex, i) => {
      if (pattern.recovery) {
        slots.push({ discipline, dayIndex, priority: 3, categories: ['recovery'] })
      } else if (i === 0) {
        const categories: TemplateCategory[] = pattern.zoneFocus === 'Zone 3' ? ['tempo'] : ['endurance']
        slots.push({ discipline, dayIndex, priority: 2, categories })
      } else {
        slots.push({ discipline, dayIndex, priority: 3, categories: ['endurance'] })
      }
    })
  }
  return slots.sort((a, b) => a.dayIndex - b.dayIndex)
}

/** Easiest candidate, ties by id. */
export function selectMaintenanceTemplate(
  candidates: readonly WorkoutTemplate[],
  slot: MaintenanceSlot,
): WorkoutTemplate {
  const [best] = [...candidates].sort((a, b) => a.difficultyTier - b.difficultyTier || a.id.localeCompare(b.id))
  if (!best) {
    throw new NotFoundError(`No ${slot.categories.join('/')} template for ${slot.discipline}`)
  }
  return best
}

/** Whole weeks to append so the plan reaches at least the horizon past `today`. */
export function weeksToExtend(today: string, lastPlannedDay: string): number {
  const ahead = daysBetween(today, lastPlannedDay)
  return ahead >= MAINTENANCE_HORIZON_DAYS ? 0 : Math.ceil((MAINTENANCE_HORIZON_DAYS - ahead) / 7)
}
