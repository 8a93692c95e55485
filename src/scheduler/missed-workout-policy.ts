import { addDays } from '../common/dates'
import type { TrainingPlan, Workout } from '../types/training.types'
import type { GateDecision } from './scheduler.types'

/** The least important workout on today's schedule. */
export function swapTarget(today: readonly Workout[]): Workout | null {
  let target: Workout | null = null
  for (const w of today) {
    if (!target || w.priorityLevel > target.priorityLevel) target = w
  }
  return target
}

/** Most important first; the older of two equals goes first. */
export function byImportance(a: Workout, b: Workout): number {
  return (
    a.priorityLevel - b.priorityLevel ||
    a.scheduledDate.localeCompare(b.scheduledDate) ||
    a.id.localeCompare(b.id)
  )
}

/**
 * Priority gates for one missed workout against what is already on today:
 *   1. low-value sessions are dropped
 *   2. a more important session takes the least important slot of today,
 *      unless that would stack two hard sessions or two of one discipline
 *   3. two hard sessions never share a day; the missed one goes
 * Anything else is left as missed. Sessions in `movedIn` were swapped into
 * today earlier in the same sweep and are never displaced again.
 */
export function decideMissedWorkout(
  missed: Workout,
  today: readonly Workout[],
  movedIn: ReadonlySet<string> = new Set(),
): GateDecision {
  if (missed.priorityLevel === 3) {
    return { action: 'delete', gate: 1 }
  }

  const target = swapTarget(today.filter((w) => !movedIn.has(w.id)))
  if (target && missed.priorityLevel < target.priorityLevel) {
    const remaining = today.filter((w) => w.id !== target.id)
    const stacksHard = missed.priorityLevel === 2 && remaining.some((w) => w.priorityLevel === 2)
    const doublesDiscipline = remaining.some((w) => w.discipline === missed.discipline)
    if (!stacksHard && !doublesDiscipline) {
      return { action: 'swap', displaced: target }
    }
  }

  if (missed.priorityLevel === 2 && today.some((w) => w.priorityLevel === 2)) {
    return { action: 'delete', gate: 3 }
  }

  return { action: 'markMissed' }
}

export function planEndDate(plan: Pick<TrainingPlan, 'startDate' | 'totalWeeks'>): string {
  return addDays(plan.startDate, plan.totalWeeks * 7 - 1)
}

/**
 * First day after `today` with nothing scheduled, before the next session
 * of the same discipline and inside the plan. Null when there is none.
 */
export function findRelocationDay(
  displaced: Workout,
  upcoming: readonly Workout[],
  today: string,
  planEnd: string,
): string | null {
  const nextSameDiscipline = upcoming
    .filter((w) => w.id !== displaced.id && w.discipline === displaced.discipline && w.scheduledDate > today)
    .map((w) => w.scheduledDate)
    .sort()[0]
  const limit = nextSameDiscipline && nextSameDiscipline <= planEnd ? nextSameDiscipline : addDays(planEnd, 1)

  const busy = new Set(upcoming.filter((w) => w.id !== displaced.id).map((w) => w.scheduledDate))
  for (let day = addDays(today, 1); day < limit; day = addDays(day, 1)) {
    if (!busy.has(day)) return day
  }
  return null
}
