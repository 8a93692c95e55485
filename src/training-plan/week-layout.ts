import { DISCIPLINES, type Discipline } from '../types/training.types'
import type { PlacedSession, SessionRequest, SlotRole } from './training-plan.types'

const DAYS_PER_WEEK = 7

const LONG_DAY: Record<Discipline, number> = {
  swim: 4,
  bike: 5,
  run: 6,
}

const QUALITY_DAY_ORDER = [0, 2, 4, 1, 3, 5, 6]

const ROLE_ORDER: readonly SlotRole[] = ['long', 'quality', 'easy']

class WeekGrid {
  private readonly days: PlacedSession[][] = Array.from({ length: DAYS_PER_WEEK }, () => [])

  load(day: number): number {
    return this.days[day]?.length ?? 0
  }

  has(day: number, discipline: Discipline): boolean {
    return (this.days[day] ?? []).some((s) => s.discipline === discipline)
  }

  hardSessions(day: number): number {
    return (this.days[day] ?? []).filter((s) => s.priority === 2).length
  }

  place(session: SessionRequest, dayIndex: number): PlacedSession {
    const placed = { ...session, dayIndex }
    this.days[dayIndex]?.push(placed)
    return placed
  }

  openDays(discipline: Discipline): number[] {
    return Array.from({ length: DAYS_PER_WEEK }, (_, d) => d).filter((d) => !this.has(d, discipline))
  }

  leastLoaded(days: readonly number[]): number | undefined {
    return [...days].sort((a, b) => this.load(a) - this.load(b) || a - b)[0]
  }
}

function placeLong(grid: WeekGrid, session: SessionRequest): number | undefined {
  const preferred = LONG_DAY[session.discipline]
  if (!grid.has(preferred, session.discipline)) return preferred
  return grid.leastLoaded(grid.openDays(session.discipline))
}

function placeQuality(grid: WeekGrid, session: SessionRequest): number | undefined {
  const open = QUALITY_DAY_ORDER.filter((d) => !grid.has(d, session.discipline))
  const rank = (d: number) => QUALITY_DAY_ORDER.indexOf(d)
  const best = (days: number[]) => days.sort((a, b) => grid.load(a) - grid.load(b) || rank(a) - rank(b))[0]

  // no hard session the same day or either side of it
  const spaced = open.filter((d) => grid.hardSessions(d) + grid.hardSessions(d - 1) + grid.hardSessions(d + 1) === 0)
  if (spaced.length > 0) return best(spaced)

  const alone = open.filter((d) => grid.hardSessions(d) === 0)
  if (alone.length > 0) return best(alone)

  return best(open)
}

/**
 * Assigns each requested session a weekday. Long sessions go first onto
 * their preferred day, then quality sessions spread apart, then easy ones
 * fill whatever is lightest. One discipline never appears twice on a day.
 */
export function layoutWeek(sessions: readonly SessionRequest[]): PlacedSession[] {
  const grid = new WeekGrid()
  const placed: PlacedSession[] = []

  for (const role of ROLE_ORDER) {
    for (const discipline of DISCIPLINES) {
      for (const session of sessions) {
        if (session.role !== role || session.discipline !== discipline) continue
        const day =
          role === 'long'
            ? placeLong(grid, session)
            : role === 'quality'
              ? placeQuality(grid, session)
              : grid.leastLoaded(grid.openDays(discipline))
        // more sessions of one discipline than days in a week
        if (day === undefined) continue
        placed.push(grid.place(session, day))
      }
    }
  }

  return placed.sort((a, b) => a.dayIndex - b.dayIndex || DISCIPLINES.indexOf(a.discipline) - DISCIPLINES.indexOf(b.discipline))
}
