import type { Workout } from '../types/training.types'
import type { WorkoutQuery } from './training-store.types'

export function matchesWorkoutQuery(w: Workout, q: WorkoutQuery): boolean {
  if (q.statuses && !q.statuses.includes(w.status)) return false
  if (q.fromDate && w.scheduledDate < q.fromDate) return false
  if (q.beforeDate && w.scheduledDate >= q.beforeDate) return false
  if (q.onDate && w.scheduledDate !== q.onDate) return false
  return true
}

export function compareWorkouts(a: Workout, b: Workout): number {
  return (
    a.scheduledDate.localeCompare(b.scheduledDate) ||
    a.priorityLevel - b.priorityLevel ||
    a.id.localeCompare(b.id)
  )
}
