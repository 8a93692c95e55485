import type { Workout } from '../types/training.types'

export type GateDecision =
  | { action: 'delete'; gate: 1 | 3 }
  | { action: 'swap'; displaced: Workout }
  | { action: 'markMissed' }

export type UserSweepResult = {
  userId: string
  deleted: string[]
  swapped: string[]
  relocated: string[]
  displacedDeleted: string[]
  markedMissed: string[]
  planCompleted: boolean
  maintenancePlanStarted: string | null
  weeksAdded: number
}

export type SweepSummary = {
  date: string
  usersTotal: number
  usersProcessed: number
  failures: { userId: string; error: string }[]
  cancelled: boolean
  deleted: number
  swapped: number
  markedMissed: number
  plansCompleted: number
  maintenanceStarted: number
  weeksAdded: number
}

export type SweepOptions = {
  signal?: AbortSignal
}
