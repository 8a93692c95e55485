import type {
  ActivityLog,
  AdaptationLog,
  Biometrics,
  FeedbackLog,
  HeartRateZone,
  Race,
  TrainingPlan,
  User,
  UserTrainingState,
  Workout,
  WorkoutStatus,
} from '../types/training.types'

export const TRAINING_STORE = Symbol('TRAINING_STORE')

/** Filters are ANDed; results come back ordered by date, then priority. */
export type WorkoutQuery = {
  statuses?: readonly WorkoutStatus[]
  fromDate?: string // inclusive
  beforeDate?: string // exclusive
  onDate?: string
}

/**
 * Everything a unit of work may read or write for one user. Writes become
 * visible to others only when the surrounding transaction commits.
 */
export interface TrainingStoreTx {
  getUser(userId: string): Promise<User | null>
  saveUser(user: User): Promise<void>
  getRace(raceId: string): Promise<Race | null>

  getBiometrics(userId: string): Promise<Biometrics | null>
  saveBiometrics(biometrics: Biometrics): Promise<void>
  getHeartRateZones(userId: string): Promise<HeartRateZone[]>
  replaceHeartRateZones(userId: string, zones: readonly HeartRateZone[]): Promise<void>

  getPlan(planId: string): Promise<TrainingPlan | null>
  getActivePlan(userId: string): Promise<TrainingPlan | null>
  insertPlan(plan: TrainingPlan): Promise<void>
  updatePlan(plan: TrainingPlan): Promise<void>

  getWorkout(workoutId: string): Promise<Workout | null>
  listWorkouts(planId: string, query?: WorkoutQuery): Promise<Workout[]>
  insertWorkouts(workouts: readonly Workout[]): Promise<void>
  /** Optimistic: `workout.version` must match the stored row. Returns the row with its new version. */
  updateWorkout(workout: Workout): Promise<Workout>
  deleteWorkout(workoutId: string): Promise<void>

  getTrainingState(userId: string): Promise<UserTrainingState | null>
  /** Optimistic: version 0 inserts, anything else must match the stored row. */
  saveTrainingState(state: UserTrainingState): Promise<UserTrainingState>

  insertActivityLog(log: ActivityLog): Promise<void>
  insertFeedbackLog(log: FeedbackLog): Promise<void>
  insertAdaptationLog(log: AdaptationLog): Promise<void>
  listAdaptationLogs(userId: string): Promise<AdaptationLog[]>
}

export type TransactionOptions = {
  timeoutMs: number
}

export interface TrainingStore {
  /** Runs `work` under the user's lock inside one transaction. */
  withUserTransaction<T>(
    userId: string,
    work: (tx: TrainingStoreTx) => Promise<T>,
    options: TransactionOptions,
  ): Promise<T>
  listUserIdsWithActivePlans(): Promise<string[]>
  close(): Promise<void>
}
