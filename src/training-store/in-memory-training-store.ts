import { Logger } from '@nestjs/common'
import { ConflictError, TransientStoreError, errorMessage } from '../common/errors'
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
} from '../types/training.types'
import type { TrainingStore, TrainingStoreTx, TransactionOptions, WorkoutQuery } from './training-store.types'
import { compareWorkouts, matchesWorkoutQuery } from './workout-query'

type Tables = {
  users: Map<string, User>
  races: Map<string, Race>
  biometrics: Map<string, Biometrics>
  heartRateZones: Map<string, HeartRateZone[]>
  plans: Map<string, TrainingPlan>
  workouts: Map<string, Workout>
  trainingStates: Map<string, UserTrainingState>
  activityLogs: Map<string, ActivityLog>
  feedbackLogs: Map<string, FeedbackLog>
  adaptationLogs: Map<string, AdaptationLog>
}

/** Write set over a committed table. `null` marks a delete. */
class StagedTable<T> {
  private readonly writes = new Map<string, T | null>()

  constructor(private readonly base: Map<string, T>) {}

  get(key: string): T | null {
    const staged = this.writes.get(key)
    if (staged !== undefined) return staged === null ? null : structuredClone(staged)
    const committed = this.base.get(key)
    return committed === undefined ? null : structuredClone(committed)
  }

  set(key: string, value: T): void {
    this.writes.set(key, structuredClone(value))
  }

  delete(key: string): void {
    this.writes.set(key, null)
  }

  values(): T[] {
    const keys = new Set([...this.base.keys(), ...this.writes.keys()])
    const out: T[] = []
    for (const key of keys) {
      const value = this.get(key)
      if (value !== null) out.push(value)
    }
    return out
  }

  commit(): void {
    for (const [key, value] of this.writes) {
      if (value === null) this.base.delete(key)
      else this.base.set(key, value)
    }
    this.writes.clear()
  }
}

class InMemoryTx implements TrainingStoreTx {
  private open = true
  private readonly users: StagedTable<User>
  private readonly races: StagedTable<Race>
  private readonly biometrics: StagedTable<Biometrics>
  private readonly heartRateZones: StagedTable<HeartRateZone[]>
  private readonly plans: StagedTable<TrainingPlan>
  private readonly workouts: StagedTable<Workout>
  private readonly trainingStates: StagedTable<UserTrainingState>
  private readonly activityLogs: StagedTable<ActivityLog>
  private readonly feedbackLogs: StagedTable<FeedbackLog>
  private readonly adaptationLogs: StagedTable<AdaptationLog>

  constructor(tables: Tables) {
    this.users = new StagedTable(tables.users)
    this.races = new StagedTable(tables.races)
    this.biometrics = new StagedTable(tables.biometrics)
    this.heartRateZones = new StagedTable(tables.heartRateZones)
    this.plans = new StagedTable(tables.plans)
    this.workouts = new StagedTable(tables.workouts)
    this.trainingStates = new StagedTable(tables.trainingStates)
    this.activityLogs = new StagedTable(tables.activityLogs)
    this.feedbackLogs = new StagedTable(tables.feedbackLogs)
    this.adaptationLogs = new StagedTable(tables.adaptationLogs)
  }

  get isOpen(): boolean {
    return this.open
  }

  close(): void {
    this.open = false
  }

  commit(): void {
    this.assertOpen()
    for (const table of [
      this.users,
      this.races,
      this.biometrics,
      this.heartRateZones,
      this.plans,
      this.workouts,
      this.trainingStates,
      this.activityLogs,
      this.feedbackLogs,
      this.adaptationLogs,
    ]) {
      table.commit()
    }
    this.open = false
  }

  private assertOpen(): void {
    if (!this.open) throw new TransientStoreError('Transaction is no longer open')
  }

  async getUser(userId: string): Promise<User | null> {
    this.assertOpen()
    return this.users.get(userId)
  }

  async saveUser(user: User): Promise<void> {
    this.assertOpen()
    this.users.set(user.id, user)
  }

  async getRace(raceId: string): Promise<Race | null> {
    this.assertOpen()
    return this.races.get(raceId)
  }

  async getBiometrics(userId: string): Promise<Biometrics | null> {
    this.assertOpen()
    return this.biometrics.get(userId)
  }

  async saveBiometrics(biometrics: Biometrics): Promise<void> {
    this.assertOpen()
    this.biometrics.set(biometrics.userId, biometrics)
  }

  async getHeartRateZones(userId: string): Promise<HeartRateZone[]> {
    this.assertOpen()
    return this.heartRateZones.get(userId) ?? []
  }

  async replaceHeartRateZones(userId: string, zones: readonly HeartRateZone[]): Promise<void> {
    this.assertOpen()
    this.heartRateZones.set(userId, [...zones])
  }

  async getPlan(planId: string): Promise<TrainingPlan | null> {
    this.assertOpen()
    return this.plans.get(planId)
  }

  async getActivePlan(userId: string): Promise<TrainingPlan | null> {
    this.assertOpen()
    return this.plans.values().find((p) => p.userId === userId && p.status === 'active') ?? null
  }

  async insertPlan(plan: TrainingPlan): Promise<void> {
    this.assertOpen()
    if (this.plans.get(plan.id)) throw new ConflictError(`Plan already exists: ${plan.id}`)
    this.plans.set(plan.id, plan)
  }

  async updatePlan(plan: TrainingPlan): Promise<void> {
    this.assertOpen()
    this.plans.set(plan.id, plan)
  }

  async getWorkout(workoutId: string): Promise<Workout | null> {
    this.assertOpen()
    return this.workouts.get(workoutId)
  }

  async listWorkouts(planId: string, query: WorkoutQuery = {}): Promise<Workout[]> {
    this.assertOpen()
    return this.workouts
      .values()
      .filter((w) => w.planId === planId && matchesWorkoutQuery(w, query))
      .sort(compareWorkouts)
  }

  async insertWorkouts(workouts: readonly Workout[]): Promise<void> {
    this.assertOpen()
    for (const w of workouts) this.workouts.set(w.id, w)
  }

  async updateWorkout(workout: Workout): Promise<Workout> {
    this.assertOpen()
    const current = this.workouts.get(workout.id)
    if (!current || current.version !== workout.version) {
      throw new ConflictError(`Workout ${workout.id} was modified concurrently`)
    }
    const next = { ...workout, version: workout.version + 1 }
    this.workouts.set(next.id, next)
    return next
  }

  async deleteWorkout(workoutId: string): Promise<void> {
    this.assertOpen()
    this.workouts.delete(workoutId)
  }

  async getTrainingState(userId: string): Promise<UserTrainingState | null> {
    this.assertOpen()
    return this.trainingStates.get(userId)
  }

  async saveTrainingState(state: UserTrainingState): Promise<UserTrainingState> {
    this.assertOpen()
    const current = this.trainingStates.get(state.userId)
    const expected = current?.version ?? 0
    if (expected !== state.version) {
      throw new ConflictError(`Training state for ${state.userId} was modified concurrently`)
    }
    const next = { ...state, version: state.version + 1 }
    this.trainingStates.set(state.userId, next)
    return next
  }

  async insertActivityLog(log: ActivityLog): Promise<void> {
    this.assertOpen()
    this.activityLogs.set(log.id, log)
  }

  async insertFeedbackLog(log: FeedbackLog): Promise<void> {
    this.assertOpen()
    this.feedbackLogs.set(log.id, log)
  }

  async insertAdaptationLog(log: AdaptationLog): Promise<void> {
    this.assertOpen()
    this.adaptationLogs.set(log.id, log)
  }

  async listAdaptationLogs(userId: string): Promise<AdaptationLog[]> {
    this.assertOpen()
    return this.adaptationLogs
      .values()
      .filter((l) => l.userId === userId)
      .sort((a, b) => a.triggeredAt.localeCompare(b.triggeredAt))
  }
}

/**
 * Process-local store for development and tests. Each user has a promise
 * chain acting as a lock; a transaction stages its writes and applies them
 * in one synchronous step on commit.
 */
export class InMemoryTrainingStore implements TrainingStore {
  private readonly logger = new Logger(InMemoryTrainingStore.name)
  private readonly locks = new Map<string, Promise<void>>()
  private readonly tables: Tables = {
    users: new Map(),
    races: new Map(),
    biometrics: new Map(),
    heartRateZones: new Map(),
    plans: new Map(),
    workouts: new Map(),
    trainingStates: new Map(),
    activityLogs: new Map(),
    feedbackLogs: new Map(),
    adaptationLogs: new Map(),
  }

  seedUser(user: User): void {
    this.tables.users.set(user.id, structuredClone(user))
  }

  seedRace(race: Race): void {
    this.tables.races.set(race.id, structuredClone(race))
  }

  async withUserTransaction<T>(
    userId: string,
    work: (tx: TrainingStoreTx) => Promise<T>,
    options: TransactionOptions,
  ): Promise<T> {
    const tx = new InMemoryTx(this.tables)
    const run = this.locked(userId, async () => {
      const result = await work(tx)
      if (tx.isOpen) tx.commit()
      return result
    })

    let timer: NodeJS.Timeout | undefined
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        tx.close()
        reject(new TransientStoreError(`Transaction for user ${userId} timed out after ${options.timeoutMs}ms`))
      }, options.timeoutMs)
    })

    try {
      return await Promise.race([run, timeout])
    } catch (err) {
      tx.close()
      run.catch((late: unknown) => {
        this.logger.debug(`Abandoned transaction for user ${userId} settled: ${errorMessage(late)}`)
      })
      throw err
    } finally {
      clearTimeout(timer)
    }
  }

  async listUserIdsWithActivePlans(): Promise<string[]> {
    const ids = new Set<string>()
    for (const plan of this.tables.plans.values()) {
      if (plan.status === 'active') ids.add(plan.userId)
    }
    return [...ids].sort()
  }

  async close(): Promise<void> {
    this.locks.clear()
  }

  private async locked<T>(userId: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(userId) ?? Promise.resolve()
    let release: () => void = () => undefined
    const current = new Promise<void>((resolve) => {
      release = resolve
    })
    const tail = previous.then(() => current)
    this.locks.set(userId, tail)

    await previous
    try {
      return await fn()
    } finally {
      release()
      if (this.locks.get(userId) === tail) this.locks.delete(userId)
    }
  }
}
