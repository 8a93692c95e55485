import { Logger } from '@nestjs/common'
import { Pool, type PoolClient } from 'pg'
import { ConflictError, TransientStoreError, errorMessage } from '../common/errors'
import type {
  ActivityLog,
  AdaptationLog,
  Biometrics,
  CalculatedStructure,
  FeedbackLog,
  HeartRateZone,
  PhaseBlock,
  Race,
  TrainingPlan,
  User,
  UserTrainingState,
  Workout,
} from '../types/training.types'
import type { TrainingStore, TrainingStoreTx, TransactionOptions, WorkoutQuery } from './training-store.types'

// SQLSTATEs worth one more attempt: serialization, deadlock, statement/lock timeout, shutdown
const TRANSIENT_CODES = new Set(['40001', '40P01', '57014', '55P03', '57P01', 'ECONNRESET', 'ECONNREFUSED'])

function isTransient(err: unknown): boolean {
  if (typeof err !== 'object' || err === null || !('code' in err) || typeof err.code !== 'string') {
    return false
  }
  return TRANSIENT_CODES.has(err.code) || err.code.startsWith('08')
}

const iso = (d: Date): string => d.toISOString()

type UserRow = {
  id: string
  gender: User['gender']
  calibration_method: User['calibrationMethod']
  training_volume_tier: User['trainingVolumeTier']
  experience_level: User['experienceLevel']
  onboarding_status: User['onboardingStatus']
  date_of_birth: string | null
  primary_race_id: string | null
}

type PlanRow = {
  id: string
  user_id: string
  name: string
  plan_type: TrainingPlan['planType']
  race_id: string | null
  race_date: string | null
  start_date: string
  current_phase: TrainingPlan['currentPhase']
  current_week: number
  total_weeks: number
  volume_tier: TrainingPlan['volumeTier']
  phases: PhaseBlock[]
  has_calibration_week: boolean
  status: TrainingPlan['status']
  created_at: Date
}

type WorkoutRow = {
  id: string
  plan_id: string
  template_id: string
  template_version: number
  discipline: Workout['discipline']
  week_number: number
  phase: Workout['phase']
  scheduled_date: string
  priority_level: Workout['priorityLevel']
  status: Workout['status']
  intensity_scalar: number
  duration_scale: number
  zone_cap: Workout['zoneCap']
  target_rpe: number | null
  was_adapted: boolean
  is_calibration_test: boolean
  calibration_test: Workout['calibrationTest']
  skip_reason: Workout['skipReason']
  calculated_structure: CalculatedStructure
  version: number
}

type StateRow = {
  user_id: string
  current_fatigue_strikes: number
  last_strike_date: string | null
  last_adaptation_date: string | null
  total_adaptations: number
  consecutive_completes: number
  acute_training_load: number
  chronic_training_load: number
  version: number
  updated_at: Date
}

type AdaptationRow = {
  id: string
  user_id: string
  triggered_at: Date
  trigger_reason: AdaptationLog['triggerReason']
  fatigue_strikes_at_trigger: number
  workouts_affected: number
  actions_taken: AdaptationLog['actionsTaken']
}

const PLAN_COLUMNS = `id, user_id, name, plan_type, race_id, race_date::text AS race_date, start_date::text AS start_date,
  current_phase, current_week, total_weeks, volume_tier, phases, has_calibration_week, status, created_at`

const WORKOUT_COLUMNS = `id, plan_id, template_id, template_version, discipline, week_number, phase,
  scheduled_date::text AS scheduled_date, priority_level, status, intensity_scalar, duration_scale, zone_cap,
  target_rpe, was_adapted, is_calibration_test, calibration_test, skip_reason, calculated_structure, version`

function toPlan(r: PlanRow): TrainingPlan {
  return {
    id: r.id,
    userId: r.user_id,
    name: r.name,
    planType: r.plan_type,
    raceId: r.race_id,
    raceDate: r.race_date,
    startDate: r.start_date,
    currentPhase: r.current_phase,
    currentWeek: r.current_week,
    totalWeeks: r.total_weeks,
    volumeTier: r.volume_tier,
    phases: r.phases,
    hasCalibrationWeek: r.has_calibration_week,
    status: r.status,
    createdAt: iso(r.created_at),
  }
}

function toWorkout(r: WorkoutRow): Workout {
  return {
    id: r.id,
    planId: r.plan_id,
    templateId: r.template_id,
    templateVersion: r.template_version,
    discipline: r.discipline,
    weekNumber: r.week_number,
    phase: r.phase,
    scheduledDate: r.scheduled_date,
    priorityLevel: r.priority_level,
    status: r.status,
    intensityScalar: r.intensity_scalar,
    durationScale: r.duration_scale,
    zoneCap: r.zone_cap,
    targetRpe: r.target_rpe,
    wasAdapted: r.was_adapted,
    isCalibrationTest: r.is_calibration_test,
    calibrationTest: r.calibration_test,
    skipReason: r.skip_reason,
    calculatedStructure: r.calculated_structure,
    version: r.version,
  }
}

function toState(r: StateRow): UserTrainingState {
  return {
    userId: r.user_id,
    currentFatigueStrikes: r.current_fatigue_strikes,
    lastStrikeDate: r.last_strike_date,
    lastAdaptationDate: r.last_adaptation_date,
    totalAdaptations: r.total_adaptations,
    consecutiveCompletes: r.consecutive_completes,
    acuteTrainingLoad: r.acute_training_load,
    chronicTrainingLoad: r.chronic_training_load,
    version: r.version,
    updatedAt: iso(r.updated_at),
  }
}

class PostgresTx implements TrainingStoreTx {
  constructor(private readonly client: PoolClient) {}

  async getUser(userId: string): Promise<User | null> {
    const { rows } = await this.client.query<UserRow>(
      `SELECT id, calibration_method, training_volume_tier, experience_level, onboarding_status,
              date_of_birth::text AS date_of_birth, gender, primary_race_id
         FROM users WHERE id = $1`,
      [userId],
    )
    const r = rows[0]
    if (!r) return null
    return {
      id: r.id,
      calibrationMethod: r.calibration_method,
      trainingVolumeTier: r.training_volume_tier,
      experienceLevel: r.experience_level,
      onboardingStatus: r.onboarding_status,
      dateOfBirth: r.date_of_birth,
      gender: r.gender,
      primaryRaceId: r.primary_race_id,
    }
  }

  async saveUser(user: User): Promise<void> {
    await this.client.query(
      `INSERT INTO users (id, calibration_method, training_volume_tier, experience_level, onboarding_status,
                          date_of_birth, gender, primary_race_id)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       ON CONFLICT (id) DO UPDATE SET
         calibration_method = EXCLUDED.calibration_method,
         training_volume_tier = EXCLUDED.training_volume_tier,
         experience_level = EXCLUDED.experience_level,
         onboarding_status = EXCLUDED.onboarding_status,
         date_of_birth = EXCLUDED.date_of_birth,
         gender = EXCLUDED.gender,
         primary_race_id = EXCLUDED.primary_race_id`,
      [
        user.id,
        user.calibrationMethod,
        user.trainingVolumeTier,
        user.experienceLevel,
        user.onboardingStatus,
        user.dateOfBirth,
        user.gender,
        user.primaryRaceId,
      ],
    )
  }

  async getRace(raceId: string): Promise<Race | null> {
    const { rows } = await this.client.query<Race>(
      `SELECT id, name, race_date::text AS date, distance FROM races WHERE id = $1`,
      [raceId],
    )
    return rows[0] ?? null
  }

  async getBiometrics(userId: string): Promise<Biometrics | null> {
    const { rows } = await this.client.query<Omit<Biometrics, 'recordedAt'> & { recordedAt: Date }>(
      `SELECT user_id AS "userId", critical_swim_speed AS "criticalSwimSpeed",
              functional_threshold_power AS "functionalThresholdPower", threshold_run_pace AS "thresholdRunPace",
              max_heart_rate AS "maxHeartRate", resting_heart_rate AS "restingHeartRate", recorded_at AS "recordedAt"
         FROM biometrics WHERE user_id = $1`,
      [userId],
    )
    const r = rows[0]
    return r ? { ...r, recordedAt: iso(r.recordedAt) } : null
  }

  async saveBiometrics(b: Biometrics): Promise<void> {
    await this.client.query(
      `INSERT INTO biometrics (user_id, critical_swim_speed, functional_threshold_power, threshold_run_pace,
                               max_heart_rate, resting_heart_rate, recorded_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       ON CONFLICT (user_id) DO UPDATE SET
         critical_swim_speed = EXCLUDED.critical_swim_speed,
         functional_threshold_power = EXCLUDED.functional_threshold_power,
         threshold_run_pace = EXCLUDED.threshold_run_pace,
         max_heart_rate = EXCLUDED.max_heart_rate,
         resting_heart_rate = EXCLUDED.resting_heart_rate,
         recorded_at = EXCLUDED.recorded_at`,
      [
        b.userId,
        b.criticalSwimSpeed,
        b.functionalThresholdPower,
        b.thresholdRunPace,
        b.maxHeartRate,
        b.restingHeartRate,
        b.recordedAt,
      ],
    )
  }

  async getHeartRateZones(userId: string): Promise<HeartRateZone[]> {
    const { rows } = await this.client.query<HeartRateZone>(
      `SELECT zone_number AS "zoneNumber", min_hr AS "minHr", max_hr AS "maxHr", method
         FROM heart_rate_zones WHERE user_id = $1 ORDER BY zone_number`,
      [userId],
    )
    return rows
  }

  async replaceHeartRateZones(userId: string, zones: readonly HeartRateZone[]): Promise<void> {
    await this.client.query(`DELETE FROM heart_rate_zones WHERE user_id = $1`, [userId])
    for (const z of zones) {
      await this.client.query(
        `INSERT INTO heart_rate_zones (user_id, zone_number, min_hr, max_hr, method) VALUES ($1, $2, $3, $4, $5)`,
        [userId, z.zoneNumber, z.minHr, z.maxHr, z.method],
      )
    }
  }

  async getPlan(planId: string): Promise<TrainingPlan | null> {
    const { rows } = await this.client.query<PlanRow>(`SELECT ${PLAN_COLUMNS} FROM training_plans WHERE id = $1`, [
      planId,
    ])
    const r = rows[0]
    return r ? toPlan(r) : null
  }

  async getActivePlan(userId: string): Promise<TrainingPlan | null> {
    const { rows } = await this.client.query<PlanRow>(
      `SELECT ${PLAN_COLUMNS} FROM training_plans WHERE user_id = $1 AND status = 'active'`,
      [userId],
    )
    const r = rows[0]
    return r ? toPlan(r) : null
  }

  async insertPlan(p: TrainingPlan): Promise<void> {
    await this.client.query(
      `INSERT INTO training_plans (id, user_id, name, plan_type, race_id, race_date, start_date, current_phase,
                                   current_week, total_weeks, volume_tier, phases, has_calibration_week, status,
                                   created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15)`,
      [
        p.id,
        p.userId,
        p.name,
        p.planType,
        p.raceId,
        p.raceDate,
        p.startDate,
        p.currentPhase,
        p.currentWeek,
        p.totalWeeks,
        p.volumeTier,
        JSON.stringify(p.phases),
        p.hasCalibrationWeek,
        p.status,
        p.createdAt,
      ],
    )
  }

  async updatePlan(p: TrainingPlan): Promise<void> {
    await this.client.query(
      `UPDATE training_plans
          SET current_phase = $2, current_week = $3, status = $4, total_weeks = $5, phases = $6
        WHERE id = $1`,
      [p.id, p.currentPhase, p.currentWeek, p.status, p.totalWeeks, JSON.stringify(p.phases)],
    )
  }

  async getWorkout(workoutId: string): Promise<Workout | null> {
    const { rows } = await this.client.query<WorkoutRow>(`SELECT ${WORKOUT_COLUMNS} FROM workouts WHERE id = $1`, [
      workoutId,
    ])
    const r = rows[0]
    return r ? toWorkout(r) : null
  }

  async listWorkouts(planId: string, query: WorkoutQuery = {}): Promise<Workout[]> {
    const where = ['plan_id = $1']
    const params: unknown[] = [planId]
    const add = (clause: string, value: unknown) => {
      params.push(value)
      where.push(clause.replace('?', `$${params.length}`))
    }
    if (query.statuses) add('status = ANY(?)', [...query.statuses])
    if (query.fromDate) add('scheduled_date >= ?', query.fromDate)
    if (query.beforeDate) add('scheduled_date < ?', query.beforeDate)
    if (query.onDate) add('scheduled_date = ?', query.onDate)

    const { rows } = await this.client.query<WorkoutRow>(
      `SELECT ${WORKOUT_COLUMNS} FROM workouts WHERE ${where.join(' AND ')}
        ORDER BY scheduled_date, priority_level, id`,
      params,
    )
    return rows.map(toWorkout)
  }

  async insertWorkouts(workouts: readonly Workout[]): Promise<void> {
    for (const w of workouts) {
      await this.client.query(
        `INSERT INTO workouts (id, plan_id, template_id, template_version, discipline, week_number, phase,
                               scheduled_date, priority_level, status, intensity_scalar, duration_scale, zone_cap,
                               target_rpe, was_adapted, is_calibration_test, calibration_test, skip_reason,
                               calculated_structure, version)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18, $19, $20)`,
        [
          w.id,
          w.planId,
          w.templateId,
          w.templateVersion,
          w.discipline,
          w.weekNumber,
          w.phase,
          w.scheduledDate,
          w.priorityLevel,
          w.status,
          w.intensityScalar,
          w.durationScale,
          w.zoneCap,
          w.targetRpe,
          w.wasAdapted,
          w.isCalibrationTest,
          w.calibrationTest,
          w.skipReason,
          JSON.stringify(w.calculatedStructure),
          w.version,
        ],
      )
    }
  }

  async updateWorkout(w: Workout): Promise<Workout> {
    const { rows } = await this.client.query<WorkoutRow>(
      `UPDATE workouts SET scheduled_date = $3, priority_level = $4, status = $5, intensity_scalar = $6,
              duration_scale = $7, zone_cap = $8, target_rpe = $9, was_adapted = $10, skip_reason = $11,
              calculated_structure = $12, template_version = $13, version = version + 1
        WHERE id = $1 AND version = $2
        RETURNING ${WORKOUT_COLUMNS}`,
      [
        w.id,
        w.version,
        w.scheduledDate,
        w.priorityLevel,
        w.status,
        w.intensityScalar,
        w.durationScale,
        w.zoneCap,
        w.targetRpe,
        w.wasAdapted,
        w.skipReason,
        JSON.stringify(w.calculatedStructure),
        w.templateVersion,
      ],
    )
    const r = rows[0]
    if (!r) throw new ConflictError(`Workout ${w.id} was modified concurrently`)
    return toWorkout(r)
  }

  async deleteWorkout(workoutId: string): Promise<void> {
    await this.client.query(`DELETE FROM workouts WHERE id = $1`, [workoutId])
  }

  async getTrainingState(userId: string): Promise<UserTrainingState | null> {
    const { rows } = await this.client.query<StateRow>(
      `SELECT user_id, current_fatigue_strikes, last_strike_date::text AS last_strike_date,
              last_adaptation_date::text AS last_adaptation_date, total_adaptations, consecutive_completes,
              acute_training_load, chronic_training_load, version, updated_at
         FROM user_training_state WHERE user_id = $1`,
      [userId],
    )
    const r = rows[0]
    return r ? toState(r) : null
  }

  async saveTrainingState(s: UserTrainingState): Promise<UserTrainingState> {
    const params = [
      s.userId,
      s.currentFatigueStrikes,
      s.lastStrikeDate,
      s.lastAdaptationDate,
      s.totalAdaptations,
      s.consecutiveCompletes,
      s.acuteTrainingLoad,
      s.chronicTrainingLoad,
      s.version,
      s.updatedAt,
    ]
    const result =
      s.version === 0
        ? await this.client.query(
            `INSERT INTO user_training_state (user_id, current_fatigue_strikes, last_strike_date, last_adaptation_date,
                                              total_adaptations, consecutive_completes, acute_training_load,
                                              chronic_training_load, version, updated_at)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9 + 1, $10)
             ON CONFLICT (user_id) DO NOTHING`,
            params,
          )
        : await this.client.query(
            `UPDATE user_training_state SET current_fatigue_strikes = $2, last_strike_date = $3,
                    last_adaptation_date = $4, total_adaptations = $5, consecutive_completes = $6,
                    acute_training_load = $7, chronic_training_load = $8, version = $9 + 1, updated_at = $10
              WHERE user_id = $1 AND version = $9`,
            params,
          )
    if (result.rowCount !== 1) {
      throw new ConflictError(`Training state for ${s.userId} was modified concurrently`)
    }
    return { ...s, version: s.version + 1 }
  }

  async insertActivityLog(a: ActivityLog): Promise<void> {
    await this.client.query(
      `INSERT INTO activity_logs (id, workout_id, user_id, completed_at, duration_seconds, distance_meters,
                                  average_heart_rate, source)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
      [a.id, a.workoutId, a.userId, a.completedAt, a.durationSeconds, a.distanceMeters, a.averageHeartRate, a.source],
    )
  }

  async insertFeedbackLog(f: FeedbackLog): Promise<void> {
    await this.client.query(
      `INSERT INTO feedback_logs (id, activity_log_id, rating, rpe_score, target_rpe, triggered_strike, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [f.id, f.activityLogId, f.rating, f.rpeScore, f.targetRpe, f.triggeredStrike, f.createdAt],
    )
  }

  async insertAdaptationLog(l: AdaptationLog): Promise<void> {
    await this.client.query(
      `INSERT INTO adaptation_logs (id, user_id, triggered_at, trigger_reason, fatigue_strikes_at_trigger,
                                    workouts_affected, actions_taken)
       VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [
        l.id,
        l.userId,
        l.triggeredAt,
        l.triggerReason,
        l.fatigueStrikesAtTrigger,
        l.workoutsAffected,
        JSON.stringify(l.actionsTaken),
      ],
    )
  }

  async listAdaptationLogs(userId: string): Promise<AdaptationLog[]> {
    const { rows } = await this.client.query<AdaptationRow>(
      `SELECT id, user_id, triggered_at, trigger_reason, fatigue_strikes_at_trigger, workouts_affected, actions_taken
         FROM adaptation_logs WHERE user_id = $1 ORDER BY triggered_at`,
      [userId],
    )
    return rows.map((r) => ({
      id: r.id,
      userId: r.user_id,
      triggeredAt: iso(r.triggered_at),
      triggerReason: r.trigger_reason,
      fatigueStrikesAtTrigger: r.fatigue_strikes_at_trigger,
      workoutsAffected: r.workouts_affected,
      actionsTaken: r.actions_taken,
    }))
  }
}

/**
 * node-postgres store. A user's transactions are serialized by a
 * transaction-scoped advisory lock on the user id.
 */
export class PostgresTrainingStore implements TrainingStore {
  private readonly logger = new Logger(PostgresTrainingStore.name)

  static fromUrl(connectionString: string): PostgresTrainingStore {
    return new PostgresTrainingStore(new Pool({ connectionString }))
  }

  constructor(private readonly pool: Pool) {
    // idle clients that lose their connection report here; without a listener the process dies
    this.pool.on('error', (err) => {
      this.logger.error(`Idle database connection failed: ${errorMessage(err)}`)
    })
  }

  async withUserTransaction<T>(
    userId: string,
    work: (tx: TrainingStoreTx) => Promise<T>,
    options: TransactionOptions,
  ): Promise<T> {
    let client: PoolClient
    try {
      client = await this.pool.connect()
    } catch (err) {
      throw new TransientStoreError(`Could not acquire a database connection: ${errorMessage(err)}`, err)
    }

    try {
      await client.query('BEGIN')
      await client.query(`SELECT set_config('statement_timeout', $1, true), set_config('lock_timeout', $1, true)`, [
        String(options.timeoutMs),
      ])
      await client.query('SELECT pg_advisory_xact_lock(hashtextextended($1, 0))', [userId])
      const result = await work(new PostgresTx(client))
      await client.query('COMMIT')
      return result
    } catch (err) {
      await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
        this.logger.warn(`Rollback failed for user ${userId}: ${errorMessage(rollbackErr)}`)
      })
      if (isTransient(err)) {
        throw new TransientStoreError(`Transaction for user ${userId} failed: ${errorMessage(err)}`, err)
      }
      throw err
    } finally {
      client.release()
    }
  }

  async listUserIdsWithActivePlans(): Promise<string[]> {
    const { rows } = await this.pool.query<{ user_id: string }>(
      `SELECT DISTINCT user_id FROM training_plans WHERE status = 'active' ORDER BY user_id`,
    )
    return rows.map((r) => r.user_id)
  }

  async close(): Promise<void> {
    await this.pool.end()
  }
}
