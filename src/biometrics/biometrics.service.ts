import { Inject, Injectable, Logger } from '@nestjs/common'
import { CLOCK, type Clock } from '../clock/clock'
import { ComputationError, NotFoundError, ValidationError } from '../common/errors'
import type { TrainingStoreTx } from '../training-store/training-store.types'
import { UnitOfWork } from '../training-store/unit-of-work'
import type { Biometrics, HeartRateZone, User } from '../types/training.types'
import { templateUsesScalar } from '../workout-materializer/workout-materializer'
import { WorkoutMaterializerService } from '../workout-materializer/workout-materializer.service'
import type { ScalarKind } from '../workout-materializer/workout-materializer.types'
import { TemplateLibrary } from '../workout-templates/workout-templates.service'
import { calculateHeartRateZones, resolveMaxHeartRate } from './biometrics-calculator'
import type { ApplyScalarsOptions, ApplyScalarsResult, ScalarPatch } from './biometrics.types'

const SCALAR_FIELDS: Record<ScalarKind, 'criticalSwimSpeed' | 'functionalThresholdPower' | 'thresholdRunPace'> = {
  css: 'criticalSwimSpeed',
  ftp: 'functionalThresholdPower',
  thresholdPace: 'thresholdRunPace',
}

const SCALAR_KINDS: readonly ScalarKind[] = ['css', 'ftp', 'thresholdPace']

function emptyBiometrics(userId: string, recordedAt: string): Biometrics {
  return {
    userId,
    criticalSwimSpeed: null,
    functionalThresholdPower: null,
    thresholdRunPace: null,
    maxHeartRate: null,
    restingHeartRate: null,
    recordedAt,
  }
}

function validatePatch(patch: ScalarPatch): void {
  for (const [field, value] of Object.entries(patch)) {
    if (value == null) continue
    if (!Number.isFinite(value) || value <= 0) {
      throw new ValidationError(`${field} must be a positive number`)
    }
  }
  if (patch.maxHeartRate != null && patch.restingHeartRate != null && patch.restingHeartRate >= patch.maxHeartRate) {
    throw new ValidationError('restingHeartRate must be below maxHeartRate')
  }
}

@Injectable()
export class BiometricsService {
  private readonly logger = new Logger(BiometricsService.name)

  constructor(
    private readonly uow: UnitOfWork,
    private readonly materializer: WorkoutMaterializerService,
    private readonly library: TemplateLibrary,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async updateBiometrics(userId: string, patch: ScalarPatch): Promise<ApplyScalarsResult> {
    validatePatch(patch)
    return this.uow.run(userId, async (tx) => {
      const user = await tx.getUser(userId)
      if (!user) throw new NotFoundError(`User not found: ${userId}`)
      return this.applyScalars(tx, user, patch, { fromWeek: 1 })
    })
  }

  async getBiometrics(userId: string): Promise<Biometrics> {
    return this.uow.run(userId, async (tx) => {
      const biometrics = await tx.getBiometrics(userId)
      if (!biometrics) throw new NotFoundError(`No biometrics recorded for user ${userId}`)
      return biometrics
    })
  }

  async getHeartRateZones(userId: string): Promise<HeartRateZone[]> {
    return this.uow.run(userId, async (tx) => {
      const zones = await tx.getHeartRateZones(userId)
      if (zones.length === 0) {
        throw new ComputationError('Heart rate zones need a max heart rate or a date of birth')
      }
      return zones
    })
  }

  /**
   * The one write path for biometrics: merge the patch, refresh HR zones
   * when their inputs moved, and re-materialize planned workouts whose
   * targets depend on a changed value. Runs inside the caller's transaction.
   */
  async applyScalars(
    tx: TrainingStoreTx,
    user: User,
    patch: ScalarPatch,
    options: ApplyScalarsOptions,
  ): Promise<ApplyScalarsResult> {
    validatePatch(patch)
    const now = this.clock.now()
    const current = (await tx.getBiometrics(user.id)) ?? emptyBiometrics(user.id, now.toISOString())
    const next: Biometrics = { ...current, recordedAt: now.toISOString() }

    const changed = new Set<ScalarKind>()
    for (const kind of SCALAR_KINDS) {
      const field = SCALAR_FIELDS[kind]
      const value = patch[field]
      if (value != null && value !== current[field]) {
        next[field] = value
        changed.add(kind)
      }
    }
    if (patch.maxHeartRate != null) next.maxHeartRate = patch.maxHeartRate
    if (patch.restingHeartRate != null) next.restingHeartRate = patch.restingHeartRate
    await tx.saveBiometrics(next)

    const previousZones = await tx.getHeartRateZones(user.id)
    const zones = this.computeZones(next, user, now) ?? previousZones
    const zonesChanged = JSON.stringify(zones) !== JSON.stringify(previousZones)
    if (zonesChanged) {
      await tx.replaceHeartRateZones(user.id, zones)
      // workouts without their discipline scalar fall back to HR targets
      for (const kind of SCALAR_KINDS) {
        if (next[SCALAR_FIELDS[kind]] == null) changed.add(kind)
      }
    }

    const rematerializedWorkoutIds =
      changed.size > 0 ? await this.rematerializeAffected(tx, user.id, changed, options.fromWeek) : []

    return { biometrics: next, heartRateZones: zones, rematerializedWorkoutIds }
  }

  /** Recompute after a date-of-birth change; a no-op when inputs are still missing. */
  async refreshHeartRateZones(tx: TrainingStoreTx, user: User): Promise<HeartRateZone[]> {
    const biometrics = (await tx.getBiometrics(user.id)) ?? emptyBiometrics(user.id, this.clock.now().toISOString())
    const zones = this.computeZones(biometrics, user, this.clock.now())
    if (!zones) return tx.getHeartRateZones(user.id)
    await tx.replaceHeartRateZones(user.id, zones)
    return zones
  }

  private computeZones(biometrics: Biometrics, user: User, now: Date): HeartRateZone[] | null {
    if (biometrics.maxHeartRate == null && !user.dateOfBirth) return null
    const maxHr = resolveMaxHeartRate(biometrics.maxHeartRate, user.dateOfBirth, now)
    return calculateHeartRateZones(maxHr, biometrics.restingHeartRate)
  }

  private async rematerializeAffected(
    tx: TrainingStoreTx,
    userId: string,
    changed: ReadonlySet<ScalarKind>,
    fromWeek: number,
  ): Promise<string[]> {
    const plan = await tx.getActivePlan(userId)
    if (!plan) return []

    const scalars = await this.materializer.loadScalars(tx, userId)
    const planned = await tx.listWorkouts(plan.id, { statuses: ['planned'] })
    const ids: string[] = []

    for (const workout of planned) {
      if (workout.isCalibrationTest || workout.weekNumber < fromWeek) continue
      const template = this.library.get(workout.templateId, workout.templateVersion)
      if (![...changed].some((kind) => templateUsesScalar(template, kind))) continue
      await tx.updateWorkout(this.materializer.rematerialize(workout, scalars))
      ids.push(workout.id)
    }

    if (ids.length > 0) {
      this.logger.log(`re-materialized ${ids.length} workouts for user ${userId} (${[...changed].join(', ')})`)
    }
    return ids
  }
}
