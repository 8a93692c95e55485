import { randomUUID } from 'crypto'
import { Inject, Injectable, Logger } from '@nestjs/common'
import { calibrationWeekSessions } from '../calibration/calibration-week'
import { CLOCK, type Clock } from '../clock/clock'
import { ConflictError, NotFoundError, ValidationError } from '../common/errors'
import { addDays, isDateKey, isoWeekday, nextMonday, toDateKey } from '../common/dates'
import { ENGINE_CONFIG, type EngineConfig } from '../config/engine.config'
import type { TrainingStoreTx } from '../training-store/training-store.types'
import { UnitOfWork } from '../training-store/unit-of-work'
import {
  DISCIPLINES,
  type Race,
  type TrainingPlan,
  type User,
  type VolumeTier,
  type Workout,
} from '../types/training.types'
import { WorkoutMaterializerService } from '../workout-materializer/workout-materializer.service'
import type { ScalarSet } from '../workout-materializer/workout-materializer.types'
import { TemplateLibrary } from '../workout-templates/workout-templates.service'
import {
  PHASE_CONFIGS,
  PRIORITY_TARGET_RPE,
  ROLE_PRIORITY,
  allocatePhases,
  phaseForWeek,
  resolveTotalWeeks,
  resolveVolumeTier,
  rolesForSessions,
  selectTemplate,
  targetDifficultyTier,
  VOLUME_TIERS,
} from './plan-policy'
import type { CreatePlanInput, SessionRequest } from './training-plan.types'
import {
  MAINTENANCE_INITIAL_WEEKS,
  maintenancePattern,
  maintenanceWeekSlots,
  selectMaintenanceTemplate,
  weeksToExtend,
} from './maintenance-plan'
import { layoutWeek } from './week-layout'
import { buildWorkout } from './workout-factory'

export type PlanView = {
  plan: TrainingPlan
  workouts: Workout[]
}

export type PlanLengthFallback = {
  /** Used when neither a race nor an explicit length is given. */
  defaultWeeks?: number
}

@Injectable()
export class TrainingPlanService {
  private readonly logger = new Logger(TrainingPlanService.name)
  private readonly inFlight = new Set<string>()

  constructor(
    private readonly uow: UnitOfWork,
    private readonly library: TemplateLibrary,
    private readonly materializer: WorkoutMaterializerService,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(ENGINE_CONFIG) private readonly config: EngineConfig,
  ) {}

  async createPlan(userId: string, input: CreatePlanInput): Promise<PlanView> {
    return this.exclusive(userId, () =>
      this.uow.run(userId, async (tx) => {
        const user = await tx.getUser(userId)
        if (!user) throw new NotFoundError(`User not found: ${userId}`)
        return this.createPlanInTx(tx, user, input)
      }),
    )
  }

  /** Replaces the active plan with a rolling maintenance block from next Monday. */
  async startMaintenancePlan(userId: string): Promise<PlanView> {
    return this.exclusive(userId, () =>
      this.uow.run(userId, async (tx) => {
        const user = await tx.getUser(userId)
        if (!user) throw new NotFoundError(`User not found: ${userId}`)
        const today = toDateKey(this.clock.now())
        return this.startMaintenanceInTx(tx, user.id, resolveVolumeTier(user), nextMonday(today))
      }),
    )
  }

  async getActivePlan(userId: string): Promise<PlanView> {
    return this.uow.run(userId, async (tx) => {
      const plan = await tx.getActivePlan(userId)
      if (!plan) throw new NotFoundError(`No active plan for user ${userId}`)
      return { plan, workouts: await tx.listWorkouts(plan.id) }
    })
  }

  /** Rejects a second plan creation for a user while one is still running. */
  async exclusive<T>(userId: string, work: () => Promise<T>): Promise<T> {
    if (this.inFlight.has(userId)) {
      throw new ConflictError(`Plan creation already in progress for user ${userId}`)
    }
    this.inFlight.add(userId)
    try {
      return await work()
    } finally {
      this.inFlight.delete(userId)
    }
  }

  async createPlanInTx(
    tx: TrainingStoreTx,
    user: User,
    input: CreatePlanInput,
    fallback: PlanLengthFallback = {},
  ): Promise<PlanView> {
    const today = toDateKey(this.clock.now())
    const startDate = this.resolveStartDate(input.startDate, today)

    const raceId = input.raceId ?? user.primaryRaceId
    let race: Race | null = null
    if (raceId) {
      race = await tx.getRace(raceId)
      if (!race) throw new NotFoundError(`Race not found: ${raceId}`)
    }

    const totalWeeks = resolveTotalWeeks({
      totalWeeks: input.totalWeeks ?? (race ? undefined : fallback.defaultWeeks),
      raceDate: race?.date,
      startDate,
    })
    const phases = allocatePhases(totalWeeks, this.config.phaseSplit)
    const volumeTier = resolveVolumeTier(user)
    const hasCalibrationWeek = user.calibrationMethod === 'calibration_week' && user.onboardingStatus !== 'COMPLETED'

    const plan: TrainingPlan = {
      id: randomUUID(),
      userId: user.id,
      name: race ? `${race.name} Plan` : `${totalWeeks}-Week Plan`,
      planType: 'race',
      raceId: race?.id ?? null,
      raceDate: race?.date ?? null,
      startDate,
      currentPhase: phaseForWeek(phases, 1),
      currentWeek: 1,
      totalWeeks,
      volumeTier,
      phases,
      hasCalibrationWeek,
      status: 'active',
      createdAt: this.clock.now().toISOString(),
    }

    const scalars = await this.materializer.loadScalars(tx, user.id)
    const workouts = this.generateWorkouts(plan, scalars)

    const previous = await tx.getActivePlan(user.id)
    if (previous) {
      await tx.updatePlan({ ...previous, status: 'archived' })
    }
    await tx.insertPlan(plan)
    await tx.insertWorkouts(workouts)

    this.logger.log(
      `created plan ${plan.id} for user ${user.id}: ${totalWeeks} weeks, tier ${volumeTier}, ` +
        `${workouts.length} workouts${hasCalibrationWeek ? ', calibration week' : ''}` +
        (previous ? `, archived ${previous.id}` : ''),
    )
    return { plan, workouts }
  }

  async startMaintenanceInTx(
    tx: TrainingStoreTx,
    userId: string,
    volumeTier: VolumeTier,
    startDate: string,
  ): Promise<PlanView> {
    const plan: TrainingPlan = {
      id: randomUUID(),
      userId,
      name: 'Maintenance Training',
      planType: 'maintenance',
      raceId: null,
      raceDate: null,
      startDate,
      currentPhase: 'BASE',
      currentWeek: 1,
      totalWeeks: MAINTENANCE_INITIAL_WEEKS,
      volumeTier,
      phases: [{ phase: 'BASE', weeks: MAINTENANCE_INITIAL_WEEKS }],
      hasCalibrationWeek: false,
      status: 'active',
      createdAt: this.clock.now().toISOString(),
    }

    const scalars = await this.materializer.loadScalars(tx, userId)
    const workouts = this.generateMaintenanceWeeks(plan, 1, scalars)

    const previous = await tx.getActivePlan(userId)
    if (previous) {
      await tx.updatePlan({ ...previous, status: 'archived' })
    }
    await tx.insertPlan(plan)
    await tx.insertWorkouts(workouts)

    this.logger.log(`started maintenance plan ${plan.id} for user ${userId} on ${startDate}, tier ${volumeTier}`)
    return { plan, workouts }
  }

  /**
   * Appends whole weeks to a maintenance plan until its last day is at least
   * two weeks past `today`. Returns the plan as stored.
   */
  async extendMaintenanceInTx(
    tx: TrainingStoreTx,
    plan: TrainingPlan,
    today: string,
  ): Promise<{ plan: TrainingPlan; weeksAdded: number }> {
    const weeksAdded = weeksToExtend(today, addDays(plan.startDate, plan.totalWeeks * 7 - 1))
    if (weeksAdded === 0) return { plan, weeksAdded }

    const totalWeeks = plan.totalWeeks + weeksAdded
    const extended: TrainingPlan = { ...plan, totalWeeks, phases: [{ phase: 'BASE', weeks: totalWeeks }] }
    const scalars = await this.materializer.loadScalars(tx, plan.userId)
    await tx.insertWorkouts(this.generateMaintenanceWeeks(extended, plan.totalWeeks + 1, scalars))
    await tx.updatePlan(extended)

    this.logger.log(`extended maintenance plan ${plan.id} by ${weeksAdded} weeks`)
    return { plan: extended, weeksAdded }
  }

  /** Weeks `fromWeek..plan.totalWeeks` of a maintenance plan. */
  generateMaintenanceWeeks(plan: TrainingPlan, fromWeek: number, scalars: ScalarSet): Workout[] {
    const workouts: Workout[] = []
    for (let week = fromWeek; week <= plan.totalWeeks; week++) {
      const pattern = maintenancePattern(week)
      const weekStart = addDays(plan.startDate, (week - 1) * 7)
      for (const slot of maintenanceWeekSlots(plan.volumeTier, pattern)) {
        const candidates = this.library.list({ discipline: slot.discipline, categories: slot.categories })
        workouts.push(
          buildWorkout(
            {
              planId: plan.id,
              weekNumber: week,
              phase: 'BASE',
              scheduledDate: addDays(weekStart, slot.dayIndex),
              template: selectMaintenanceTemplate(candidates, slot),
              priorityLevel: slot.priority,
              targetRpe: PRIORITY_TARGET_RPE[slot.priority],
              intensityScalar: pattern.intensityModifier,
              durationScale: pattern.volumeModifier,
            },
            scalars,
          ),
        )
      }
    }
    return workouts
  }

  generateWorkouts(plan: TrainingPlan, scalars: ScalarSet): Workout[] {
    const workouts: Workout[] = []
    const tier = VOLUME_TIERS[plan.volumeTier]

    for (let week = 1; week <= plan.totalWeeks; week++) {
      const phase = phaseForWeek(plan.phases, week)
      const config = PHASE_CONFIGS[phase]
      const weekStart = addDays(plan.startDate, (week - 1) * 7)

      if (week === 1 && plan.hasCalibrationWeek) {
        for (const session of calibrationWeekSessions(this.library)) {
          const isTest = session.calibrationTest !== null
          workouts.push(
            buildWorkout(
              {
                planId: plan.id,
                weekNumber: week,
                phase,
                scheduledDate: addDays(weekStart, session.dayIndex),
                template: session.template,
                priorityLevel: session.priority,
                targetRpe: session.targetRpe,
                intensityScalar: isTest ? 1 : config.intensityModifier,
                durationScale: isTest ? 1 : config.volumeModifier,
                calibrationTest: session.calibrationTest,
              },
              scalars,
            ),
          )
        }
        continue
      }

      const requests: SessionRequest[] = DISCIPLINES.flatMap((discipline) => {
        const candidates = this.library.list({ discipline })
        return rolesForSessions(tier.sessionsPerWeek[discipline]).map((role) => ({
          discipline,
          role,
          priority: ROLE_PRIORITY[role],
          template: selectTemplate(candidates, role, targetDifficultyTier(role, phase), week),
        }))
      })

      for (const session of layoutWeek(requests)) {
        workouts.push(
          buildWorkout(
            {
              planId: plan.id,
              weekNumber: week,
              phase,
              scheduledDate: addDays(weekStart, session.dayIndex),
              template: session.template,
              priorityLevel: session.priority,
              targetRpe: PRIORITY_TARGET_RPE[session.priority],
              intensityScalar: config.intensityModifier,
              durationScale: config.volumeModifier,
            },
            scalars,
          ),
        )
      }
    }

    return workouts
  }

  private resolveStartDate(requested: string | undefined, today: string): string {
    if (requested === undefined) return nextMonday(today)
    if (!isDateKey(requested)) throw new ValidationError(`startDate must be YYYY-MM-DD, got ${requested}`)
    if (isoWeekday(requested) !== 0) throw new ValidationError(`startDate must be a Monday, got ${requested}`)
    if (requested < today) throw new ValidationError(`startDate ${requested} is in the past`)
    return requested
  }
}
