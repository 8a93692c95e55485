import { Inject, Injectable, Logger } from '@nestjs/common'
import { CLOCK, type Clock } from '../clock/clock'
import { daysBetween, mondayOnOrAfter, toDateKey } from '../common/dates'
import { errorMessage } from '../common/errors'
import { ENGINE_CONFIG, type EngineConfig } from '../config/engine.config'
import { phaseForWeek } from '../training-plan/plan-policy'
import { TrainingPlanService } from '../training-plan/training-plan.service'
import { TRAINING_STORE, type TrainingStore, type TrainingStoreTx } from '../training-store/training-store.types'
import { UnitOfWork } from '../training-store/unit-of-work'
import type { TrainingPlan, Workout } from '../types/training.types'
import { byImportance, decideMissedWorkout, findRelocationDay, planEndDate } from './missed-workout-policy'
import type { SweepOptions, SweepSummary, UserSweepResult } from './scheduler.types'

@Injectable()
export class SchedulerService {
  private readonly logger = new Logger(SchedulerService.name)

  constructor(
    @Inject(TRAINING_STORE) private readonly store: TrainingStore,
    private readonly uow: UnitOfWork,
    private readonly trainingPlans: TrainingPlanService,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(ENGINE_CONFIG) private readonly config: EngineConfig,
  ) {}

  /**
   * Reconciles every active plan as of `asOf`. Users are independent units of
   * work: one failing is logged and skipped, and an abort stops the sweep
   * between users. Safe to run more than once a day.
   */
  async runDailySweep(asOf: Date = this.clock.now(), options: SweepOptions = {}): Promise<SweepSummary> {
    const today = toDateKey(asOf)
    const userIds = await this.store.listUserIdsWithActivePlans()
    const summary: SweepSummary = {
      date: today,
      usersTotal: userIds.length,
      usersProcessed: 0,
      failures: [],
      cancelled: false,
      deleted: 0,
      swapped: 0,
      markedMissed: 0,
      plansCompleted: 0,
      maintenanceStarted: 0,
      weeksAdded: 0,
    }

    const queue = [...userIds]
    const worker = async () => {
      for (let userId = queue.shift(); userId !== undefined; userId = queue.shift()) {
        if (options.signal?.aborted) {
          summary.cancelled = true
          return
        }
        try {
          const result = await this.reconcileUser(userId, today)
          summary.usersProcessed++
          summary.deleted += result.deleted.length + result.displacedDeleted.length
          summary.swapped += result.swapped.length
          summary.markedMissed += result.markedMissed.length
          if (result.planCompleted) summary.plansCompleted++
          if (result.maintenancePlanStarted) summary.maintenanceStarted++
          summary.weeksAdded += result.weeksAdded
        } catch (err) {
          this.logger.error(`sweep failed for user ${userId}: ${errorMessage(err)}`)
          summary.failures.push({ userId, error: errorMessage(err) })
        }
      }
    }

    const concurrency = Math.max(1, Math.min(this.config.sweepConcurrency, userIds.length))
    await Promise.all(Array.from({ length: concurrency }, worker))

    this.logger.log(
      `daily sweep ${today}: ${summary.usersProcessed}/${summary.usersTotal} users, ` +
        `${summary.swapped} swapped, ${summary.deleted} deleted, ${summary.markedMissed} missed, ` +
        `${summary.plansCompleted} plans completed, ${summary.weeksAdded} maintenance weeks added, ` +
        `${summary.failures.length} failed${summary.cancelled ? ', cancelled' : ''}`,
    )
    return summary
  }

  async reconcileUser(userId: string, today: string): Promise<UserSweepResult> {
    return this.uow.run(userId, async (tx) => {
      const result: UserSweepResult = {
        userId,
        deleted: [],
        swapped: [],
        relocated: [],
        displacedDeleted: [],
        markedMissed: [],
        planCompleted: false,
        maintenancePlanStarted: null,
        weeksAdded: 0,
      }
      const plan = await tx.getActivePlan(userId)
      if (!plan) return result

      await this.reconcileMissed(tx, plan, today, result)
      await this.advanceProgress(tx, plan, today, result)
      return result
    })
  }

  private async reconcileMissed(
    tx: TrainingStoreTx,
    plan: TrainingPlan,
    today: string,
    result: UserSweepResult,
  ): Promise<void> {
    const missed = await tx.listWorkouts(plan.id, { statuses: ['planned'], beforeDate: today })
    if (missed.length === 0) return

    let todays = await tx.listWorkouts(plan.id, { statuses: ['planned'], onDate: today })
    let upcoming = await tx.listWorkouts(plan.id, { statuses: ['planned'], fromDate: today })
    const planEnd = planEndDate(plan)
    const movedIn = new Set<string>()

    for (const workout of [...missed].sort(byImportance)) {
      const decision = decideMissedWorkout(workout, todays, movedIn)

      switch (decision.action) {
        case 'delete':
          await tx.deleteWorkout(workout.id)
          result.deleted.push(workout.id)
          break

        case 'markMissed':
          await tx.updateWorkout({ ...workout, status: 'missed' })
          result.markedMissed.push(workout.id)
          break

        case 'swap': {
          const { displaced } = decision
          const moved = await tx.updateWorkout({ ...workout, scheduledDate: today })
          result.swapped.push(workout.id)
          movedIn.add(moved.id)
          todays = [...todays.filter((w) => w.id !== displaced.id), moved]

          const day = findRelocationDay(displaced, upcoming, today, planEnd)
          if (day) {
            const relocated = await tx.updateWorkout({ ...displaced, scheduledDate: day })
            result.relocated.push(displaced.id)
            upcoming = [...upcoming.filter((w) => w.id !== displaced.id), relocated, moved]
          } else {
            await tx.deleteWorkout(displaced.id)
            result.displacedDeleted.push(displaced.id)
            upcoming = [...upcoming.filter((w) => w.id !== displaced.id), moved]
          }
          break
        }
      }
    }

    this.logger.log(
      `user ${plan.userId} ${today}: ${result.swapped.length} swapped, ${result.deleted.length} deleted, ` +
        `${result.markedMissed.length} missed`,
    )
  }

  /**
   * Moves the plan's week/phase pointer. A race plan past its last day is
   * completed and followed by a maintenance plan from the coming Monday;
   * a maintenance plan is topped up instead of ever ending.
   */
  private async advanceProgress(
    tx: TrainingStoreTx,
    plan: TrainingPlan,
    today: string,
    result: UserSweepResult,
  ): Promise<void> {
    let current = plan
    if (plan.planType === 'maintenance') {
      const extension = await this.trainingPlans.extendMaintenanceInTx(tx, plan, today)
      current = extension.plan
      result.weeksAdded = extension.weeksAdded
    } else if (daysBetween(plan.startDate, today) >= plan.totalWeeks * 7) {
      await tx.updatePlan({ ...plan, status: 'completed' })
      result.planCompleted = true
      this.logger.log(`plan ${plan.id} for user ${plan.userId} completed`)

      const next = await this.trainingPlans.startMaintenanceInTx(
        tx,
        plan.userId,
        plan.volumeTier,
        mondayOnOrAfter(today),
      )
      result.maintenancePlanStarted = next.plan.id
      return
    }

    const elapsedDays = daysBetween(current.startDate, today)
    const currentWeek = Math.min(current.totalWeeks, Math.max(1, Math.floor(elapsedDays / 7) + 1))
    const currentPhase = phaseForWeek(current.phases, currentWeek)
    if (currentWeek !== current.currentWeek || currentPhase !== current.currentPhase) {
      await tx.updatePlan({ ...current, currentWeek, currentPhase })
    }
  }
}
