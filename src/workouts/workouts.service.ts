import { randomUUID } from 'crypto'
import { Inject, Injectable, Logger } from '@nestjs/common'
import { AdaptationService } from '../adaptation/adaptation.service'
import { CLOCK, type Clock } from '../clock/clock'
import { addDays, isDateKey } from '../common/dates'
import { ConflictError, NotFoundError, ValidationError } from '../common/errors'
import type { TrainingStoreTx, WorkoutQuery } from '../training-store/training-store.types'
import { UnitOfWork } from '../training-store/unit-of-work'
import type { ActivityLog, FeedbackLog, SkipReason, Workout, WorkoutStatus } from '../types/training.types'
import type {
  ActivityInput,
  CompleteWorkoutResult,
  FeedbackSubmission,
  WorkoutEventResult,
} from './workouts.types'

const COMPLETABLE: readonly WorkoutStatus[] = ['planned', 'missed']

export type WorkoutFilter = {
  from?: string
  to?: string
  status?: WorkoutStatus
}

@Injectable()
export class WorkoutsService {
  private readonly logger = new Logger(WorkoutsService.name)

  constructor(
    private readonly uow: UnitOfWork,
    private readonly adaptation: AdaptationService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async listWorkouts(userId: string, filter: WorkoutFilter = {}): Promise<Workout[]> {
    for (const key of [filter.from, filter.to]) {
      if (key !== undefined && !isDateKey(key)) throw new ValidationError(`Invalid date: ${key}`)
    }
    const query: WorkoutQuery = {
      fromDate: filter.from,
      beforeDate: filter.to ? addDays(filter.to, 1) : undefined,
      statuses: filter.status ? [filter.status] : undefined,
    }
    return this.uow.run(userId, async (tx) => {
      const plan = await tx.getActivePlan(userId)
      if (!plan) throw new NotFoundError(`No active plan for user ${userId}`)
      return tx.listWorkouts(plan.id, query)
    })
  }

  async getWorkout(userId: string, workoutId: string): Promise<Workout> {
    return this.uow.run(userId, (tx) => this.loadOwned(tx, userId, workoutId))
  }

  async completeWorkout(
    userId: string,
    workoutId: string,
    activity: ActivityInput,
    feedback?: FeedbackSubmission | null,
  ): Promise<CompleteWorkoutResult> {
    if (!Number.isFinite(activity.durationSeconds) || activity.durationSeconds <= 0) {
      throw new ValidationError('activity.durationSeconds must be a positive number')
    }
    if (feedback?.rpeScore != null && (feedback.rpeScore < 1 || feedback.rpeScore > 10)) {
      throw new ValidationError('feedback.rpeScore must be between 1 and 10')
    }

    const result = await this.uow.run(userId, async (tx) => {
      const workout = await this.loadOwned(tx, userId, workoutId)
      if (!COMPLETABLE.includes(workout.status)) {
        throw new ConflictError(`Workout ${workoutId} is already ${workout.status}`)
      }
      const now = this.clock.now().toISOString()

      const completed = await tx.updateWorkout({ ...workout, status: 'completed' })

      const activityLog: ActivityLog = {
        id: randomUUID(),
        workoutId,
        userId,
        completedAt: activity.completedAt ?? now,
        durationSeconds: activity.durationSeconds,
        distanceMeters: activity.distanceMeters ?? null,
        averageHeartRate: activity.averageHeartRate ?? null,
        source: activity.source,
      }
      await tx.insertActivityLog(activityLog)

      const outcome = await this.adaptation.recordCompletion(
        tx,
        userId,
        workout,
        activity.durationSeconds,
        feedback ?? null,
      )

      let feedbackLog: FeedbackLog | null = null
      if (feedback) {
        feedbackLog = {
          id: randomUUID(),
          activityLogId: activityLog.id,
          rating: feedback.rating,
          rpeScore: feedback.rpeScore ?? null,
          targetRpe: workout.targetRpe,
          triggeredStrike: outcome.signal !== null,
          createdAt: now,
        }
        await tx.insertFeedbackLog(feedbackLog)
      }

      return {
        outcome,
        result: {
          workout: completed,
          activityLog,
          feedbackLog,
          strike: outcome.signal,
          currentFatigueStrikes: outcome.state.currentFatigueStrikes,
          adaptation: outcome.adaptation,
        },
      }
    })

    this.logger.log(
      `workout ${workoutId} completed by user ${userId}` + (result.outcome.signal ? ` (strike: ${result.outcome.signal})` : ''),
    )
    this.adaptation.publish(result.outcome)
    return result.result
  }

  async skipWorkout(userId: string, workoutId: string, reason: SkipReason): Promise<WorkoutEventResult> {
    const result = await this.uow.run(userId, async (tx) => {
      const workout = await this.loadOwned(tx, userId, workoutId)
      if (workout.status !== 'planned') {
        throw new ConflictError(`Workout ${workoutId} is already ${workout.status}`)
      }
      const skipped = await tx.updateWorkout({ ...workout, status: 'skipped', skipReason: reason })
      const outcome = await this.adaptation.recordSkip(tx, userId, reason)
      return {
        outcome,
        result: {
          workout: skipped,
          strike: outcome.signal,
          currentFatigueStrikes: outcome.state.currentFatigueStrikes,
          adaptation: outcome.adaptation,
        },
      }
    })

    this.logger.log(`workout ${workoutId} skipped by user ${userId}: ${reason}`)
    this.adaptation.publish(result.outcome)
    return result.result
  }

  private async loadOwned(tx: TrainingStoreTx, userId: string, workoutId: string): Promise<Workout> {
    const workout = await tx.getWorkout(workoutId)
    const plan = workout ? await tx.getPlan(workout.planId) : null
    if (!workout || !plan || plan.userId !== userId) {
      throw new NotFoundError(`Workout not found: ${workoutId}`)
    }
    return workout
  }
}
