import { randomUUID } from 'crypto'
import { Inject, Injectable, Logger } from '@nestjs/common'
import { CLOCK, type Clock } from '../clock/clock'
import { toDateKey } from '../common/dates'
import { NotificationsService } from '../notifications/notifications.service'
import type { TrainingStoreTx } from '../training-store/training-store.types'
import { UnitOfWork } from '../training-store/unit-of-work'
import type {
  AdaptationLog,
  AdaptationTriggerReason,
  SkipReason,
  UserTrainingState,
  Workout,
} from '../types/training.types'
import { WorkoutMaterializerService } from '../workout-materializer/workout-materializer.service'
import type { FatigueStatus, FeedbackInput, StrikeOutcome, StrikeSignal } from './adaptation.types'
import {
  INTENSITY_CUT,
  INTENSITY_CUT_COUNT,
  RECOVERY_TARGET_RPE,
  RECOVERY_ZONE_CAP,
  STRIKES_TO_ADAPT,
  TRIGGER_REASON,
  VOLUME_CUT,
  VOLUME_CUT_COUNT,
  applyCleanCompletion,
  applyLoad,
  applyStrike,
  evaluateFeedback,
  evaluateSkip,
  initialTrainingState,
  roundScalar,
  sessionLoad,
} from './strike-rules'

const RECENT_ADAPTATIONS = 5

@Injectable()
export class AdaptationService {
  private readonly logger = new Logger(AdaptationService.name)

  constructor(
    private readonly uow: UnitOfWork,
    private readonly materializer: WorkoutMaterializerService,
    private readonly notifications: NotificationsService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  /** Completed session: update load, then count at most one strike from its feedback. */
  async recordCompletion(
    tx: TrainingStoreTx,
    userId: string,
    workout: Workout,
    durationSeconds: number,
    feedback: FeedbackInput | null,
  ): Promise<StrikeOutcome> {
    const state = await this.loadState(tx, userId)
    const loaded = applyLoad(state, sessionLoad(durationSeconds, feedback?.rpeScore ?? workout.targetRpe))
    const signal = feedback ? evaluateFeedback(feedback, workout.targetRpe) : null

    if (!signal) {
      const saved = await tx.saveTrainingState(this.touch(applyCleanCompletion(loaded)))
      return { signal: null, state: saved, adaptation: null }
    }
    return this.strike(tx, loaded, signal)
  }

  async recordSkip(tx: TrainingStoreTx, userId: string, reason: SkipReason): Promise<StrikeOutcome> {
    const state = await this.loadState(tx, userId)
    const signal = evaluateSkip(reason)
    if (!signal) {
      const saved = await tx.saveTrainingState(this.touch({ ...state, consecutiveCompletes: 0 }))
      return { signal: null, state: saved, adaptation: null }
    }
    return this.strike(tx, state, signal)
  }

  /** Call once the transaction holding `outcome` has committed. */
  publish(outcome: StrikeOutcome): void {
    if (outcome.adaptation) {
      this.notifications.adaptationTriggered(outcome.adaptation.userId)
    }
  }

  async getFatigueStatus(userId: string): Promise<FatigueStatus> {
    return this.uow.run(userId, async (tx) => {
      const state = (await tx.getTrainingState(userId)) ?? initialTrainingState(userId, this.clock.now().toISOString())
      const logs = await tx.listAdaptationLogs(userId)
      return {
        currentFatigueStrikes: state.currentFatigueStrikes,
        strikesToAdapt: STRIKES_TO_ADAPT,
        lastStrikeDate: state.lastStrikeDate,
        lastAdaptationDate: state.lastAdaptationDate,
        totalAdaptations: state.totalAdaptations,
        consecutiveCompletes: state.consecutiveCompletes,
        acuteTrainingLoad: state.acuteTrainingLoad,
        chronicTrainingLoad: state.chronicTrainingLoad,
        trainingStressBalance: Math.round((state.chronicTrainingLoad - state.acuteTrainingLoad) * 100) / 100,
        recentAdaptations: logs.slice(-RECENT_ADAPTATIONS),
      }
    })
  }

  private async loadState(tx: TrainingStoreTx, userId: string): Promise<UserTrainingState> {
    return (await tx.getTrainingState(userId)) ?? initialTrainingState(userId, this.clock.now().toISOString())
  }

  private touch(state: UserTrainingState): UserTrainingState {
    return { ...state, updatedAt: this.clock.now().toISOString() }
  }

  private async strike(tx: TrainingStoreTx, state: UserTrainingState, signal: StrikeSignal): Promise<StrikeOutcome> {
    const today = toDateKey(this.clock.now())
    const struck = applyStrike(state, today)

    if (struck.currentFatigueStrikes < STRIKES_TO_ADAPT) {
      const saved = await tx.saveTrainingState(this.touch(struck))
      return { signal, state: saved, adaptation: null }
    }

    const adaptation = await this.adapt(tx, state.userId, TRIGGER_REASON[signal], struck.currentFatigueStrikes, today)
    const saved = await tx.saveTrainingState(
      this.touch({
        ...struck,
        currentFatigueStrikes: 0,
        lastAdaptationDate: today,
        totalAdaptations: struck.totalAdaptations + 1,
      }),
    )
    return { signal, state: saved, adaptation }
  }

  /**
   * Softens the upcoming block: the next hard sessions lose 15 % intensity
   * and the next long session becomes a half-length zone 1-2 outing. Having
   * fewer candidates than wanted is recorded, never an error.
   */
  private async adapt(
    tx: TrainingStoreTx,
    userId: string,
    triggerReason: AdaptationTriggerReason,
    strikesAtTrigger: number,
    today: string,
  ): Promise<AdaptationLog> {
    const plan = await tx.getActivePlan(userId)
    const upcoming = plan
      ? (await tx.listWorkouts(plan.id, { statuses: ['planned'], fromDate: today })).filter(
          (w) => !w.isCalibrationTest && !w.wasAdapted,
        )
      : []
    const scalars = await this.materializer.loadScalars(tx, userId)

    const intensityCuts: string[] = []
    for (const w of upcoming.filter((w) => w.priorityLevel === 2).slice(0, INTENSITY_CUT_COUNT)) {
      const cut = { ...w, intensityScalar: roundScalar(w.intensityScalar * INTENSITY_CUT), wasAdapted: true }
      await tx.updateWorkout(this.materializer.rematerialize(cut, scalars))
      intensityCuts.push(w.id)
    }

    const volumeConversions: string[] = []
    for (const w of upcoming.filter((w) => w.priorityLevel === 1).slice(0, VOLUME_CUT_COUNT)) {
      const converted: Workout = {
        ...w,
        durationScale: roundScalar(w.durationScale * VOLUME_CUT),
        zoneCap: RECOVERY_ZONE_CAP,
        targetRpe: Math.min(w.targetRpe ?? RECOVERY_TARGET_RPE, RECOVERY_TARGET_RPE),
        wasAdapted: true,
      }
      await tx.updateWorkout(this.materializer.rematerialize(converted, scalars))
      volumeConversions.push(w.id)
    }

    const shortfall = {
      intensityCuts: INTENSITY_CUT_COUNT - intensityCuts.length,
      volumeConversions: VOLUME_CUT_COUNT - volumeConversions.length,
    }
    if (shortfall.intensityCuts > 0 || shortfall.volumeConversions > 0) {
      this.logger.warn(
        `adaptation shortfall for user ${userId}: ${shortfall.intensityCuts} intensity cuts, ` +
          `${shortfall.volumeConversions} volume conversions unavailable`,
      )
    }

    const log: AdaptationLog = {
      id: randomUUID(),
      userId,
      triggeredAt: this.clock.now().toISOString(),
      triggerReason,
      fatigueStrikesAtTrigger: strikesAtTrigger,
      workoutsAffected: intensityCuts.length + volumeConversions.length,
      actionsTaken: { intensityCuts, volumeConversions, shortfall, notificationRequested: true },
    }
    await tx.insertAdaptationLog(log)

    this.logger.log(
      `adaptation ${log.id} for user ${userId} (${triggerReason}): ${log.workoutsAffected} workouts adjusted`,
    )
    return log
  }
}
