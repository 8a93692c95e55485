import { randomUUID } from 'crypto'
import type {
  CalibrationTestType,
  PriorityLevel,
  TrainingPhase,
  Workout,
  WorkoutTemplate,
} from '../types/training.types'
import { materializeWorkout } from '../workout-materializer/workout-materializer'
import type { ScalarSet } from '../workout-materializer/workout-materializer.types'

export type NewWorkout = {
  planId: string
  weekNumber: number
  phase: TrainingPhase
  scheduledDate: string
  template: WorkoutTemplate
  priorityLevel: PriorityLevel
  targetRpe: number
  intensityScalar: number
  durationScale: number
  calibrationTest?: CalibrationTestType | null
}

export function buildWorkout(input: NewWorkout, scalars: ScalarSet): Workout {
  const calibrationTest = input.calibrationTest ?? null
  const isCalibrationTest = calibrationTest !== null
  return {
    id: randomUUID(),
    planId: input.planId,
    templateId: input.template.id,
    templateVersion: input.template.version,
    discipline: input.template.discipline,
    weekNumber: input.weekNumber,
    phase: input.phase,
    scheduledDate: input.scheduledDate,
    priorityLevel: input.priorityLevel,
    status: 'planned',
    intensityScalar: input.intensityScalar,
    durationScale: input.durationScale,
    zoneCap: null,
    targetRpe: input.targetRpe,
    wasAdapted: false,
    isCalibrationTest,
    calibrationTest,
    skipReason: null,
    // test targets come from the result itself, so tests carry zones only
    calculatedStructure: materializeWorkout(input.template, isCalibrationTest ? {} : scalars, {
      intensityScalar: input.intensityScalar,
      durationScale: input.durationScale,
    }),
    version: 0,
  }
}
