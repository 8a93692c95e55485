import { ValidationError } from '../common/errors'
import type { CalibrationTestType, Discipline, PriorityLevel, WorkoutTemplate } from '../types/training.types'
import { templateMaxZone } from '../workout-materializer/workout-materializer'
import type { TemplateLibrary } from '../workout-templates/workout-templates.service'

export type CalibrationSession = {
  dayIndex: number
  template: WorkoutTemplate
  priority: PriorityLevel
  targetRpe: number
  calibrationTest: CalibrationTestType | null
}

export const CALIBRATION_TESTS: Record<CalibrationTestType, { templateId: string; dayIndex: number }> = {
  swim_400m: { templateId: 'swim_calibration_400m', dayIndex: 0 },
  bike_20min: { templateId: 'bike_calibration_20min', dayIndex: 2 },
  run_1mile: { templateId: 'run_calibration_1mile', dayIndex: 4 },
}

export const CALIBRATION_TEST_ORDER: readonly CalibrationTestType[] = ['swim_400m', 'bike_20min', 'run_1mile']

const RECOVERY_DAYS: readonly { discipline: Discipline; dayIndex: number }[] = [
  { discipline: 'bike', dayIndex: 5 },
  { discipline: 'run', dayIndex: 6 },
]

const TEST_RPE = 9
const RECOVERY_RPE = 3

/** Easiest template of the discipline that never leaves zones 1-2. */
function recoveryTemplate(library: TemplateLibrary, discipline: Discipline): WorkoutTemplate {
  const pick = library
    .list({ discipline, categories: ['recovery', 'endurance'] })
    .filter((t) => templateMaxZone(t) <= 2)
    .sort((a, b) => a.difficultyTier - b.difficultyTier || a.id.localeCompare(b.id))[0]
  if (!pick) throw new ValidationError(`No zone 1-2 ${discipline} template for the calibration week`)
  return pick
}

/**
 * Week one for athletes without known scalars: swim, bike and run tests on
 * Monday, Wednesday and Friday, easy bike and run at the weekend.
 */
export function calibrationWeekSessions(library: TemplateLibrary): CalibrationSession[] {
  const tests = CALIBRATION_TEST_ORDER.map((test): CalibrationSession => ({
    dayIndex: CALIBRATION_TESTS[test].dayIndex,
    template: library.get(CALIBRATION_TESTS[test].templateId),
    priority: 2,
    targetRpe: TEST_RPE,
    calibrationTest: test,
  }))

  const recovery = RECOVERY_DAYS.map(({ discipline, dayIndex }): CalibrationSession => ({
    dayIndex,
    template: recoveryTemplate(library, discipline),
    priority: 3,
    targetRpe: RECOVERY_RPE,
    calibrationTest: null,
  }))

  return [...tests, ...recovery]
}
