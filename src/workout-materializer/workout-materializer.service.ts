import { Injectable } from '@nestjs/common'
import type { TrainingStoreTx } from '../training-store/training-store.types'
import type { Workout } from '../types/training.types'
import { TemplateLibrary } from '../workout-templates/workout-templates.service'
import { materializeWorkout, scalarsFromBiometrics } from './workout-materializer'
import type { ScalarSet } from './workout-materializer.types'

const NO_SCALARS: ScalarSet = {}

@Injectable()
export class WorkoutMaterializerService {
  constructor(private readonly library: TemplateLibrary) {}

  async loadScalars(tx: TrainingStoreTx, userId: string): Promise<ScalarSet> {
    const [biometrics, zones] = await Promise.all([tx.getBiometrics(userId), tx.getHeartRateZones(userId)])
    return scalarsFromBiometrics(biometrics, zones)
  }

  /**
   * Rebuilds the structure from the pinned template version and the
   * workout's own modifiers. Calibration tests stay zone-only.
   */
  rematerialize(workout: Workout, scalars: ScalarSet): Workout {
    const template = this.library.get(workout.templateId, workout.templateVersion)
    return {
      ...workout,
      calculatedStructure: materializeWorkout(template, workout.isCalibrationTest ? NO_SCALARS : scalars, {
        intensityScalar: workout.intensityScalar,
        durationScale: workout.durationScale,
        zoneCap: workout.zoneCap,
      }),
    }
  }
}
