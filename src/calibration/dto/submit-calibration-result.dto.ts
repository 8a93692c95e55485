import { IsIn, IsNumber, IsPositive } from 'class-validator'
import type { CalibrationTestType } from '../../types/training.types'
import { CALIBRATION_TEST_ORDER } from '../calibration-week'

export class SubmitCalibrationResultDto {
  @IsIn(CALIBRATION_TEST_ORDER)
  testType!: CalibrationTestType

  /** seconds for swim_400m and run_1mile, watts for bike_20min */
  @IsNumber()
  @IsPositive()
  rawValue!: number
}
