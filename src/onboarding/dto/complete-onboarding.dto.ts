import { Type } from 'class-transformer'
import { IsIn, IsInt, IsOptional, IsString, Matches, Max, Min, ValidateNested } from 'class-validator'
import { UpdateBiometricsDto } from '../../biometrics/dto/update-biometrics.dto'
import type { CalibrationMethod, ExperienceLevel, Gender, VolumeTier } from '../../types/training.types'

const CALIBRATION_METHODS: readonly CalibrationMethod[] = ['manual', 'calibration_week']
const EXPERIENCE_LEVELS: readonly ExperienceLevel[] = ['finisher', 'competitor']
const GENDERS: readonly Gender[] = ['male', 'female', 'other']
const VOLUME_TIERS: readonly VolumeTier[] = [1, 2, 3]

export class CompleteOnboardingDto {
  @IsIn(CALIBRATION_METHODS)
  calibrationMethod!: CalibrationMethod

  @IsOptional()
  @ValidateNested()
  @Type(() => UpdateBiometricsDto)
  manualBiometrics?: UpdateBiometricsDto

  @IsOptional()
  @IsIn(VOLUME_TIERS)
  trainingVolumeTier?: VolumeTier

  @IsOptional()
  @IsIn(EXPERIENCE_LEVELS)
  experienceLevel?: ExperienceLevel

  @IsOptional()
  @Matches(/^\d{4}-\d{2}-\d{2}$/)
  dateOfBirth?: string

  @IsOptional()
  @IsIn(GENDERS)
  gender?: Gender

  @IsOptional()
  @IsString()
  raceId?: string

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(52)
  totalWeeks?: number
}
