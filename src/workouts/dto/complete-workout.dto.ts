import { Type } from 'class-transformer'
import {
  IsIn,
  IsInt,
  IsISO8601,
  IsNumber,
  IsOptional,
  IsPositive,
  Max,
  Min,
  ValidateNested,
} from 'class-validator'
import type { ActivitySource, FeedbackRating } from '../../types/training.types'

const ACTIVITY_SOURCES: readonly ActivitySource[] = ['manual_input', 'apple_health', 'active_mode_recording']
const FEEDBACK_RATINGS: readonly FeedbackRating[] = ['easier', 'same', 'harder']

export class ActivityDto {
  @IsInt()
  @IsPositive()
  durationSeconds!: number

  @IsOptional()
  @IsNumber()
  @IsPositive()
  distanceMeters?: number

  @IsOptional()
  @IsInt()
  @Min(30)
  @Max(240)
  averageHeartRate?: number

  @IsOptional()
  @IsISO8601()
  completedAt?: string

  @IsIn(ACTIVITY_SOURCES)
  source!: ActivitySource
}

export class FeedbackDto {
  @IsIn(FEEDBACK_RATINGS)
  rating!: FeedbackRating

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(10)
  rpeScore?: number
}

export class CompleteWorkoutDto {
  @ValidateNested()
  @Type(() => ActivityDto)
  activity!: ActivityDto

  @IsOptional()
  @ValidateNested()
  @Type(() => FeedbackDto)
  feedback?: FeedbackDto
}
