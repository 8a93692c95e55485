import { IsIn, IsOptional, Matches } from 'class-validator'
import type { WorkoutStatus } from '../../types/training.types'

const WORKOUT_STATUSES: readonly WorkoutStatus[] = ['planned', 'completed', 'missed', 'skipped']

export class ListWorkoutsQuery {
  @IsOptional()
  @Matches(/^\d{4}-\d{2}-\d{2}$/)
  from?: string

  /** inclusive */
  @IsOptional()
  @Matches(/^\d{4}-\d{2}-\d{2}$/)
  to?: string

  @IsOptional()
  @IsIn(WORKOUT_STATUSES)
  status?: WorkoutStatus
}
