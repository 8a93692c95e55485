import { IsIn } from 'class-validator'
import type { SkipReason } from '../../types/training.types'

const SKIP_REASONS: readonly SkipReason[] = ['too_tired', 'sick', 'schedule_conflict', 'other']

export class SkipWorkoutDto {
  @IsIn(SKIP_REASONS)
  reason!: SkipReason
}
