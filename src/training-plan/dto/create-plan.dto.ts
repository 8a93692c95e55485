import { IsInt, IsOptional, IsString, Matches, Max, Min } from 'class-validator'

export class CreatePlanDto {
  @IsOptional()
  @IsString()
  raceId?: string

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(52)
  totalWeeks?: number

  @IsOptional()
  @Matches(/^\d{4}-\d{2}-\d{2}$/)
  startDate?: string
}
