import { IsInt, IsNumber, IsOptional, IsPositive, Max, Min } from 'class-validator'

export class UpdateBiometricsDto {
  /** sec / 100m */
  @IsOptional()
  @IsNumber()
  @IsPositive()
  criticalSwimSpeed?: number

  /** watts */
  @IsOptional()
  @IsInt()
  @IsPositive()
  functionalThresholdPower?: number

  /** sec / mile */
  @IsOptional()
  @IsInt()
  @IsPositive()
  thresholdRunPace?: number

  @IsOptional()
  @IsInt()
  @Min(100)
  @Max(230)
  maxHeartRate?: number

  @IsOptional()
  @IsInt()
  @Min(25)
  @Max(120)
  restingHeartRate?: number
}
