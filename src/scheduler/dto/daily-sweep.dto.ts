import { IsISO8601, IsOptional } from 'class-validator'

export class DailySweepDto {
  @IsOptional()
  @IsISO8601()
  asOf?: string
}
