import { Body, Controller, HttpCode, Post, UsePipes, ValidationPipe } from '@nestjs/common'
import { DailySweepDto } from './dto/daily-sweep.dto'
import { SchedulerService } from './scheduler.service'

/** Hit by the external timer once a day (00:01). */
@Controller('scheduler')
export class SchedulerController {
  constructor(private readonly schedulerService: SchedulerService) {}

  @Post('daily-sweep')
  @HttpCode(200)
  @UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true }))
  dailySweep(@Body() body: DailySweepDto) {
    return this.schedulerService.runDailySweep(body.asOf ? new Date(body.asOf) : undefined)
  }
}
