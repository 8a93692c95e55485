import { Module } from '@nestjs/common'
import { TrainingPlanModule } from '../training-plan/training-plan.module'
import { SchedulerController } from './scheduler.controller'
import { SchedulerService } from './scheduler.service'

@Module({
  imports: [TrainingPlanModule],
  providers: [SchedulerService],
  controllers: [SchedulerController],
  exports: [SchedulerService],
})
export class SchedulerModule {}
