import { Module } from '@nestjs/common'
import { WorkoutMaterializerModule } from '../workout-materializer/workout-materializer.module'
import { TrainingPlanController } from './training-plan.controller'
import { TrainingPlanService } from './training-plan.service'

@Module({
  imports: [WorkoutMaterializerModule],
  providers: [TrainingPlanService],
  controllers: [TrainingPlanController],
  exports: [TrainingPlanService],
})
export class TrainingPlanModule {}
