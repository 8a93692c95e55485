import { Module } from '@nestjs/common'
import { WorkoutTemplatesModule } from '../workout-templates/workout-templates.module'
import { WorkoutMaterializerService } from './workout-materializer.service'

@Module({
  imports: [WorkoutTemplatesModule],
  providers: [WorkoutMaterializerService],
  exports: [WorkoutMaterializerService, WorkoutTemplatesModule],
})
export class WorkoutMaterializerModule {}
