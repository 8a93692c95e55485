import { Module } from '@nestjs/common'
import { WorkoutMaterializerModule } from '../workout-materializer/workout-materializer.module'
import { BiometricsController } from './biometrics.controller'
import { BiometricsService } from './biometrics.service'

@Module({
  imports: [WorkoutMaterializerModule],
  providers: [BiometricsService],
  controllers: [BiometricsController],
  exports: [BiometricsService],
})
export class BiometricsModule {}
