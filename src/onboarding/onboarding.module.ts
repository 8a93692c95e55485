import { Module } from '@nestjs/common'
import { BiometricsModule } from '../biometrics/biometrics.module'
import { TrainingPlanModule } from '../training-plan/training-plan.module'
import { OnboardingController } from './onboarding.controller'
import { OnboardingService } from './onboarding.service'

@Module({
  imports: [BiometricsModule, TrainingPlanModule],
  providers: [OnboardingService],
  controllers: [OnboardingController],
})
export class OnboardingModule {}
