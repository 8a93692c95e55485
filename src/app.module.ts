import { Module } from '@nestjs/common'
import { AdaptationModule } from './adaptation/adaptation.module'
import { AppController } from './app.controller'
import { BiometricsModule } from './biometrics/biometrics.module'
import { CalibrationModule } from './calibration/calibration.module'
import { ClockModule } from './clock/clock.module'
import { ConfigModule } from './config/config.module'
import { OnboardingModule } from './onboarding/onboarding.module'
import { SchedulerModule } from './scheduler/scheduler.module'
import { TrainingPlanModule } from './training-plan/training-plan.module'
import { TrainingStoreModule } from './training-store/training-store.module'
import { WorkoutsModule } from './workouts/workouts.module'

@Module({
  imports: [
    ConfigModule,
    ClockModule,
    TrainingStoreModule,
    BiometricsModule,
    TrainingPlanModule,
    CalibrationModule,
    AdaptationModule,
    WorkoutsModule,
    OnboardingModule,
    SchedulerModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
