import { Module } from '@nestjs/common'
import { BiometricsModule } from '../biometrics/biometrics.module'
import { NotificationsModule } from '../notifications/notifications.module'
import { CalibrationController } from './calibration.controller'
import { CalibrationService } from './calibration.service'

@Module({
  imports: [BiometricsModule, NotificationsModule],
  providers: [CalibrationService],
  controllers: [CalibrationController],
})
export class CalibrationModule {}
