import { Module } from '@nestjs/common'
import { NotificationsModule } from '../notifications/notifications.module'
import { WorkoutMaterializerModule } from '../workout-materializer/workout-materializer.module'
import { AdaptationController } from './adaptation.controller'
import { AdaptationService } from './adaptation.service'

@Module({
  imports: [WorkoutMaterializerModule, NotificationsModule],
  providers: [AdaptationService],
  controllers: [AdaptationController],
  exports: [AdaptationService],
})
export class AdaptationModule {}
