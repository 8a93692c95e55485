import { Module } from '@nestjs/common'
import { NOTIFICATION_PORT } from './notification.port'
import { LoggingNotificationPort, NotificationsService } from './notifications.service'

@Module({
  providers: [{ provide: NOTIFICATION_PORT, useClass: LoggingNotificationPort }, NotificationsService],
  exports: [NotificationsService],
})
export class NotificationsModule {}
