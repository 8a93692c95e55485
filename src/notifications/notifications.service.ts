import { Inject, Injectable, Logger } from '@nestjs/common'
import { errorMessage } from '../common/errors'
import { NOTIFICATION_PORT, type NotificationPort } from './notification.port'

/** Default port: no transport configured, just a log line. */
@Injectable()
export class LoggingNotificationPort implements NotificationPort {
  private readonly logger = new Logger('Notifications')

  async notifyAdaptationTriggered(userId: string): Promise<void> {
    this.logger.log(`adaptation triggered for user ${userId}`)
  }

  async notifyCalibrationComplete(userId: string): Promise<void> {
    this.logger.log(`calibration complete for user ${userId}`)
  }
}

/**
 * Fire-and-forget wrapper. Callers never await delivery and a failing
 * transport only produces a warning.
 */
@Injectable()
export class NotificationsService {
  private readonly logger = new Logger(NotificationsService.name)

  constructor(@Inject(NOTIFICATION_PORT) private readonly port: NotificationPort) {}

  adaptationTriggered(userId: string): void {
    this.dispatch('adaptation', userId, () => this.port.notifyAdaptationTriggered(userId))
  }

  calibrationComplete(userId: string): void {
    this.dispatch('calibration', userId, () => this.port.notifyCalibrationComplete(userId))
  }

  private dispatch(kind: string, userId: string, send: () => Promise<void>): void {
    Promise.resolve()
      .then(send)
      .catch((err: unknown) => {
        this.logger.warn(`${kind} notification for user ${userId} failed: ${errorMessage(err)}`)
      })
  }
}
