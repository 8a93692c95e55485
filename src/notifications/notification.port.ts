export const NOTIFICATION_PORT = Symbol('NOTIFICATION_PORT')

/** Outbound channel to whatever delivers push notifications. */
export interface NotificationPort {
  notifyAdaptationTriggered(userId: string): Promise<void>
  notifyCalibrationComplete(userId: string): Promise<void>
}
