export {
  buildNotificationPayload,
  DEFAULT_NOTIFICATION_DESTINATION,
  describeDestination,
  encodeNotification,
  Notifier
} from './notifier'
export type { NotificationChannel, NotificationPayload, NotifierConfig } from './notifier'
