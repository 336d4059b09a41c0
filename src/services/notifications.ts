// src/services/notifications.ts
import { logger } from "../logger";

export type NotificationKind =
  | "booking_confirmed"
  | "booking_cancelled"
  | "booking_completed"
  | "payment_completed"
  | "payment_refunded"
  | "invoice_sent";

export type Notification = {
  kind: NotificationKind;
  userId: string;
  subject: string;
  data?: Record<string, unknown>;
};

export interface Notifier {
  send(notification: Notification): Promise<void>;
}

/** Writes notifications to the application log; stands in for e-mail/SMS delivery. */
export class LoggingNotifier implements Notifier {
  async send(n: Notification) {
    logger.info({ notification: n.kind, userId: n.userId, ...n.data }, n.subject);
  }
}

/** Delivery never fails the operation that triggered it. */
export async function notify(notifier: Notifier, notification: Notification) {
  try {
    await notifier.send(notification);
  } catch (err) {
    logger.warn({ err, notification: notification.kind }, "notification delivery failed");
  }
}
