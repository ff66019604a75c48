import { MirrorOrder, PointsHistoryEntry, TradeEvent } from './types.js';

/**
 * Structured outcome events. Formatting and delivery belong to the sink.
 */
export type NotificationEvent =
  | {
      type: 'trade_mirrored';
      userId: string;
      event: TradeEvent;
      order: MirrorOrder;
    }
  | {
      type: 'points_granted';
      userId: string;
      entry: PointsHistoryEntry;
    }
  | {
      type: 'referral_registered';
      userId: string;           // the new user
      referrerUserId: string;
      referralCode: string;
    }
  | {
      type: 'error';
      userId?: string;
      context: string;
      message: string;
    };

export type NotificationType = NotificationEvent['type'];

export interface NotificationSink {
  notify(notification: NotificationEvent): void;
}

/**
 * Default sink: one console line per event
 */
export class ConsoleNotificationSink implements NotificationSink {
  notify(notification: NotificationEvent): void {
    switch (notification.type) {
      case 'trade_mirrored': {
        const { order } = notification;
        console.log(
          `[Notify] ${notification.userId}: mirror ${order.side} ${order.requestedSize} @ ${order.price ?? 'n/a'} ` +
          `on ${notification.event.marketTitle ?? order.marketId} -> ${order.outcome.toUpperCase()}` +
          (order.detail ? ` (${order.detail})` : '')
        );
        break;
      }
      case 'points_granted':
        console.log(
          `[Notify] ${notification.userId}: +${notification.entry.pointsEarned} points (${notification.entry.pointsType}) ${notification.entry.description}`
        );
        break;
      case 'referral_registered':
        console.log(
          `[Notify] ${notification.userId} joined with code ${notification.referralCode} from ${notification.referrerUserId}`
        );
        break;
      case 'error':
        console.error(
          `[Notify] Error in ${notification.context}${notification.userId ? ` for ${notification.userId}` : ''}: ${notification.message}`
        );
        break;
    }
  }
}
