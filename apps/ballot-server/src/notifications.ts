import type { Notification } from '@quorum/shared-types';
import { Components } from '@quorum/shared-types';
import { log } from '@quorum/logger';

export type NotificationListener = (notification: Notification) => void;

/**
 * Observer list for ballot notifications. Delivery is synchronous and in
 * publish order, which is mutation order. A failing listener is logged and
 * skipped; the mutation it was told about stays committed.
 */
export class NotificationHub {
  private listeners: NotificationListener[] = [];

  subscribe(listener: NotificationListener): () => void {
    this.listeners = [...this.listeners, listener];
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  publish(notification: Notification): void {
    for (const listener of this.listeners) {
      try {
        listener(notification);
      } catch (err) {
        log('error', Components.BALLOT, 'notification.listener_failed', {
          type: notification.type,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }
}
