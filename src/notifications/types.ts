/**
 * Notification channel contract
 */

import type { NotificationDeliveryError } from "../errors";

export type SendOutcome =
  | { success: true; messageId?: number }
  | { success: false; error: NotificationDeliveryError };

/**
 * Anything that can deliver a rendered alert message. Implementations
 * resolve with a failed outcome instead of rejecting.
 */
export interface Notifier {
  send(message: string): Promise<SendOutcome>;
}
