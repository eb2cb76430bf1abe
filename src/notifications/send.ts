/**
 * Bounded notifier send
 */

import { withTimeout } from "../api/market-data/provider";
import { NotificationDeliveryError, errorMessage } from "../errors";
import type { Notifier, SendOutcome } from "./types";

/**
 * Send through `notifier`, folding a rejection or a send that outlives
 * `timeoutMs` into a failed outcome
 */
export async function sendWithTimeout(
  notifier: Notifier,
  message: string,
  timeoutMs: number
): Promise<SendOutcome> {
  try {
    return await withTimeout(
      notifier.send(message),
      timeoutMs,
      () => new NotificationDeliveryError(`Send timeout after ${timeoutMs}ms`)
    );
  } catch (error) {
    return {
      success: false,
      error:
        error instanceof NotificationDeliveryError
          ? error
          : new NotificationDeliveryError(errorMessage(error), { cause: error }),
    };
  }
}
