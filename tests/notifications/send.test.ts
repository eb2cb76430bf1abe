/**
 * Unit tests for sendWithTimeout
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import { sendWithTimeout } from "../../src/notifications/send";
import { NotificationDeliveryError } from "../../src/errors";
import type { SendOutcome } from "../../src/notifications/types";
import { createFakeNotifier } from "../helpers/series";

describe("sendWithTimeout", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("should pass a delivered outcome through", async () => {
    const notifier = createFakeNotifier({ success: true, messageId: 7 });
    expect(await sendWithTimeout(notifier, "hi", 100)).toEqual({ success: true, messageId: 7 });
  });

  it("should pass a failed outcome through unchanged", async () => {
    const error = new NotificationDeliveryError("Telegram API error: Forbidden");
    const notifier = createFakeNotifier({ success: false, error });

    const outcome = await sendWithTimeout(notifier, "hi", 100);

    expect(outcome).toEqual({ success: false, error });
  });

  it("should fold a rejection into a failed outcome", async () => {
    const notifier = createFakeNotifier();
    notifier.send.mockRejectedValueOnce(new Error("ECONNRESET"));

    const outcome = await sendWithTimeout(notifier, "hi", 100);

    expect(outcome.success).toBe(false);
    if (outcome.success) return;
    expect(outcome.error).toBeInstanceOf(NotificationDeliveryError);
    expect(outcome.error.message).toBe("ECONNRESET");
  });

  it("should fail a send that never settles", async () => {
    vi.useFakeTimers();
    const notifier = createFakeNotifier();
    notifier.send.mockImplementationOnce(() => new Promise<SendOutcome>(() => undefined));

    const pending = sendWithTimeout(notifier, "hi", 250);
    await vi.advanceTimersByTimeAsync(250);
    const outcome = await pending;

    expect(outcome.success).toBe(false);
    if (outcome.success) return;
    expect(outcome.error.message).toBe("Send timeout after 250ms");
    expect(vi.getTimerCount()).toBe(0);
  });
});
