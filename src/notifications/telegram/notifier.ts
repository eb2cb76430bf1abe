/**
 * Telegram Notifier
 *
 * Delivers alert messages to a single chat through the grammy Bot API
 * client. Failures come back as a failed SendOutcome; nothing is thrown.
 */

import { Bot, GrammyError, HttpError } from "grammy";
import { env } from "../../../config/env";
import { NotificationDeliveryError } from "../../errors";
import { serviceLoggers, type Logger } from "../../utils/logger";
import type { Notifier, SendOutcome } from "../types";

export type TelegramParseMode = "HTML" | "Markdown" | "MarkdownV2";

export interface TelegramNotifierConfig {
  /** Bot token (default: TELEGRAM_BOT_TOKEN) */
  botToken?: string;

  /** Destination chat (default: TELEGRAM_CHAT_ID) */
  chatId?: string | number;

  /** Parse mode for outgoing messages (default: HTML) */
  parseMode?: TelegramParseMode;

  /** Deliver silently */
  disableNotification?: boolean;

  logger?: Logger;
}

export interface TelegramNotifierStats {
  sent: number;
  failed: number;
  lastSentAt: Date | null;
  lastError: string | null;
}

export class TelegramNotifier implements Notifier {
  private readonly botToken: string | undefined;
  private readonly chatId: string | number | undefined;
  private readonly parseMode: TelegramParseMode;
  private readonly disableNotification: boolean;
  private readonly logger: Logger;
  private bot: Bot | null = null;

  private stats: TelegramNotifierStats = {
    sent: 0,
    failed: 0,
    lastSentAt: null,
    lastError: null,
  };

  constructor(config: TelegramNotifierConfig = {}) {
    this.botToken = config.botToken ?? env.TELEGRAM_BOT_TOKEN;
    this.chatId = config.chatId ?? env.TELEGRAM_CHAT_ID;
    this.parseMode = config.parseMode ?? "HTML";
    this.disableNotification = config.disableNotification ?? false;
    this.logger = config.logger ?? serviceLoggers.telegram;
  }

  /**
   * Whether both a token and a destination chat are known
   */
  public isConfigured(): boolean {
    return Boolean(this.botToken) && this.chatId !== undefined && this.chatId !== "";
  }

  private getBot(token: string): Bot {
    if (!this.bot) {
      this.bot = new Bot(token);
    }
    return this.bot;
  }

  public async send(message: string): Promise<SendOutcome> {
    if (!this.botToken || this.chatId === undefined || this.chatId === "") {
      return this.fail("Telegram bot token or chat id is not configured");
    }

    try {
      const result = await this.getBot(this.botToken).api.sendMessage(this.chatId, message, {
        parse_mode: this.parseMode,
        disable_notification: this.disableNotification,
        link_preview_options: { is_disabled: true },
      });

      this.stats.sent++;
      this.stats.lastSentAt = new Date();
      this.logger.debug("Message delivered", { messageId: result.message_id });
      return { success: true, messageId: result.message_id };
    } catch (error) {
      let reason = "Failed to send message";
      if (error instanceof GrammyError) {
        reason = `Telegram API error: ${error.description}`;
      } else if (error instanceof HttpError) {
        reason = `Network error: ${error.message}`;
      } else if (error instanceof Error) {
        reason = error.message;
      }
      return this.fail(reason, error);
    }
  }

  private fail(reason: string, cause?: unknown): SendOutcome {
    this.stats.failed++;
    this.stats.lastError = reason;
    this.logger.warn("Telegram delivery failed", { error: reason });
    return { success: false, error: new NotificationDeliveryError(reason, { cause }) };
  }

  public getStats(): TelegramNotifierStats {
    return { ...this.stats };
  }
}

export function createTelegramNotifier(config: TelegramNotifierConfig = {}): TelegramNotifier {
  return new TelegramNotifier(config);
}
