import { fetchApi, sleep } from "functools-kit";
import { ILogger } from "../interfaces/Logger.interface";
import splitReport from "../utils/splitReport";

export interface ITelegramParams {
  token: string;
  chatId: string;
  /** Bot API base URL, without the trailing slash */
  apiUrl: string;
  /** Longest message sent in one part */
  chunkSize: number;
  /** Pause between two parts of one report (in milliseconds) */
  chunkDelay: number;
  logger: ILogger;
}

interface ITelegramResponse {
  ok?: boolean;
  description?: string;
}

/**
 * Telegram Bot API sender.
 *
 * Long reports are split on line boundaries and sent part by part.
 *
 * @example
 * ```typescript
 * const telegram = new ClientTelegram({
 *   token: process.env.CC_TELEGRAM_BOT_TOKEN,
 *   chatId: process.env.CC_TELEGRAM_CHAT_ID,
 *   apiUrl: "https://api.telegram.org",
 *   chunkSize: 4000,
 *   chunkDelay: 1000,
 *   logger,
 * });
 * await telegram.send(report);
 * ```
 */
export class ClientTelegram {
  constructor(readonly params: ITelegramParams) {}

  public get isConfigured() {
    return !!this.params.token && !!this.params.chatId;
  }

  /**
   * @throws Error when the Bot API rejects the message
   */
  public async sendMessage(text: string): Promise<void> {
    this.params.logger.debug("ClientTelegram sendMessage", {
      chatId: this.params.chatId,
      length: text.length,
    });
    const response: ITelegramResponse = await fetchApi(
      `${this.params.apiUrl}/bot${this.params.token}/sendMessage`,
      {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          chat_id: this.params.chatId,
          text,
          parse_mode: "Markdown",
        }),
      }
    );
    if (response.ok === false) {
      throw new Error(
        `ClientTelegram sendMessage rejected: ${response.description ?? "unknown error"}`
      );
    }
  }

  /**
   * Resolves `false` without sending when the token or chat id is missing.
   */
  public async send(report: string): Promise<boolean> {
    if (!this.isConfigured) {
      this.params.logger.warn("ClientTelegram send skipped: not configured");
      return false;
    }
    const parts = splitReport(report, this.params.chunkSize);
    this.params.logger.info("ClientTelegram send", { parts: parts.length });
    for (let i = 0; i !== parts.length; i++) {
      if (i > 0) {
        await sleep(this.params.chunkDelay);
      }
      await this.sendMessage(parts[i]);
    }
    return true;
  }
}

export default ClientTelegram;
