import { singleshot } from "functools-kit";
import { addNotifier } from "../function/add";
import { GLOBAL_CONFIG } from "../config/params";
import ClientTelegram from "../client/ClientTelegram";
import market from "../lib";

const GET_CLIENT_FN = singleshot(
  () =>
    new ClientTelegram({
      token: GLOBAL_CONFIG.CC_TELEGRAM_BOT_TOKEN,
      chatId: GLOBAL_CONFIG.CC_TELEGRAM_CHAT_ID,
      apiUrl: GLOBAL_CONFIG.CC_TELEGRAM_API_URL,
      chunkSize: GLOBAL_CONFIG.CC_REPORT_CHUNK_SIZE,
      chunkDelay: GLOBAL_CONFIG.CC_REPORT_CHUNK_DELAY_MS,
      logger: market.loggerService,
    })
);

/**
 * Registers the Telegram chat from `CC_TELEGRAM_BOT_TOKEN` and
 * `CC_TELEGRAM_CHAT_ID` as a report destination.
 */
export const addTelegramNotifier = () => {
  addNotifier({
    notifierName: "telegram",
    send: (report) => GET_CLIENT_FN().send(report),
  });
};

export default addTelegramNotifier;
