/// <reference path="../types/router.d.ts" />
import * as micro from "micro";
import Router from "router";
import { GLOBAL_CONFIG } from "../config/params";
import Monitor from "../classes/Monitor";

const router = Router();

router.get("/status", async (req, res) => {
  const { running, cycles, lastAnalysis, lastError, nextAnalysisInMinutes } =
    Monitor.getStatus();
  return await micro.send(res, 200, {
    status: running ? "running" : "stopped",
    symbol: GLOBAL_CONFIG.CC_DEFAULT_SYMBOL,
    symbols: GLOBAL_CONFIG.CC_SYMBOLS,
    timeframes: GLOBAL_CONFIG.CC_TIMEFRAMES,
    intervalMinutes: GLOBAL_CONFIG.CC_ANALYSIS_INTERVAL_MINUTES,
    telegramConfigured:
      !!GLOBAL_CONFIG.CC_TELEGRAM_BOT_TOKEN &&
      !!GLOBAL_CONFIG.CC_TELEGRAM_CHAT_ID,
    cycles,
    lastAnalysis,
    lastError,
    nextAnalysisInMinutes,
  });
});

export default router;
