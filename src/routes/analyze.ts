/// <reference path="../types/router.d.ts" />
import * as micro from "micro";
import Router from "router";
import { ServerResponse } from "http";
import { errorData, getErrorMessage } from "functools-kit";
import { GLOBAL_CONFIG } from "../config/params";
import Monitor from "../classes/Monitor";
import normalizeSymbol from "../utils/normalizeSymbol";
import market from "../lib";

const router = Router();

const ANALYZE_FN = async (res: ServerResponse, value: string) => {
  const symbol = normalizeSymbol(value || GLOBAL_CONFIG.CC_DEFAULT_SYMBOL);
  try {
    const { report, analysis } = await Monitor.run(symbol, "manual_request");
    market.loggerService.log("/analyze ok", { symbol });
    return await micro.send(res, 200, {
      symbol,
      analysis: report,
      timestamp: analysis.when.toISOString(),
      type: "manual_request",
    });
  } catch (error) {
    market.loggerService.warn("/analyze error", {
      symbol,
      error: errorData(error),
    });
    return await micro.send(res, 500, {
      error: getErrorMessage(error),
    });
  }
};

router.get("/analyze", async (req, res) => {
  return await ANALYZE_FN(res, GLOBAL_CONFIG.CC_DEFAULT_SYMBOL);
});

router.get("/analyze/:symbol", async (req, res) => {
  return await ANALYZE_FN(res, String(req.params?.symbol ?? ""));
});

export default router;
