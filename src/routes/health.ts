/// <reference path="../types/router.d.ts" />
import * as micro from "micro";
import Router from "router";
import { GLOBAL_CONFIG } from "../config/params";
import Monitor from "../classes/Monitor";

const router = Router();

router.get("/", async (req, res) => {
  const { running, lastAnalysis } = Monitor.getStatus();
  return await micro.send(res, 200, {
    status: "ok",
    symbol: GLOBAL_CONFIG.CC_DEFAULT_SYMBOL,
    running,
    lastAnalysis,
  });
});

router.get("/health", async (req, res) => {
  return await micro.send(res, 200, {
    status: "healthy",
    timestamp: new Date().toISOString(),
  });
});

export default router;
