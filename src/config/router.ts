/// <reference path="../types/router.d.ts" />
import * as micro from "micro";
import Router from "router";
import finalhandler from "finalhandler";

import health from "../routes/health";
import status from "../routes/status";
import analyze from "../routes/analyze";
import telegram from "../routes/telegram";

const router = Router();

router.use(health);
router.use(status);
router.use(analyze);
router.use(telegram);

/**
 * Request listener of the HTTP surface.
 *
 * @example
 * ```typescript
 * http.createServer(handler).listen(8000);
 * ```
 */
export const handler = micro.serve(async (req, res) => {
  res.setHeader("Access-Control-Allow-Origin", "*");
  res.setHeader("Access-Control-Allow-Headers", "*");
  res.setHeader("Access-Control-Allow-Methods", "GET,POST");

  return router(req, res, finalhandler(req, res));
});

export default handler;
