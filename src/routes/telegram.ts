/// <reference path="../types/router.d.ts" />
import * as micro from "micro";
import Router from "router";
import { errorData } from "functools-kit";
import market from "../lib";

const router = Router();

router.post("/telegram", async (req, res) => {
  try {
    const update = await micro.json(req);
    market.loggerService.log("/telegram update", { update });
  } catch (error) {
    market.loggerService.warn("/telegram malformed update", {
      error: errorData(error),
    });
  }
  return await micro.send(res, 200, { status: "ok" });
});

export default router;
