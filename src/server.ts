#!/usr/bin/env node
import http from "http";
import winston from "winston";
import { getErrorMessage } from "functools-kit";

import handler from "./config/router";
import {
  CC_LOG_LEVEL,
  CC_WWWROOT_HOST,
  CC_WWWROOT_PORT,
  GLOBAL_CONFIG,
} from "./config/params";
import { setLogger } from "./function/setup";
import { listenError, listenExit } from "./function/event";
import addCcxtExchanges from "./helpers/addCcxtExchanges";
import addCoinGeckoContext from "./helpers/addCoinGeckoContext";
import addTelegramNotifier from "./helpers/addTelegramNotifier";
import Monitor from "./classes/Monitor";

const logger = winston.createLogger({
  level: CC_LOG_LEVEL,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.simple()
  ),
  transports: [new winston.transports.Console()],
});

setLogger({
  log: (topic, ...args) => logger.log("info", topic, { args }),
  debug: (topic, ...args) => logger.debug(topic, { args }),
  info: (topic, ...args) => logger.info(topic, { args }),
  warn: (topic, ...args) => logger.warn(topic, { args }),
});

addCcxtExchanges();
addCoinGeckoContext();
addTelegramNotifier();

listenError((error) => logger.warn(`analysis cycle failed: ${getErrorMessage(error)}`));
listenExit((error) => logger.error(`monitor stopped: ${getErrorMessage(error)}`));

const server = http.createServer(handler);

server.listen(CC_WWWROOT_PORT, CC_WWWROOT_HOST, () => {
  logger.info(`listening on http://${CC_WWWROOT_HOST}:${CC_WWWROOT_PORT}`);
  const stop = Monitor.background(GLOBAL_CONFIG.CC_DEFAULT_SYMBOL);
  process.once("SIGINT", () => {
    stop();
    server.close();
  });
});
