import { addNotifier } from "../../../../function/add";
import market from "../../../index";

describe("NotifierGlobalService", () => {
  test("delivers to every notifier and skips the failing ones", async () => {
    const received: string[] = [];
    addNotifier({
      notifierName: "memory",
      send: async (report, symbol) => {
        received.push(`${symbol}: ${report}`);
        return true;
      },
    });
    addNotifier({
      notifierName: "unconfigured",
      send: async () => false,
    });
    addNotifier({
      notifierName: "failing",
      send: async () => {
        throw new Error("network down");
      },
    });
    const delivered = await market.notifierGlobalService.broadcast(
      "# report",
      "ETH/USDT"
    );
    expect(delivered).toEqual(["memory"]);
    expect(received).toEqual(["ETH/USDT: # report"]);
  });
});
