import { describe, it, expect } from "vitest";
import { buildLoggerOptions } from "../src/server/app.js";

describe("app", () => {
  describe("buildLoggerOptions", () => {
    it("should log to stdout only without a log file", () => {
      expect(buildLoggerOptions({ level: "info" })).toEqual({ level: "info" });
    });

    it("should rotate the log file at 5 MB keeping two backups", () => {
      expect(buildLoggerOptions({ level: "debug", file: "logs/app.log" })).toEqual({
        level: "debug",
        transport: {
          targets: [
            { target: "pino/file", level: "debug", options: { destination: 1 } },
            {
              target: "pino-roll",
              level: "debug",
              options: {
                file: "logs/app.log",
                size: "5m",
                limit: { count: 2 },
                mkdir: true,
              },
            },
          ],
        },
      });
    });
  });
});
