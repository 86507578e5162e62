import { describe, expect, it } from "vitest";

import { createLogger, runLogFileName } from "./logger.js";

describe("runLogFileName", () => {
  it("stamps the file with the local run start time", () => {
    expect(runLogFileName(new Date(2026, 9, 18, 7, 5, 9, 123))).toBe("workflow_20261018_070509.log");
    expect(runLogFileName(new Date(2026, 0, 2, 23, 59, 0))).toBe("workflow_20260102_235900.log");
  });
});

describe("createLogger", () => {
  it("creates a silent logger without transports", () => {
    const logger = createLogger({ level: "silent" });

    expect(logger.level).toBe("silent");
    expect(() => logger.info("ignored")).not.toThrow();
  });
});
