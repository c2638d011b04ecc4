import { describe, expect, it } from "vitest";
import { createLogger } from "../src/logger.js";

describe("logger", () => {
  function capture(level = "info") {
    const lines: string[] = [];
    const logger = createLogger({ level }, { write: (line: string) => void lines.push(line) });
    return { logger, lines };
  }

  it("writes bigint fields as decimal strings", () => {
    const { logger, lines } = capture();

    logger.info({ amount: 340282366920938463463374607431768211455n, nested: { value: 7n } }, "settled");

    const entry = JSON.parse(lines[0]);
    expect(entry.msg).toBe("settled");
    expect(entry.amount).toBe("340282366920938463463374607431768211455");
    expect(entry.nested).toEqual({ value: "7" });
  });

  it("redacts key material", () => {
    const { logger, lines } = capture();

    logger.info({ secretKey: [1, 2, 3], custody: { privateKey: "test-secret" } }, "loaded");

    const entry = JSON.parse(lines[0]);
    expect(entry.secretKey).toBe("[REDACTED]");
    expect(entry.custody.privateKey).toBe("[REDACTED]");
  });

  it("drops entries below the configured level", () => {
    const { logger, lines } = capture("warn");

    logger.info("quiet");
    logger.warn("loud");

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0]).msg).toBe("loud");
  });
});
