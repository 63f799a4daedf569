import { describe, it, expect, afterEach, vi } from "vitest";
import { logger } from "../logger.js";

describe("logger", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("writes prefixed lines to stderr at info by default", () => {
    const spy = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    vi.stubEnv("SENTISCORE_LOG_LEVEL", "");

    logger.info("ready");
    logger.debug("hidden");

    expect(spy.mock.calls.map((c) => String(c[0]))).toEqual(["[sentiscore] ready\n"]);
  });

  it("picks up level changes made after import", () => {
    const spy = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    vi.stubEnv("SENTISCORE_LOG_LEVEL", "DEBUG");
    logger.debug("verbose");
    vi.stubEnv("SENTISCORE_LOG_LEVEL", "error");
    logger.warn("dropped");
    logger.error("kept");

    expect(spy.mock.calls.map((c) => String(c[0]))).toEqual([
      "[sentiscore] verbose\n",
      "[sentiscore] kept\n",
    ]);
  });

  it("treats unknown levels as info", () => {
    const spy = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    vi.stubEnv("SENTISCORE_LOG_LEVEL", "chatty");

    logger.debug("hidden");
    logger.info("shown");

    expect(spy).toHaveBeenCalledTimes(1);
  });
});
