import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger } from "../../src/utils/logger.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createLogger", () => {
  it("writes namespaced lines to stderr", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = createLogger("ingest", "info");

    logger.info("extracted INV-2025-0001", { total: 12027.4 });
    logger.warn("no invoices");

    expect(spy.mock.calls).toEqual([
      ["[ingest] INFO extracted INV-2025-0001", { total: 12027.4 }],
      ["[ingest] WARN no invoices"],
    ]);
  });

  it("drops messages below its level", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = createLogger("ingest", "warn");

    logger.debug("detail");
    logger.info("progress");
    logger.error("failed");

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith("[ingest] ERROR failed");
  });
});
