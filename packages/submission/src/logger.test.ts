import { describe, expect, test, vi } from "vitest";
import { createLogger, resolveLogLevel, type LogSink } from "./logger";

describe("createLogger", () => {
    test("drops entries below the threshold", () => {
        const sink = vi.fn<LogSink>();
        const log = createLogger("warn", sink);
        log.debug("hidden");
        log.info("hidden");
        log.warn("shown", 42);
        expect(sink).toHaveBeenCalledTimes(1);
        const [prefix, ...args] = sink.mock.calls[0];
        expect(prefix).toMatch(/^\[md2wechat\]\[\d{4}-\d{2}-\d{2}T[^\]]+Z\]\[WARN\]$/);
        expect(args).toEqual(["shown", 42]);
    });
});

describe("resolveLogLevel", () => {
    test("honours LOG_LEVEL case-insensitively", () => {
        expect(resolveLogLevel({ LOG_LEVEL: "ERROR" })).toBe("error");
    });

    test("defaults to debug outside production and info in production", () => {
        expect(resolveLogLevel({})).toBe("debug");
        expect(resolveLogLevel({ NODE_ENV: "production" })).toBe("info");
    });

    test("falls back to info for unknown levels", () => {
        expect(resolveLogLevel({ LOG_LEVEL: "loud" })).toBe("info");
    });
});
