import { describe, it, expect, vi, afterEach } from "vitest";
import { resolveLogLevel } from "../../lib/core/logger";

describe("resolveLogLevel", () => {
    it("should fall back to info when unset or blank", () => {
        expect(resolveLogLevel(undefined)).toBe("info");
        expect(resolveLogLevel("")).toBe("info");
        expect(resolveLogLevel("   ")).toBe("info");
    });

    it("should accept known levels regardless of case and padding", () => {
        expect(resolveLogLevel(" DEBUG ")).toBe("debug");
        expect(resolveLogLevel("silent")).toBe("silent");
    });

    it("should fall back to info for unknown levels", () => {
        expect(resolveLogLevel("verbose")).toBe("info");
    });
});

describe("logger startup", () => {
    afterEach(() => {
        vi.unstubAllEnvs();
        vi.resetModules();
    });

    it("should load the pipeline when LOG_LEVEL is blank", async () => {
        vi.resetModules();
        vi.stubEnv("LOG_LEVEL", "");

        const pipeline = await import("../../lib/core/extraction-pipeline");

        expect(typeof pipeline.createInvoicePipeline).toBe("function");
    });

    it("should load the pipeline when LOG_LEVEL is unknown", async () => {
        vi.resetModules();
        vi.stubEnv("LOG_LEVEL", "verbose");

        const logger = await import("../../lib/core/logger");

        expect(() => logger.createLogger("test").debug("hello")).not.toThrow();
    });
});
