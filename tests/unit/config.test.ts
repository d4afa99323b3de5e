import { describe, it, expect } from "vitest";
import { loadConfig } from "../../lib/core/config";
import { ApiKeyError, ConfigError } from "../../lib/core/errors";

describe("loadConfig", () => {
    it("should apply defaults when only the API key is set", () => {
        const config = loadConfig({ GEMINI_API_KEY: "test-key" });

        expect(config).toEqual({
            extraction: { apiKey: "test-key", model: "gemini-2.5-flash", temperature: 0.1 },
            prompt: { targetLanguage: "English", translationPolicy: "text-only" },
            renderDensity: 200,
            logLevel: "info",
        });
    });

    it("should read every variable", () => {
        const config = loadConfig({
            GEMINI_API_KEY: "test-key",
            GEMINI_MODEL: "gemini-2.0-flash",
            GEMINI_TEMPERATURE: "0.3",
            INVOICE_TARGET_LANGUAGE: "German",
            INVOICE_TRANSLATION_POLICY: "all-fields",
            PDF_RENDER_DENSITY: "300",
            LOG_LEVEL: "debug",
        });

        expect(config.extraction).toEqual({ apiKey: "test-key", model: "gemini-2.0-flash", temperature: 0.3 });
        expect(config.prompt).toEqual({ targetLanguage: "German", translationPolicy: "all-fields" });
        expect(config.renderDensity).toBe(300);
        expect(config.logLevel).toBe("debug");
    });

    it("should be immutable once loaded", () => {
        const config = loadConfig({ GEMINI_API_KEY: "test-key" });

        expect(Object.isFrozen(config)).toBe(true);
        expect(Object.isFrozen(config.extraction)).toBe(true);
        expect(Object.isFrozen(config.prompt)).toBe(true);
    });

    it("should fail with ApiKeyError when the key is missing or blank", () => {
        expect(() => loadConfig({})).toThrow(ApiKeyError);
        expect(() => loadConfig({ GEMINI_API_KEY: "   " })).toThrow(ApiKeyError);
    });

    it("should treat blank optional values as unset", () => {
        const config = loadConfig({ GEMINI_API_KEY: "test-key", GEMINI_MODEL: "", LOG_LEVEL: " " });

        expect(config.extraction.model).toBe("gemini-2.5-flash");
        expect(config.logLevel).toBe("info");
    });

    it("should fail with ConfigError on invalid values", () => {
        expect(() =>
            loadConfig({ GEMINI_API_KEY: "test-key", INVOICE_TRANSLATION_POLICY: "everything" })
        ).toThrow(ConfigError);
        expect(() => loadConfig({ GEMINI_API_KEY: "test-key", GEMINI_TEMPERATURE: "hot" })).toThrow(
            /GEMINI_TEMPERATURE/
        );
    });
});
