/**
 * Application Configuration
 *
 * Loaded once at startup, before the first request, and frozen. A missing API
 * key is fatal: the surrounding application should report it and exit rather
 * than start serving extractions.
 *
 * @module config
 */

import { z } from "zod";
import { ApiKeyError, ConfigError } from "./errors";
import { LOG_LEVELS, type LogLevel } from "./logger";

export const TRANSLATION_POLICIES = ["text-only", "all-fields"] as const;

export type TranslationPolicy = (typeof TRANSLATION_POLICIES)[number];

/**
 * Settings the extraction client needs to talk to the model.
 */
export interface ExtractionConfig {
    apiKey: string;
    model: string;
    temperature: number;
}

export interface PromptConfig {
    targetLanguage: string;
    translationPolicy: TranslationPolicy;
}

export interface AppConfig {
    extraction: Readonly<ExtractionConfig>;
    prompt: Readonly<PromptConfig>;
    /** DPI used when rasterizing PDF pages. */
    renderDensity: number;
    logLevel: LogLevel;
}

export const DEFAULT_MODEL = "gemini-2.5-flash";

const EnvSchema = z.object({
    GEMINI_API_KEY: z.string().trim().optional(),
    GEMINI_MODEL: z.string().trim().min(1).default(DEFAULT_MODEL),
    GEMINI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
    INVOICE_TARGET_LANGUAGE: z.string().trim().min(1).default("English"),
    INVOICE_TRANSLATION_POLICY: z.enum(TRANSLATION_POLICIES).default("text-only"),
    PDF_RENDER_DENSITY: z.coerce.number().int().min(50).max(600).default(200),
    LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

type Env = Record<string, string | undefined>;

/**
 * Validate the environment and build an immutable config.
 *
 * Empty strings count as unset, so a blank line in `.env` falls back to the
 * default instead of failing validation.
 *
 * @throws {ApiKeyError} If `GEMINI_API_KEY` is absent or blank
 * @throws {ConfigError} If any other variable has an invalid value
 */
export function loadConfig(env: Env = process.env): AppConfig {
    const present = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
    );

    const parsed = EnvSchema.safeParse(present);
    if (!parsed.success) {
        const details = parsed.error.issues
            .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
            .join("; ");
        throw new ConfigError(`Invalid configuration: ${details}`);
    }

    const values = parsed.data;
    if (!values.GEMINI_API_KEY) {
        throw new ApiKeyError(
            "GEMINI_API_KEY is required. Set it in your environment or in a .env file."
        );
    }

    return Object.freeze({
        extraction: Object.freeze({
            apiKey: values.GEMINI_API_KEY,
            model: values.GEMINI_MODEL,
            temperature: values.GEMINI_TEMPERATURE,
        }),
        prompt: Object.freeze({
            targetLanguage: values.INVOICE_TARGET_LANGUAGE,
            translationPolicy: values.INVOICE_TRANSLATION_POLICY,
        }),
        renderDensity: values.PDF_RENDER_DENSITY,
        logLevel: values.LOG_LEVEL,
    });
}
