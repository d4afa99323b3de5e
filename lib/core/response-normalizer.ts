/**
 * Response Normalizer
 *
 * The model is told to answer with bare JSON but commonly wraps it in a
 * markdown fence. Normalization is:
 *
 * 1. `stripCodeFence` - textual pre-clean, not JSON-aware, never throws
 * 2. `JSON.parse`
 * 3. top level must be a JSON object
 * 4. schema validation, which also fills defaults
 *
 * Steps 2-4 fail with `MalformedResponseError`, which keeps the raw text.
 *
 * @module response-normalizer
 */

import type { z, ZodTypeAny } from "zod";
import { InvoiceRecordSchema, type InvoiceRecord } from "../extractors/invoice";
import { MalformedResponseError, errorMessage } from "./errors";

const LEADING_FENCE = /^```[\w+-]*/;
const TRAILING_FENCE = /```$/;

/**
 * Remove an optional leading fence (with optional language tag) and an
 * optional trailing fence, then trim. Already-clean input comes back trimmed.
 */
export function stripCodeFence(text: string): string {
    return text.trim().replace(LEADING_FENCE, "").trim().replace(TRAILING_FENCE, "").trim();
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse model output into a value of the schema's type.
 *
 * @throws {MalformedResponseError} If the cleaned text is not a JSON object or fails the schema
 */
export function normalizeResponse<T extends ZodTypeAny>(rawText: string, schema: T): z.infer<T> {
    const cleaned = stripCodeFence(rawText);

    let parsed: unknown;
    try {
        parsed = JSON.parse(cleaned);
    } catch (error) {
        throw new MalformedResponseError(
            `Failed to parse the model response as JSON: ${errorMessage(error)}`,
            rawText,
            { cause: error }
        );
    }

    if (!isJsonObject(parsed)) {
        const kind = Array.isArray(parsed) ? "array" : parsed === null ? "null" : typeof parsed;
        throw new MalformedResponseError(
            `Expected a JSON object at the top level of the model response, got ${kind}`,
            rawText
        );
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
        throw new MalformedResponseError(
            `Model response does not match the expected shape: ${result.error.message}`,
            rawText,
            { cause: result.error }
        );
    }
    return result.data;
}

export function normalizeInvoiceResponse(rawText: string): InvoiceRecord {
    return normalizeResponse(rawText, InvoiceRecordSchema);
}
