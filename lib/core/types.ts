/**
 * Core Types
 *
 * Shared shapes that flow through the extraction pipeline. Everything here is
 * request-scoped: nothing is cached or shared between two extractions.
 *
 * @module types
 */

import type { ZodTypeAny } from "zod";

/**
 * The raw file as received from the upload boundary.
 */
export interface UploadedDocument {
    /** File contents. Never mutated by the pipeline. */
    bytes: Uint8Array;
    /** Declared media type, e.g. `application/pdf` or `image/png`. */
    mediaType: string;
    fileName?: string;
}

/**
 * One rendered page, the unit of input to the extraction model.
 */
export interface PageImage {
    /** 1-based position in the source document. */
    pageNumber: number;
    data: Uint8Array;
    mimeType: string;
    width: number;
    height: number;
}

/**
 * Token counters reported by the model provider, passed through unchanged.
 */
export interface TokenUsage {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
}

export interface RawModelResponse {
    /** Unprocessed model output. */
    text: string;
    usage: TokenUsage;
    finishReason?: string;
}

/**
 * Configuration for a specific extraction type.
 *
 * The schema is responsible for shape validation and for filling defaults,
 * so the normalizer can stay generic.
 */
export interface ExtractorConfig<T extends ZodTypeAny> {
    /** Unique name for this extractor */
    name: string;
    /** Human-readable description */
    description: string;
    /** Schema applied to the parsed model output */
    schema: T;
    /** Fixed instruction text sent ahead of the page images */
    prompt: string;
}

/**
 * A fully successful extraction. The record is frozen, nested values included.
 */
export interface ExtractionResult<T> {
    pages: PageImage[];
    record: Readonly<T>;
    rawText: string;
    usage: TokenUsage;
}

export interface ExtractionFailure {
    code: string;
    message: string;
}

/**
 * What the presentation layer receives for one user action.
 *
 * A failed outcome still carries whatever was produced before the failure:
 * pages once loading succeeded, raw text and usage once the model answered.
 */
export type ExtractionOutcome<T> =
    | ({ status: "success" } & ExtractionResult<T>)
    | {
          status: "failed";
          error: ExtractionFailure;
          pages: PageImage[];
          rawText?: string;
          usage?: TokenUsage;
      };
