/**
 * Extraction Pipeline
 *
 * ## The Orchestration Pattern
 *
 * This module wires the low-level pieces (Document Loader, Extraction Client,
 * Response Normalizer) into the one workflow a user action triggers:
 *
 * ```
 * UploadedDocument -> pages -> one model call -> raw text -> record
 * ```
 *
 * ## Pattern: Whole-Document, Single Call
 *
 * Every page goes to the model in one request. Invoice fields and totals
 * routinely span pages (header on page 1, totals on the last page), so the
 * model needs to see the whole document to fill one record.
 *
 * ## Failure handling
 *
 * `extract()` throws the typed errors from `errors.ts`. `run()` is the
 * boundary for the presentation layer: it never throws, and a failed outcome
 * keeps whatever was produced before the failure (pages, raw text, usage) so
 * the user can still inspect it.
 *
 * Nothing is cached between calls; each extraction is independent.
 *
 * @module extraction-pipeline
 */

import type { ZodTypeAny, z } from "zod";
import { createInvoiceExtractor, type InvoiceRecordSchema } from "../extractors/invoice";
import type { AppConfig } from "./config";
import { loadDocument, type LoadOptions } from "./document-loader";
import { ExtractionError, MalformedResponseError, wrapError } from "./errors";
import { GeminiExtractionClient, type ExtractionClient } from "./extraction-client";
import { createLogger } from "./logger";
import { normalizeResponse } from "./response-normalizer";
import type {
    ExtractionOutcome,
    ExtractionResult,
    ExtractorConfig,
    PageImage,
    RawModelResponse,
    UploadedDocument,
} from "./types";

const logger = createLogger("extraction-pipeline");

/**
 * Configuration options for the extraction pipeline.
 */
export interface ExtractionPipelineOptions<T extends ZodTypeAny> {
    /** Sends the prompt and pages to the model. */
    client: ExtractionClient;

    /** Schema and fixed prompt for the document type. */
    extractor: ExtractorConfig<T>;

    /** Passed through to the document loader. */
    load?: LoadOptions;
}

/**
 * Carries the stages that completed before a failure out of `extract()`.
 */
class StageError extends Error {
    constructor(
        readonly error: ExtractionError,
        readonly pages: PageImage[],
        readonly response?: RawModelResponse
    ) {
        super(error.message, { cause: error });
        this.name = "StageError";
    }
}

/**
 * Main orchestration class.
 *
 * @example
 * ```typescript
 * const pipeline = createInvoicePipeline(loadConfig());
 * const outcome = await pipeline.run({ bytes, mediaType: "application/pdf" });
 *
 * if (outcome.status === "success") {
 *     console.log(outcome.record.total_amount);
 * }
 * ```
 */
export class ExtractionPipeline<T extends ZodTypeAny> {
    private client: ExtractionClient;
    private extractor: ExtractorConfig<T>;
    private loadOptions: LoadOptions;

    constructor(options: ExtractionPipelineOptions<T>) {
        this.client = options.client;
        this.extractor = options.extractor;
        this.loadOptions = options.load ?? {};
    }

    /**
     * Load, call the model once, and normalize.
     *
     * @throws {DocumentDecodeError} Before any model call, if the document cannot be rendered
     * @throws {ExtractionServiceError} If the model call fails
     * @throws {MalformedResponseError} If the model output is not a JSON object
     */
    async extract(document: UploadedDocument): Promise<ExtractionResult<z.infer<T>>> {
        try {
            return await this.extractStages(document);
        } catch (error) {
            throw error instanceof StageError ? error.error : error;
        }
    }

    /**
     * Boundary entry point: never throws.
     *
     * Unanticipated errors are reported with code `UNKNOWN` and a generic
     * message; their detail goes to the log only.
     */
    async run(document: UploadedDocument): Promise<ExtractionOutcome<z.infer<T>>> {
        try {
            const result = await this.extractStages(document);
            return { status: "success", ...result };
        } catch (thrown) {
            const stage = thrown instanceof StageError ? thrown : undefined;
            const error = stage ? stage.error : wrapError(thrown);
            const known = error.code !== "UNKNOWN";

            logger.error("Extraction failed", {
                extractor: this.extractor.name,
                fileName: document.fileName,
                errorCode: error.code,
                error: error.message,
            });

            const rawText =
                stage?.response?.text ?? (error instanceof MalformedResponseError ? error.rawText : undefined);

            return {
                status: "failed",
                error: {
                    code: error.code,
                    message: known ? error.message : "An unexpected error occurred while processing the document.",
                },
                pages: stage?.pages ?? [],
                rawText,
                usage: stage?.response?.usage,
            };
        }
    }

    private async extractStages(document: UploadedDocument): Promise<ExtractionResult<z.infer<T>>> {
        const startTime = Date.now();

        logger.info("Starting extraction", {
            extractor: this.extractor.name,
            fileName: document.fileName,
            mediaType: document.mediaType,
        });

        let pages: PageImage[];
        try {
            pages = await loadDocument(document, this.loadOptions);
        } catch (error) {
            throw new StageError(wrapError(error), []);
        }

        let response: RawModelResponse;
        try {
            response = await this.client.extract(this.extractor.prompt, pages);
        } catch (error) {
            throw new StageError(wrapError(error), pages);
        }

        let record: z.infer<T>;
        try {
            record = normalizeResponse(response.text, this.extractor.schema);
        } catch (error) {
            throw new StageError(wrapError(error), pages, response);
        }

        logger.info("Extraction complete", {
            extractor: this.extractor.name,
            pageCount: pages.length,
            totalTokens: response.usage.totalTokens,
            processingTimeMs: Date.now() - startTime,
        });

        return { pages, record: freezeDeep(record), rawText: response.text, usage: response.usage };
    }
}

function freezeDeep<V>(value: V): Readonly<V> {
    if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
        for (const child of Object.values(value)) {
            freezeDeep(child);
        }
        Object.freeze(value);
    }
    return value;
}

export type InvoiceExtractionPipeline = ExtractionPipeline<typeof InvoiceRecordSchema>;

/**
 * Factory for the invoice pipeline, wired from loaded config.
 *
 * Pass `client` to substitute the model backend.
 */
export function createInvoicePipeline(
    config: AppConfig,
    client: ExtractionClient = new GeminiExtractionClient(config.extraction)
): InvoiceExtractionPipeline {
    return new ExtractionPipeline({
        client,
        extractor: createInvoiceExtractor(config.prompt),
        load: { density: config.renderDensity },
    });
}
