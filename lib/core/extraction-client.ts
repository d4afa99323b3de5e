/**
 * Extraction Client
 *
 * Sends the prompt and every page image to the model in a single multimodal
 * message and hands back the raw text plus token usage.
 *
 * Exactly one call per extraction: the AI SDK's built-in retries are turned
 * off (`maxRetries: 0`) and nothing is streamed. A failed call is terminal
 * for the request.
 *
 * @module extraction-client
 */

import { generateText, type ImagePart, type TextPart } from "ai";
import { createGoogleGenerativeAI } from "@ai-sdk/google";
import type { ExtractionConfig } from "./config";
import { ExtractionServiceError, errorMessage } from "./errors";
import { createLogger } from "./logger";
import type { PageImage, RawModelResponse } from "./types";

const logger = createLogger("extraction-client");

/**
 * Anything that can turn a prompt plus page images into model output.
 */
export interface ExtractionClient {
    extract(prompt: string, pages: readonly PageImage[]): Promise<RawModelResponse>;
}

/**
 * Gemini-backed client built on the Vercel AI SDK.
 *
 * @example
 * ```typescript
 * const client = new GeminiExtractionClient(config.extraction);
 * const { text, usage } = await client.extract(INVOICE_PROMPT, pages);
 * ```
 */
export class GeminiExtractionClient implements ExtractionClient {
    private google: ReturnType<typeof createGoogleGenerativeAI>;
    private model: string;
    private temperature: number;

    constructor(config: Readonly<ExtractionConfig>) {
        this.google = createGoogleGenerativeAI({ apiKey: config.apiKey });
        this.model = config.model;
        this.temperature = config.temperature;
    }

    /**
     * @throws {ExtractionServiceError} If the model call fails for any reason
     */
    async extract(prompt: string, pages: readonly PageImage[]): Promise<RawModelResponse> {
        const content: Array<TextPart | ImagePart> = [
            { type: "text", text: prompt },
            ...pages.map(
                (page): ImagePart => ({ type: "image", image: page.data, mimeType: page.mimeType })
            ),
        ];

        logger.info("Calling extraction model", { model: this.model, pageCount: pages.length });

        try {
            const { text, usage, finishReason } = await generateText({
                model: this.google(this.model),
                messages: [{ role: "user", content }],
                temperature: this.temperature,
                maxRetries: 0,
            });

            logger.info("Extraction model responded", {
                finishReason,
                promptTokens: usage.promptTokens,
                completionTokens: usage.completionTokens,
                totalTokens: usage.totalTokens,
            });

            return {
                text,
                usage: {
                    promptTokens: usage.promptTokens,
                    completionTokens: usage.completionTokens,
                    totalTokens: usage.totalTokens,
                },
                finishReason,
            };
        } catch (error) {
            logger.error("Extraction model call failed", { model: this.model, error: errorMessage(error) });
            throw new ExtractionServiceError(`Extraction service call failed: ${errorMessage(error)}`, {
                cause: error,
            });
        }
    }
}
