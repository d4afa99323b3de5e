/**
 * Example 01: Extract an Invoice
 *
 * Loads an invoice image or PDF from disk, runs the extraction pipeline, and
 * prints the verification report.
 *
 * Setup:
 * 1. Set GEMINI_API_KEY in your .env file
 * 2. For PDFs, install GraphicsMagick and Ghostscript
 * 3. Run: npx tsx examples/01-extract-invoice.ts path/to/invoice.pdf
 */

import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import * as dotenv from "dotenv";
import {
    createInvoicePipeline,
    ExtractionError,
    loadConfig,
    mediaTypeFromFileName,
    setLogLevel,
} from "../lib/core";
import { renderReport } from "../lib/presentation/report";

dotenv.config();

async function runExample() {
    const filePath = process.argv[2];
    if (!filePath) {
        console.error("Usage: npx tsx examples/01-extract-invoice.ts <invoice.(pdf|png|jpg|jpeg|webp)>");
        process.exit(1);
    }

    const mediaType = mediaTypeFromFileName(filePath);
    if (!mediaType) {
        console.error(`Unsupported file type: ${basename(filePath)}`);
        process.exit(1);
    }

    const config = loadConfig();
    setLogLevel(config.logLevel);

    const pipeline = createInvoicePipeline(config);
    const bytes = await readFile(filePath);

    console.log(`🧾 Extracting ${basename(filePath)} with ${config.extraction.model}...\n`);
    const outcome = await pipeline.run({ bytes, mediaType, fileName: basename(filePath) });

    console.log(renderReport(outcome));
    if (outcome.status === "failed") {
        process.exitCode = 1;
    }
}

runExample().catch((err) => {
    // Config errors are fatal at startup.
    const message = err instanceof ExtractionError ? `${err.name}: ${err.message}` : err;
    console.error("Example failed:", message);
    process.exit(1);
});
