/**
 * Document Loader
 *
 * Turns an uploaded file into the ordered page images sent to the model.
 *
 * ## Paths
 *
 * - **PDF** (`application/pdf`): opened with pdf-lib to validate the file and
 *   read each page's size, then rasterized page by page with pdf2pic at the
 *   pixel size the render density gives that page. pdf2pic shells out to
 *   GraphicsMagick and Ghostscript; when either is missing the render fails
 *   or yields empty buffers, and both are reported as `rasterizer-unavailable`.
 * - **Anything else**: decoded as a single image with sharp.
 *
 * Any failure aborts the request before the model is called.
 *
 * @module document-loader
 */

import { PDFDocument } from "pdf-lib";
import { fromBuffer } from "pdf2pic";
import sharp from "sharp";
import { DocumentDecodeError, errorMessage } from "./errors";
import { createLogger } from "./logger";
import type { PageImage, UploadedDocument } from "./types";

const logger = createLogger("document-loader");

export const PDF_MEDIA_TYPE = "application/pdf";

/** Image formats the model accepts as-is; others are re-encoded to PNG. */
const PASSTHROUGH_FORMATS: Record<string, string> = {
    jpeg: "image/jpeg",
    png: "image/png",
    webp: "image/webp",
};

const EXTENSION_MEDIA_TYPES: Record<string, string> = {
    pdf: PDF_MEDIA_TYPE,
    png: "image/png",
    jpg: "image/jpeg",
    jpeg: "image/jpeg",
    webp: "image/webp",
};

export interface LoadOptions {
    /** DPI used when rasterizing PDF pages (default: 200). */
    density?: number;
}

/**
 * Upload-boundary helper: media type for a file name, or `undefined` when the
 * extension is not an accepted input.
 */
export function mediaTypeFromFileName(fileName: string): string | undefined {
    const dot = fileName.lastIndexOf(".");
    if (dot === -1) {
        return undefined;
    }
    return EXTENSION_MEDIA_TYPES[fileName.slice(dot + 1).toLowerCase()];
}

export function isPaginated(mediaType: string): boolean {
    const [essence] = mediaType.split(";");
    return essence.trim().toLowerCase() === PDF_MEDIA_TYPE;
}

/**
 * Produce the ordered page images for a document.
 *
 * @throws {DocumentDecodeError} If the file cannot be rendered
 */
export async function loadDocument(
    document: UploadedDocument,
    options: LoadOptions = {}
): Promise<PageImage[]> {
    logger.debug("Loading document", {
        fileName: document.fileName,
        mediaType: document.mediaType,
        bytes: document.bytes.byteLength,
    });

    const pages = isPaginated(document.mediaType)
        ? await loadPdf(document.bytes, options.density ?? 200)
        : [await decodeImage(document.bytes, 1)];

    logger.info("Document loaded", { fileName: document.fileName, pageCount: pages.length });
    return pages;
}

export interface PageSize {
    width: number;
    height: number;
}

/** PDF points per inch. */
const POINTS_PER_INCH = 72;

/**
 * Page sizes in points, as displayed: a page rotated by 90 or 270 degrees
 * has its media box width and height swapped.
 */
async function readPdfPageSizes(bytes: Uint8Array): Promise<PageSize[]> {
    let sizes: PageSize[];
    try {
        const pdf = await PDFDocument.load(bytes, { ignoreEncryption: true, updateMetadata: false });
        sizes = pdf.getPages().map((page) => {
            const { width, height } = page.getSize();
            return page.getRotation().angle % 180 === 0 ? { width, height } : { width: height, height: width };
        });
    } catch (error) {
        throw new DocumentDecodeError(
            `Failed to read PDF file: ${errorMessage(error)}`,
            "corrupt-document",
            { cause: error }
        );
    }

    if (sizes.length === 0) {
        throw new DocumentDecodeError("PDF file has no pages", "corrupt-document");
    }
    return sizes;
}

function isMissingRasterizer(error: unknown): boolean {
    if (typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT") {
        return true;
    }
    return /ENOENT|GraphicsMagick|ImageMagick|ghostscript|gs: not found|command not found/i.test(
        errorMessage(error)
    );
}

function rasterizeError(error: unknown): DocumentDecodeError {
    if (isMissingRasterizer(error)) {
        return new DocumentDecodeError(
            "Failed to render PDF: GraphicsMagick and Ghostscript must be installed",
            "rasterizer-unavailable",
            { cause: error }
        );
    }
    return new DocumentDecodeError(`Failed to render PDF: ${errorMessage(error)}`, "corrupt-document", {
        cause: error,
    });
}

/**
 * Output size in pixels for a page at `density` DPI. pdf2pic scales every
 * render to its `width`/`height` options, so they must follow the density.
 */
export function renderSize(page: PageSize, density: number): PageSize {
    return {
        width: Math.max(1, Math.round((page.width * density) / POINTS_PER_INCH)),
        height: Math.max(1, Math.round((page.height * density) / POINTS_PER_INCH)),
    };
}

async function loadPdf(bytes: Uint8Array, density: number): Promise<PageImage[]> {
    const sizes = await readPdfPageSizes(bytes);
    const source = Buffer.from(bytes);

    const pages: PageImage[] = [];
    for (const [index, size] of sizes.entries()) {
        const pageNumber = index + 1;
        const convert = fromBuffer(source, {
            density,
            format: "png",
            ...renderSize(size, density),
            preserveAspectRatio: true,
        });

        const rendered = await convert(pageNumber, { responseType: "buffer" }).catch((error: unknown) => {
            logger.error("PDF rasterization failed", {
                pageNumber,
                pageCount: sizes.length,
                error: errorMessage(error),
            });
            throw rasterizeError(error);
        });

        // An empty buffer is what gm produces when Ghostscript is absent.
        if (!rendered.buffer || rendered.buffer.length === 0) {
            throw new DocumentDecodeError(
                `Failed to render PDF page ${pageNumber}: GraphicsMagick and Ghostscript must be installed`,
                "rasterizer-unavailable"
            );
        }
        pages.push(await decodeImage(rendered.buffer, pageNumber));
    }
    return pages;
}

async function decodeImage(bytes: Uint8Array, pageNumber: number): Promise<PageImage> {
    try {
        const metadata = await sharp(bytes).metadata();
        const { format, width, height } = metadata;
        if (!format || !width || !height) {
            throw new Error("image has no readable format or dimensions");
        }

        const mimeType: string | undefined = PASSTHROUGH_FORMATS[format];
        if (mimeType) {
            return { pageNumber, data: bytes, mimeType, width, height };
        }

        logger.debug("Re-encoding image to PNG", { pageNumber, format });
        const png = await sharp(bytes).png().toBuffer();
        return { pageNumber, data: png, mimeType: "image/png", width, height };
    } catch (error) {
        throw new DocumentDecodeError(
            `Failed to decode image: ${errorMessage(error)}`,
            "corrupt-image",
            { cause: error }
        );
    }
}
