/**
 * Plain-text rendering of an extraction outcome, for terminals and logs.
 *
 * Layout follows the review flow: page count, labelled header fields, line
 * items, pretty JSON, then token usage. A failure shows the error and, when
 * the model answered, its raw text.
 */

import {
    INVOICE_FIELDS,
    LINE_ITEM_FIELDS,
    type InvoiceRecord,
    type LineItem,
} from "../extractors/invoice";
import type { ExtractionOutcome, TokenUsage } from "../core/types";

const RULE = "-".repeat(60);

/** `"seller_name"` -> `"Seller Name"` */
export function formatFieldLabel(key: string): string {
    return key
        .split("_")
        .filter((word) => word.length > 0)
        .map((word) => word[0].toUpperCase() + word.slice(1).toLowerCase())
        .join(" ");
}

export function formatTokenCount(count: number): string {
    return count.toLocaleString("en-US");
}

export function usageSummary(usage: TokenUsage): Record<string, string> {
    return {
        "Prompt Tokens": formatTokenCount(usage.promptTokens),
        "Completion Tokens": formatTokenCount(usage.completionTokens),
        "Total Tokens Used": formatTokenCount(usage.totalTokens),
    };
}

/**
 * Fixed-width table: header row, separator, one row per item.
 */
export function renderLineItems(items: readonly LineItem[]): string {
    if (items.length === 0) {
        return "No line items were extracted.";
    }

    const headers = LINE_ITEM_FIELDS.map(formatFieldLabel);
    const rows = items.map((item) => LINE_ITEM_FIELDS.map((field) => item[field]));
    const widths = headers.map((header, column) =>
        Math.max(header.length, ...rows.map((row) => row[column].length))
    );

    const line = (cells: string[]) => cells.map((cell, i) => cell.padEnd(widths[i])).join(" | ").trimEnd();

    return [line(headers), widths.map((w) => "-".repeat(w)).join("-+-"), ...rows.map(line)].join("\n");
}

function renderFields(record: InvoiceRecord): string {
    const labels = INVOICE_FIELDS.map(formatFieldLabel);
    const width = Math.max(...labels.map((label) => label.length));
    return INVOICE_FIELDS.map((field, i) => `${labels[i].padEnd(width)} : ${record[field]}`).join("\n");
}

function renderUsage(usage: TokenUsage): string {
    return Object.entries(usageSummary(usage))
        .map(([label, value]) => `${label}: ${value}`)
        .join("\n");
}

export function renderReport(outcome: ExtractionOutcome<InvoiceRecord>): string {
    if (outcome.status === "failed") {
        const sections = [`Extraction failed [${outcome.error.code}]: ${outcome.error.message}`];
        if (outcome.rawText !== undefined) {
            sections.push(`Raw model response:\n${outcome.rawText}`);
        }
        if (outcome.usage) {
            sections.push(`API usage\n${renderUsage(outcome.usage)}`);
        }
        return sections.join(`\n${RULE}\n`);
    }

    const pageLabel = outcome.pages.length === 1 ? "1 page" : `${outcome.pages.length} pages`;

    return [
        `Invoice data extracted (${pageLabel})`,
        renderFields(outcome.record),
        `Line items\n${renderLineItems(outcome.record.line_items)}`,
        `Raw JSON\n${JSON.stringify(outcome.record, null, 2)}`,
        `API usage\n${renderUsage(outcome.usage)}`,
    ].join(`\n${RULE}\n`);
}
