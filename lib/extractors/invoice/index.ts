/**
 * Invoice Extractor
 *
 * Extracts invoice header fields and line items from page images:
 * - Invoice id, issue date and due date
 * - Seller and customer names and addresses
 * - Subtotal, total tax and total amount
 * - Line items (description, quantity, unit price, line total)
 *
 * Every value is a string. A value the model could not find is the literal
 * `"N/A"`; the prompt forbids inventing one, but nothing here can detect a
 * fabricated value that is present.
 */

import { z } from "zod";
import type { ExtractorConfig } from "../../core/types";
import type { PromptConfig, TranslationPolicy } from "../../core/config";

export const NOT_AVAILABLE = "N/A";

export const INVOICE_FIELDS = [
    "invoice_id",
    "invoice_date",
    "due_date",
    "seller_name",
    "seller_address",
    "customer_name",
    "customer_address",
    "subtotal",
    "total_tax",
    "total_amount",
] as const;

export type InvoiceField = (typeof INVOICE_FIELDS)[number];

export const LINE_ITEM_FIELDS = ["description", "quantity", "unit_price", "line_total"] as const;

function toFieldValue(value: unknown): string {
    if (value === undefined || value === null) {
        return NOT_AVAILABLE;
    }
    if (typeof value === "string") {
        return value;
    }
    if (typeof value === "number" || typeof value === "boolean") {
        return String(value);
    }
    return JSON.stringify(value);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * A single scalar value. Missing and null become `"N/A"`; numbers and booleans
 * are stringified since the model does not reliably quote them.
 */
export const FieldValueSchema = z.preprocess(toFieldValue, z.string());

export const LineItemSchema = z.preprocess(
    (value) => (isPlainObject(value) ? value : {}),
    z.object({
        description: FieldValueSchema.describe("What was purchased or what service was provided"),
        quantity: FieldValueSchema.describe("Quantity as printed"),
        unit_price: FieldValueSchema.describe("Price per unit as printed"),
        line_total: FieldValueSchema.describe("Total for this line as printed"),
    })
);

export const InvoiceRecordSchema = z.object({
    invoice_id: FieldValueSchema.describe("Invoice number or identifier"),
    invoice_date: FieldValueSchema.describe("Date the invoice was issued"),
    due_date: FieldValueSchema.describe("Payment due date"),
    seller_name: FieldValueSchema.describe("Biller, vendor or company name"),
    seller_address: FieldValueSchema.describe("Biller address"),
    customer_name: FieldValueSchema.describe("Customer name"),
    customer_address: FieldValueSchema.describe("Customer address"),
    subtotal: FieldValueSchema.describe("Amount before tax"),
    total_tax: FieldValueSchema.describe("Total tax"),
    total_amount: FieldValueSchema.describe("Total amount due"),
    line_items: z.preprocess((value) => (Array.isArray(value) ? value : []), z.array(LineItemSchema)),
});

export type LineItem = z.infer<typeof LineItemSchema>;
export type InvoiceRecord = z.infer<typeof InvoiceRecordSchema>;

export interface InvoicePromptOptions {
    targetLanguage?: string;
    translationPolicy?: TranslationPolicy;
}

function translationRules(language: string, policy: TranslationPolicy): string {
    if (policy === "all-fields") {
        return `- Translate EVERY field value into ${language}, including dates and amounts written in words or in a non-${language} script.
- Do not return any value in its original language.`;
    }

    return `- Translate every textual value (names, addresses, item descriptions) into ${language}. Do not return them in their original language.
- Do NOT translate numeric values or dates. Keep amounts and quantities exactly as printed.
- Normalize dates to YYYY-MM-DD where the date is unambiguous; otherwise keep them as printed.`;
}

/**
 * Build the instruction text sent ahead of the page images.
 *
 * The result depends only on deployment settings, never on the request, so
 * callers build it once and reuse it.
 */
export function buildInvoicePrompt(options: InvoicePromptOptions = {}): string {
    const language = options.targetLanguage ?? "English";
    const policy = options.translationPolicy ?? "text-only";

    return `You are an expert multilingual data processor specializing in invoices.

Extract the key information from the attached invoice pages. The pages belong to ONE invoice and are given in order.

Extract exactly these 10 fields:
1. invoice_id - the invoice number or identifier
2. invoice_date - the date the invoice was issued
3. due_date - the payment due date
4. seller_name - the biller, vendor or company name
5. seller_address - the biller address
6. customer_name - the customer name
7. customer_address - the customer address
8. subtotal - the amount before tax
9. total_tax - the total tax
10. total_amount - the total amount due

Also extract ALL line items. For each line item extract:
- description
- quantity
- unit_price
- line_total

TRANSLATION RULES (${language}):
${translationRules(language, policy)}
- Example: a customer address printed as "東京都千代田区丸の内1-1-1" must be returned as "1-1-1 Marunouchi, Chiyoda-ku, Tokyo, Japan" when the target language is English.

MISSING DATA:
- If a field is not present on the invoice, return the string "N/A" for it. Never make up a value.

OUTPUT FORMAT:
- Return a single JSON object and nothing else.
- All values are strings.
- Use exactly this structure:
{
  "invoice_id": "value",
  "invoice_date": "value",
  "due_date": "value",
  "seller_name": "value",
  "seller_address": "value",
  "customer_name": "value",
  "customer_address": "value",
  "subtotal": "value",
  "total_tax": "value",
  "total_amount": "value",
  "line_items": [
    {"description": "value", "quantity": "value", "unit_price": "value", "line_total": "value"}
  ]
}`;
}

/** Prompt for the default deployment: English, text-only translation. */
export const INVOICE_PROMPT = buildInvoicePrompt();

/**
 * Invoice extractor configuration
 */
export function createInvoiceExtractor(
    prompt: Partial<PromptConfig> = {}
): ExtractorConfig<typeof InvoiceRecordSchema> {
    return {
        name: "invoice",
        description: "Extract invoice fields and line items, translated for review",
        schema: InvoiceRecordSchema,
        prompt: buildInvoicePrompt(prompt),
    };
}

export const invoiceExtractor = createInvoiceExtractor();

export default invoiceExtractor;
