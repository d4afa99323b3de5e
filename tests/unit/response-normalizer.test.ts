/**
 * Unit tests for response normalization
 */

import { describe, it, expect } from "vitest";
import { MalformedResponseError } from "../../lib/core/errors";
import {
    normalizeInvoiceResponse,
    normalizeResponse,
    stripCodeFence,
} from "../../lib/core/response-normalizer";
import { InvoiceRecordSchema, type InvoiceRecord } from "../../lib/extractors/invoice";

const completeRecord: InvoiceRecord = {
    invoice_id: "INV-2024-0042",
    invoice_date: "2024-01-13",
    due_date: "2024-02-13",
    seller_name: "Northwind Traders",
    seller_address: "12 Harbour Road, Wellington, New Zealand",
    customer_name: "Acme Corporation",
    customer_address: "123 Business Ave, New York, NY 10001",
    subtotal: "8,729.00",
    total_tax: "698.32",
    total_amount: "9,427.32",
    line_items: [
        { description: "Web Development Services", quantity: "40", unit_price: "150.00", line_total: "6,000.00" },
        { description: "SSL Certificate", quantity: "1", unit_price: "99.00", line_total: "99.00" },
    ],
};

function expectMalformed(run: () => unknown): MalformedResponseError {
    try {
        run();
    } catch (error) {
        expect(error).toBeInstanceOf(MalformedResponseError);
        if (error instanceof MalformedResponseError) {
            return error;
        }
    }
    throw new Error("expected MalformedResponseError");
}

describe("stripCodeFence", () => {
    it("should remove a leading fence with a language tag and a trailing fence", () => {
        expect(stripCodeFence('```json\n{"a": 1}\n```')).toBe('{"a": 1}');
    });

    it("should remove a bare fence", () => {
        expect(stripCodeFence("```\n{}\n```")).toBe("{}");
    });

    it("should only trim already-clean JSON", () => {
        expect(stripCodeFence('  {"a": 1}\n')).toBe('{"a": 1}');
    });

    it("should handle a leading fence without a closing one", () => {
        expect(stripCodeFence('```json\n{"a": 1}')).toBe('{"a": 1}');
    });

    it("should return an empty string for empty or fence-only input", () => {
        expect(stripCodeFence("")).toBe("");
        expect(stripCodeFence("```json\n```")).toBe("");
    });

    it("should leave non-JSON text otherwise untouched", () => {
        expect(stripCodeFence("not json at all")).toBe("not json at all");
    });
});

describe("normalizeInvoiceResponse", () => {
    it("should return an equal record for a serialized complete record", () => {
        const result = normalizeInvoiceResponse(JSON.stringify(completeRecord));

        expect(result).toEqual(completeRecord);
    });

    it("should produce identical output for fenced and unfenced input", () => {
        const json = JSON.stringify(completeRecord, null, 2);

        const fenced = normalizeInvoiceResponse("```json\n" + json + "\n```");
        const plain = normalizeInvoiceResponse(json);

        expect(fenced).toEqual(plain);
    });

    it("should fill every missing key with N/A and default line_items to empty", () => {
        const result = normalizeInvoiceResponse('{"invoice_id": "INV-1"}');

        expect(result).toEqual({
            invoice_id: "INV-1",
            invoice_date: "N/A",
            due_date: "N/A",
            seller_name: "N/A",
            seller_address: "N/A",
            customer_name: "N/A",
            customer_address: "N/A",
            subtotal: "N/A",
            total_tax: "N/A",
            total_amount: "N/A",
            line_items: [],
        });
    });

    it("should treat null values and null line_items as missing", () => {
        const result = normalizeInvoiceResponse('{"due_date": null, "line_items": null}');

        expect(result.due_date).toBe("N/A");
        expect(result.line_items).toEqual([]);
    });

    it("should replace a non-array line_items value with an empty array", () => {
        const result = normalizeInvoiceResponse('{"line_items": {"description": "Widget"}}');

        expect(result.line_items).toEqual([]);
    });

    it("should complete partial line items with N/A", () => {
        const result = normalizeInvoiceResponse('{"line_items": [{"description": "Widget", "quantity": "3"}]}');

        expect(result.line_items).toEqual([
            { description: "Widget", quantity: "3", unit_price: "N/A", line_total: "N/A" },
        ]);
    });

    it("should coerce non-object line items into all-N/A entries", () => {
        const result = normalizeInvoiceResponse('{"line_items": ["Widget", 42]}');

        expect(result.line_items).toEqual([
            { description: "N/A", quantity: "N/A", unit_price: "N/A", line_total: "N/A" },
            { description: "N/A", quantity: "N/A", unit_price: "N/A", line_total: "N/A" },
        ]);
    });

    it("should stringify numeric and boolean values", () => {
        const result = normalizeInvoiceResponse(
            '{"total_amount": 1250.5, "line_items": [{"quantity": 2, "line_total": true}]}'
        );

        expect(result.total_amount).toBe("1250.5");
        expect(result.line_items[0].quantity).toBe("2");
        expect(result.line_items[0].line_total).toBe("true");
    });

    it("should drop keys outside the schema", () => {
        const result = normalizeInvoiceResponse(
            '{"invoice_id": "A1", "currency": "EUR", "line_items": [{"description": "X", "sku": "123"}]}'
        );

        expect(result).not.toHaveProperty("currency");
        expect(Object.keys(result.line_items[0])).toEqual([
            "description",
            "quantity",
            "unit_price",
            "line_total",
        ]);
    });

    it("should fail with MalformedResponseError on non-JSON text and keep the raw text", () => {
        const error = expectMalformed(() => normalizeInvoiceResponse("not json at all"));

        expect(error.code).toBe("MALFORMED_RESPONSE");
        expect(error.rawText).toBe("not json at all");
    });

    it("should keep the original, unstripped text on failure", () => {
        const raw = "```json\n{ invoice_id: INV-1 }\n```";
        const error = expectMalformed(() => normalizeInvoiceResponse(raw));

        expect(error.rawText).toBe(raw);
    });

    it.each([
        ["an array", "[1, 2]", "array"],
        ["null", "null", "null"],
        ["a string", '"INV-1"', "string"],
        ["a number", "42", "number"],
    ])("should reject %s at the top level", (_label, raw, kind) => {
        const error = expectMalformed(() => normalizeInvoiceResponse(raw));

        expect(error.message).toBe(
            `Expected a JSON object at the top level of the model response, got ${kind}`
        );
    });
});

describe("normalizeResponse", () => {
    it("should apply the schema it is given", () => {
        const result = normalizeResponse('```json\n{"invoice_id": "Z-9"}\n```', InvoiceRecordSchema);

        expect(result.invoice_id).toBe("Z-9");
        expect(result.total_amount).toBe("N/A");
    });
});
