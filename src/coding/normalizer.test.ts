import { describe, expect, it } from "vitest";

import {
    EMPTY_REASON_FALLBACK,
    filterReader,
    MISSING_ITEM_REASON,
    normalizeResult,
    parseItemId,
    readFlag,
    readText,
} from "./normalizer.js";

describe("parseItemId", () => {
    it("accepts integers and numeric strings", () => {
        expect(parseItemId(3)).toBe(3);
        expect(parseItemId(" 12 ")).toBe(12);
        expect(parseItemId("-1")).toBe(-1);
    });

    it("rejects fractions and non-numeric values", () => {
        expect(parseItemId(1.5)).toBeUndefined();
        expect(parseItemId("1.5")).toBeUndefined();
        expect(parseItemId("one")).toBeUndefined();
        expect(parseItemId(null)).toBeUndefined();
    });
});

describe("readText and readFlag", () => {
    it("reads scalars as trimmed text", () => {
        expect(readText("  off topic ")).toBe("off topic");
        expect(readText(7)).toBe("7");
        expect(readText({ nested: true })).toBe("");
        expect(readText(undefined)).toBe("");
    });

    it("reads the usual spellings of true", () => {
        expect([true, 1, "true", "Yes", " y ", "1"].map(readFlag)).toEqual([
            true,
            true,
            true,
            true,
            true,
            true,
        ]);
        expect([false, 0, "no", "", null, undefined].map(readFlag)).toEqual([
            false,
            false,
            false,
            false,
            false,
            false,
        ]);
    });
});

describe("normalizeResult", () => {
    it("returns nothing when the list is absent", () => {
        expect(normalizeResult(null, 3, filterReader)).toEqual([]);
        expect(normalizeResult({ filtering: "none" }, 3, filterReader)).toEqual([]);
        expect(normalizeResult({ other: [] }, 3, filterReader)).toEqual([]);
    });

    it("returns exactly n verdicts in id order", () => {
        const result = normalizeResult(
            {
                filtering: [
                    { id: 3, retain: false, exclude_reason: "small talk" },
                    { id: "1", retain: "yes" },
                ],
            },
            3,
            filterReader,
        );
        expect(result).toEqual([
            { id: 1, verdict: { retain: true, exclude_reason: "" } },
            { id: 2, verdict: { retain: false, exclude_reason: MISSING_ITEM_REASON } },
            { id: 3, verdict: { retain: false, exclude_reason: "small talk" } },
        ]);
    });

    it("marks items the model left out for manual review", () => {
        expect(normalizeResult({ filtering: [] }, 1, filterReader)).toEqual([
            {
                id: 1,
                verdict: {
                    retain: false,
                    exclude_reason: "model did not return this item — requires manual review",
                },
            },
        ]);
    });

    it("skips out-of-range, duplicate and malformed entries", () => {
        const result = normalizeResult(
            {
                filtering: [
                    { id: 0, retain: true },
                    { id: 3, retain: true },
                    { id: 1.5, retain: true },
                    "not an object",
                    { id: 2, retain: false },
                    { id: 2, retain: true },
                ],
            },
            2,
            filterReader,
        );
        expect(result).toEqual([
            { id: 1, verdict: { retain: false, exclude_reason: MISSING_ITEM_REASON } },
            { id: 2, verdict: { retain: false, exclude_reason: EMPTY_REASON_FALLBACK } },
        ]);
    });

    it("clears the reason of retained items", () => {
        expect(
            normalizeResult(
                { filtering: [{ id: 1, retain: true, exclude_reason: "ignored" }] },
                1,
                filterReader,
            ),
        ).toEqual([{ id: 1, verdict: { retain: true, exclude_reason: "" } }]);
    });
});
