import { describe, expect, it } from "vitest";
import { z } from "zod";

import { describeParseFailure, extractJSON, parseStructured } from "./json.js";

describe("extractJSON", () => {
    it("parses a bare object", () => {
        expect(extractJSON('{"open_code": "work stress"}')).toEqual({ open_code: "work stress" });
    });

    it("strips a json fence", () => {
        expect(extractJSON('```json\n{"a": 1}\n```')).toEqual({ a: 1 });
    });

    it("strips a plain fence", () => {
        expect(extractJSON('```\n{"a": 2}\n```')).toEqual({ a: 2 });
    });

    it("finds an object wrapped in prose", () => {
        expect(extractJSON('Here you go: {"a": {"b": [1, 2]}} Hope it helps.')).toEqual({
            a: { b: [1, 2] },
        });
    });

    it("rejects arrays and scalars", () => {
        expect(extractJSON("[1, 2, 3]")).toBeNull();
        expect(extractJSON("42")).toBeNull();
    });

    it("returns null for truncated or missing JSON", () => {
        expect(extractJSON('{"a": 1')).toBeNull();
        expect(extractJSON("no braces here")).toBeNull();
        expect(extractJSON("} backwards {")).toBeNull();
    });
});

describe("parseStructured", () => {
    const schema = z.object({ items: z.array(z.number()) });

    it("returns the validated value", () => {
        expect(parseStructured('{"items": [1, 2]}', schema)).toEqual({
            ok: true,
            value: { items: [1, 2] },
        });
    });

    it("reports an empty reply as unparsable", () => {
        expect(parseStructured("   ", schema)).toEqual({
            ok: false,
            error: { kind: "unparsable", detail: "empty reply" },
        });
    });

    it("quotes the start of a reply without JSON", () => {
        expect(parseStructured("I cannot help with that", schema)).toEqual({
            ok: false,
            error: { kind: "unparsable", detail: 'no JSON object in "I cannot help with that"' },
        });
    });

    it("names the failing path for a wrong shape", () => {
        const result = parseStructured('{"items": "none"}', schema);
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.kind).toBe("invalid-shape");
            expect(result.error.detail.startsWith("items: ")).toBe(true);
        }
    });
});

describe("describeParseFailure", () => {
    it("prefixes the failure kind", () => {
        expect(describeParseFailure({ kind: "unparsable", detail: "empty reply" })).toBe(
            "unparsable reply: empty reply",
        );
        expect(describeParseFailure({ kind: "invalid-shape", detail: "x: bad" })).toBe(
            "unexpected reply shape: x: bad",
        );
    });
});
