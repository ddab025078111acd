/**
 * Structured Response Extraction
 *
 * Oracle replies are free text that usually, but not always, carries one JSON object:
 * sometimes fenced, sometimes wrapped in prose, sometimes truncated. Extraction never
 * throws; an unusable reply is an ordinary outcome.
 */

import type { z } from "zod";

import { err, ok, type Result } from "../core/result.js";

export const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === "object" && value !== null && !Array.isArray(value);

const tryParseObject = (text: string) => {
    try {
        const parsed: unknown = JSON.parse(text);
        return isRecord(parsed) ? parsed : null;
    } catch {
        return null;
    }
};

/**
 * Recover a JSON object from an oracle reply
 *
 * 1. Strip a leading "```json" / "```" fence and a trailing "```", parse the rest
 * 2. Otherwise parse the span from the first "{" to the last "}"
 * 3. Otherwise null
 *
 * Arrays and scalars are not objects and yield null.
 *
 * @example
 * extractJSON('Sure:\n```json\n{"open_code": "work stress"}\n```'); // { open_code: "work stress" }
 */
export const extractJSON = (text: string): Record<string, unknown> | null => {
    const stripped = text
        .trim()
        .replace(/^```json\s*/i, "")
        .replace(/^```\s*/, "")
        .replace(/\s*```$/, "");

    const direct = tryParseObject(stripped);
    if (direct) {
        return direct;
    }

    const start = stripped.indexOf("{");
    const end = stripped.lastIndexOf("}");
    if (start === -1 || end <= start) {
        return null;
    }
    return tryParseObject(stripped.slice(start, end + 1));
};

export interface ParseFailure {
    /** "unparsable": no JSON object found; "invalid-shape": the object failed validation */
    kind: "unparsable" | "invalid-shape";
    detail: string;
}

export const describeParseFailure = (failure: ParseFailure) =>
    `${failure.kind === "unparsable" ? "unparsable reply" : "unexpected reply shape"}: ${failure.detail}`;

/**
 * Extract and validate a reply in one step
 *
 * @returns The typed value, or a ParseFailure saying which of the two steps failed
 */
export const parseStructured = <T>(
    text: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Result<T, ParseFailure> => {
    const data = extractJSON(text);
    if (!data) {
        const preview = text.trim().slice(0, 80);
        return err<ParseFailure>({
            kind: "unparsable",
            detail: preview ? `no JSON object in "${preview}"` : "empty reply",
        });
    }
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
        return err<ParseFailure>({
            kind: "invalid-shape",
            detail: parsed.error.issues
                .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
                .join("; "),
        });
    }
    return ok(parsed.data);
};
