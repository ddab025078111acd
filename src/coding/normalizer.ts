/**
 * Result Normalizer
 *
 * Reconciles a parsed batch reply against the local id range [1, n]. The output is
 * either empty (the reply is unusable) or exactly n verdicts, one per id, ascending.
 */

import type { RetainVerdict } from "../schema.js";
import { isRecord } from "../utils/ai/json.js";

export const MISSING_ITEM_REASON = "model did not return this item — requires manual review";
export const EMPTY_REASON_FALLBACK = "excluded by model without a reason";

/** Reads the stage-specific part of a reply. */
export interface VerdictReader<T> {
    /** Key of the verdict list in the reply object */
    listKey: string;
    /** Verdict of one entry whose id has already been accepted */
    read(entry: Record<string, unknown>): T;
    /** Verdict for an id the reply left out */
    missing(): T;
}

export interface NumberedVerdict<T> {
    id: number;
    verdict: T;
}

/** Integer ids, given as numbers or numeric strings; anything else is undefined. */
export const parseItemId = (value: unknown): number | undefined => {
    if (typeof value === "number") {
        return Number.isInteger(value) ? value : undefined;
    }
    if (typeof value === "string" && /^\s*[+-]?\d+\s*$/.test(value)) {
        return Number.parseInt(value, 10);
    }
    return undefined;
};

/** Trimmed text of a scalar field; missing or structured values read as "". */
export const readText = (value: unknown): string => {
    if (typeof value === "string") {
        return value.trim();
    }
    if (typeof value === "number" || typeof value === "boolean") {
        return String(value);
    }
    return "";
};

/** Booleans as models tend to write them: true/false, "yes"/"no", 1/0. */
export const readFlag = (value: unknown): boolean => {
    if (typeof value === "boolean") {
        return value;
    }
    if (typeof value === "number") {
        return value !== 0;
    }
    if (typeof value === "string") {
        return ["true", "yes", "y", "1"].includes(value.trim().toLowerCase());
    }
    return false;
};

/**
 * Normalize a reply into exactly `n` verdicts
 *
 * - No object, or no array under `reader.listKey`: empty result
 * - Entries that are not objects, or whose id is non-integer, outside [1, n] or
 *   already seen, are skipped (the first entry for an id wins)
 * - Ids left without an entry get `reader.missing()`
 */
export const normalizeResult = <T>(
    data: Record<string, unknown> | null,
    n: number,
    reader: VerdictReader<T>,
): NumberedVerdict<T>[] => {
    const list = data?.[reader.listKey];
    if (!Array.isArray(list)) {
        return [];
    }

    const accepted = new Map<number, T>();
    for (const entry of list) {
        if (!isRecord(entry)) {
            continue;
        }
        const id = parseItemId(entry.id);
        if (id === undefined || id < 1 || id > n || accepted.has(id)) {
            continue;
        }
        accepted.set(id, reader.read(entry));
    }

    const result: NumberedVerdict<T>[] = [];
    for (let id = 1; id <= n; id++) {
        result.push({ id, verdict: accepted.get(id) ?? reader.missing() });
    }
    return result;
};

/** Relevance verdicts under `filtering`: `{ id, retain, exclude_reason }`. */
export const filterReader: VerdictReader<RetainVerdict> = {
    listKey: "filtering",
    read: (entry) => {
        const retain = readFlag(entry.retain);
        if (retain) {
            return { retain, exclude_reason: "" };
        }
        return { retain, exclude_reason: readText(entry.exclude_reason) || EMPTY_REASON_FALLBACK };
    },
    missing: () => ({ retain: false, exclude_reason: MISSING_ITEM_REASON }),
};
