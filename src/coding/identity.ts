/**
 * Identity Reconciliation
 *
 * Keeps code text, code ids and transcript rows in step across stages. Verdicts and
 * axial labels are always joined by `code_id`; the only text join is the row-level
 * lookup through `CodeIndex.resolve`, which marks unknown text as unresolved ("").
 */

import type {
    AxialCodedRow,
    AxialCodedUnique,
    FilteredRow,
    OpenCodeRecord,
    RetainVerdict,
    UniqueCode,
    UniqueCodeWithVerdict,
} from "../schema.js";

import { MISSING_ITEM_REASON } from "./normalizer.js";

export const UNRESOLVED_ROW_REASON = "open_code not found in the unique code set";

/** Bijection between distinct trimmed open codes and 1-based ids, in first-seen order. */
export class CodeIndex {
    readonly codes: UniqueCode[] = [];
    readonly #ids = new Map<string, number>();

    constructor(texts: Iterable<string>) {
        for (const raw of texts) {
            const text = raw.trim();
            if (!text || this.#ids.has(text)) {
                continue;
            }
            const code_id = this.codes.length + 1;
            this.codes.push({ code_id, open_code: text });
            this.#ids.set(text, code_id);
        }
    }

    get size() {
        return this.codes.length;
    }

    /** Code texts in id order; position i holds code_id i + 1. */
    get texts() {
        return this.codes.map((code) => code.open_code);
    }

    /** Id of a code text (trimmed), or "" when the text is not in the set. */
    resolve(text: string): number | "" {
        return this.#ids.get(text.trim()) ?? "";
    }

    text(codeId: number): string | undefined {
        return this.codes[codeId - 1]?.open_code;
    }
}

export const buildCodeIndex = (records: OpenCodeRecord[]) =>
    new CodeIndex(records.map((record) => record.open_code));

const verdictOf = (verdicts: ReadonlyMap<number, RetainVerdict>, codeId: number): RetainVerdict =>
    verdicts.get(codeId) ?? { retain: false, exclude_reason: MISSING_ITEM_REASON };

/** One row per unique code, with its verdict. */
export const attachVerdictsToUnique = (
    index: CodeIndex,
    verdicts: ReadonlyMap<number, RetainVerdict>,
): UniqueCodeWithVerdict[] =>
    index.codes.map((code) => {
        const { retain, exclude_reason } = verdictOf(verdicts, code.code_id);
        return { ...code, retain, exclude_reason };
    });

export const splitByRetain = <T extends RetainVerdict>(codes: T[]) => ({
    retained: codes.filter((code) => code.retain),
    excluded: codes.filter((code) => !code.retain),
});

/** Carry verdicts onto transcript rows through the text lookup. */
export const attachVerdictsToRows = (
    records: OpenCodeRecord[],
    index: CodeIndex,
    verdicts: ReadonlyMap<number, RetainVerdict>,
): FilteredRow[] =>
    records.map((record) => {
        const code_id = index.resolve(record.open_code);
        if (code_id === "") {
            return { ...record, code_id, retain: false, exclude_reason: UNRESOLVED_ROW_REASON };
        }
        const { retain, exclude_reason } = verdictOf(verdicts, code_id);
        return { ...record, code_id, retain, exclude_reason };
    });

/** Label retained unique codes; codes the axial stage did not place get "". */
export const attachAxialToUnique = (
    retained: UniqueCodeWithVerdict[],
    axial: ReadonlyMap<number, string>,
): AxialCodedUnique[] =>
    retained.map((code) => ({ ...code, axial_code: axial.get(code.code_id)?.trim() ?? "" }));

/** Label rows by their resolved code_id; unresolved and excluded rows get "". */
export const attachAxialToRows = (
    rows: FilteredRow[],
    unique: AxialCodedUnique[],
): AxialCodedRow[] => {
    const labels = new Map(unique.map((code) => [code.code_id, code.axial_code.trim()] as const));
    return rows.map((row) => ({
        ...row,
        axial_code: row.code_id === "" ? "" : (labels.get(row.code_id) ?? ""),
    }));
};
