import type { PipelineConfig } from "../utils/core/config.js";
import type { LLMSession, Oracle } from "../utils/ai/llms.js";
import type {
    FilteredRow,
    OpenCodeRecord,
    RetainVerdict,
    UniqueCodeWithVerdict,
} from "../schema.js";

import { BatchClassifier, type BatchTask } from "./batch-classifier.js";
import {
    attachVerdictsToRows,
    attachVerdictsToUnique,
    buildCodeIndex,
    type CodeIndex,
    splitByRetain,
} from "./identity.js";
import { filterReader } from "./normalizer.js";

export const FILTER_SYSTEM_PROMPT = `
You are screening open codes from qualitative interview research.
Each open code is a short label given to one interview answer.
Decide for every code whether it is relevant to the research topic and carries analytic meaning.
Exclude codes that are empty of content, pure small talk, off-topic, or only restate the question.

Input: {"open_codes":[{"id":1,"text":"..."}]}
Output JSON only, with one entry per input id:
{"filtering":[{"id":1,"retain":true,"exclude_reason":""}]}
- "retain": true or false
- "exclude_reason": a short reason when "retain" is false, otherwise ""
`.trim();

export const filterTask: BatchTask<RetainVerdict> = {
    itemKind: "open_codes",
    reader: filterReader,
    systemPrompt: FILTER_SYSTEM_PROMPT,
    buildUserContent: (payload) =>
        `Open codes (JSON):\n${payload}\n\nScreen them for relevance as instructed and reply with JSON only.`,
    failed: (reason) => ({ retain: false, exclude_reason: reason }),
};

export type FilterConfig = PipelineConfig["filter"];

/**
 * Judge every unique code
 *
 * @param codes - Unique code texts; position i is code_id i + 1
 * @returns Exactly one verdict per code_id
 */
export const filterUniqueCodes = (
    oracle: Oracle,
    codes: string[],
    config: FilterConfig,
    session?: LLMSession,
) => new BatchClassifier(oracle, filterTask, config, session).classify(codes);

export interface FilteringResult {
    index: CodeIndex;
    unique: UniqueCodeWithVerdict[];
    retained: UniqueCodeWithVerdict[];
    excluded: UniqueCodeWithVerdict[];
    rows: FilteredRow[];
}

/** Deduplicate the open codes, filter them, and carry the verdicts back onto rows. */
export const runFiltering = async (
    oracle: Oracle,
    records: OpenCodeRecord[],
    config: FilterConfig,
    session?: LLMSession,
): Promise<FilteringResult> => {
    const index = buildCodeIndex(records);
    const verdicts = await filterUniqueCodes(oracle, index.texts, config, session);
    const unique = attachVerdictsToUnique(index, verdicts);
    return {
        index,
        unique,
        ...splitByRetain(unique),
        rows: attachVerdictsToRows(records, index, verdicts),
    };
};
