/**
 * Selective Coding
 *
 * Asks the oracle for aggregate concepts that partition the axial codes, then checks
 * the partition. Coverage problems are attached to the result as a warning; they never
 * stop the pipeline.
 */

import { z } from "zod";

import { readText } from "../coding/normalizer.js";
import type { AggregateConcept, AxialSummaryRow, SelectiveResult } from "../schema.js";
import { isRecord, parseStructured } from "../utils/ai/json.js";
import {
    type AttemptError,
    attemptOracle,
    describeAttemptError,
    type Oracle,
} from "../utils/ai/llms.js";
import type { PipelineConfig } from "../utils/core/config.js";
import { logger } from "../utils/core/logger.js";
import { err, ok, type Result } from "../utils/core/result.js";
import { retryAttempts } from "../utils/core/retry.js";

import { hasCoverageIssues, validateCoverage } from "./coverage.js";

export const SELECTIVE_SYSTEM_PROMPT = `
You are a qualitative researcher doing selective coding.
You receive every axial code of a study, each with a short excerpt of its member open codes.
Abstract the axial codes into a small number of aggregate concepts.
Every axial code must be covered by exactly one aggregate concept; use the axial codes verbatim.

Input: {"axial_items":[{"axial_code":"...","member_open_codes_excerpt":"..."}]}
Output JSON only:
{"aggregate_concepts":[{"concept":"...","definition":"...","covered_axial_codes":["..."]}]}
`.trim();

export type SelectiveConfig = PipelineConfig["selective"];

/** Code points of `text`, cut to `limit`; a limit of 0 or less yields "". */
export const truncate = (text: string, limit: number) =>
    limit > 0 ? [...text].slice(0, limit).join("") : "";

/** Serialize axial codes with newline-flattened, truncated member excerpts. */
export const buildSelectivePayload = (summary: AxialSummaryRow[], excerptLimit: number) =>
    JSON.stringify({
        axial_items: summary
            .filter((row) => row.axial_code.trim())
            .map((row) => ({
                axial_code: row.axial_code.trim(),
                member_open_codes_excerpt: truncate(
                    row.member_open_codes.trim().replace(/\n/g, " "),
                    excerptLimit,
                ),
            })),
    });

/** Trim every field and drop blank axial codes; entries that are not objects are skipped. */
export const normalizeConcepts = (entries: unknown[]): AggregateConcept[] =>
    entries.filter(isRecord).map((entry) => ({
        concept: readText(entry.concept),
        definition: readText(entry.definition),
        covered_axial_codes: Array.isArray(entry.covered_axial_codes)
            ? entry.covered_axial_codes.map(readText).filter(Boolean)
            : [],
    }));

/** Fields beyond `aggregate_concepts` are kept as returned. */
const SelectiveReplySchema = z
    .object({ aggregate_concepts: z.array(z.unknown()) })
    .passthrough();

export interface SelectiveReply {
    result: SelectiveResult;
    /** The last reply text received, kept for inspection ("" if none arrived) */
    raw: string;
}

/**
 * Request aggregate concepts for the axial summary
 *
 * Oracle errors and unparsable replies are retried; when every attempt fails the
 * result has no concepts.
 */
export const requestSelectiveCoding = (
    oracle: Oracle,
    summary: AxialSummaryRow[],
    config: SelectiveConfig,
) =>
    logger.withSource("requestSelectiveCoding", async (): Promise<SelectiveReply> => {
        const payload = buildSelectivePayload(summary, config.excerptLimit);
        let raw = "";

        const result = await retryAttempts(
            async (): Promise<Result<SelectiveResult, AttemptError>> => {
                const reply = await attemptOracle(oracle, {
                    systemPrompt: SELECTIVE_SYSTEM_PROMPT,
                    userContent: `All axial codes with short (possibly truncated) excerpts:\n${payload}\n\nDerive aggregate concepts. Cover every axial_code, each in exactly one concept. Reply with JSON only.`,
                    timeout: config.timeout,
                });
                if (!reply.ok) {
                    return err<AttemptError>({ kind: "oracle", error: reply.error });
                }
                raw = reply.value;
                const parsed = parseStructured(reply.value, SelectiveReplySchema);
                if (!parsed.ok) {
                    return err<AttemptError>({ kind: "malformed", failure: parsed.error });
                }
                const fields: SelectiveResult = {
                    aggregate_concepts: normalizeConcepts(parsed.value.aggregate_concepts),
                };
                for (const [key, value] of Object.entries(parsed.value)) {
                    if (key !== "aggregate_concepts" && key !== "coverage_warning") {
                        fields[key] = value;
                    }
                }
                return ok(fields);
            },
            config,
            (error, tries, maxAttempts) => {
                logger.warn(`Attempt ${tries}/${maxAttempts} failed: ${describeAttemptError(error)}`);
            },
        );

        if (!result.ok) {
            logger.warn("Selective coding failed; continuing without aggregate concepts");
            return { result: { aggregate_concepts: [] }, raw };
        }
        logger.info(`Received ${result.value.aggregate_concepts.length} aggregate concepts`);
        return { result: result.value, raw };
    });

/** Attach a coverage warning when the concepts do not partition the axial codes. */
export const annotateCoverage = (
    result: SelectiveResult,
    summary: AxialSummaryRow[],
): SelectiveResult => {
    const report = validateCoverage(
        result.aggregate_concepts,
        summary.map((row) => row.axial_code),
    );
    const annotated: SelectiveResult = { ...result };
    delete annotated.coverage_warning;
    if (!hasCoverageIssues(report)) {
        return annotated;
    }
    logger.warn(
        `Aggregate concepts do not partition the axial codes (missing: ${report.missing.length}, extra: ${report.extra.length}, duplicated: ${report.duplicated.length})`,
        "annotateCoverage",
    );
    return { ...annotated, coverage_warning: report };
};
