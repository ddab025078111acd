/**
 * Storyline
 *
 * The terminal stage: one request that weaves aggregate concepts and axial themes into
 * a narrative with anchors. A reply without a non-empty storyline and anchors list
 * after every attempt aborts the run.
 */

import type {
    AxialSummaryRow,
    AxialTheme,
    SelectiveResult,
    StorylinePayload,
    StorylineResult,
} from "../schema.js";
import { extractJSON } from "../utils/ai/json.js";
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

import { truncate } from "./selective-coding.js";

export const STORYLINE_SYSTEM_PROMPT = `
You are a qualitative researcher writing the storyline of a grounded-theory study.
You receive three layers of coding: aggregate concepts (selective coding), axial themes,
and a few open-code examples per theme.
Write a coherent storyline that links the aggregate concepts into one explanation, and list
the anchors (concepts, themes or examples) the storyline rests on.

Output JSON only:
{"storyline":"...","anchors":["..."]}
`.trim();

export type StorylineConfig = PipelineConfig["storyline"];

export class TerminalValidationError extends Error {
    override name = "TerminalValidationError";
    constructor(
        message: string,
        /** The reply that failed validation, kept for inspection */
        readonly raw: string,
        source?: string,
    ) {
        super(`${source ?? logger.source ?? "storyline"}: ${message}`);
    }
}

const EXAMPLE_SEPARATORS = /[;；、]\s*|\|\s*|,\s*/;

/**
 * Pick short example codes from a member list such as "a; b; c"
 *
 * Splits on `;` `；` `、` `|` `,`, drops blanks and repeats, cuts the first
 * `maxItems * 3` candidates to `maxChars`, and keeps at most `maxItems`.
 */
export const pickExamples = (memberText: string, maxItems = 6, maxChars = 28) => {
    const text = memberText.replace(/\n/g, " ").trim();
    if (!text) {
        return [];
    }
    const candidates = [
        ...new Set(
            text
                .split(EXAMPLE_SEPARATORS)
                .map((part) => part.trim())
                .filter(Boolean),
        ),
    ];

    const examples: string[] = [];
    for (const candidate of candidates.slice(0, maxItems * 3)) {
        const example = truncate(candidate, maxChars);
        if (example && !examples.includes(example)) {
            examples.push(example);
        }
        if (examples.length >= maxItems) {
            break;
        }
    }
    return examples;
};

export const buildStorylinePayload = (
    selective: SelectiveResult,
    summary: AxialSummaryRow[],
    config: Pick<StorylineConfig, "maxExamplesPerAxial" | "maxExampleChars">,
): StorylinePayload => ({
    aggregate_concepts: selective.aggregate_concepts.map((concept) => ({
        concept: concept.concept.trim(),
        definition: concept.definition.trim(),
        covered_axial_codes: concept.covered_axial_codes
            .map((code) => code.trim())
            .filter(Boolean),
    })),
    axial_themes: summary
        .filter((row) => row.axial_code.trim())
        .map(
            (row): AxialTheme => ({
                axial_code: row.axial_code.trim(),
                open_code_examples: pickExamples(
                    row.member_open_codes,
                    config.maxExamplesPerAxial,
                    config.maxExampleChars,
                ),
            }),
        ),
});

/** What is wrong with a parsed reply, or null when it is a valid storyline. */
export const storylineProblem = (data: Record<string, unknown> | null) => {
    if (!data) {
        return "reply is not a JSON object";
    }
    if (typeof data.storyline !== "string" || !data.storyline.trim()) {
        return "storyline is missing or empty";
    }
    if (!Array.isArray(data.anchors) || !data.anchors.length) {
        return "anchors is missing or empty";
    }
    return null;
};

/**
 * Check a parsed reply and type it
 *
 * @throws {TerminalValidationError} If the storyline or the anchors are missing or empty
 */
export const validateStoryline = (
    data: Record<string, unknown> | null,
    raw: string,
): StorylineResult => {
    const problem = storylineProblem(data);
    if (problem || !data || typeof data.storyline !== "string" || !Array.isArray(data.anchors)) {
        throw new TerminalValidationError(problem ?? "invalid storyline", raw);
    }
    return { ...data, storyline: data.storyline.trim(), anchors: data.anchors };
};

export interface StorylineReply {
    result: StorylineResult;
    raw: string;
}

/**
 * Request and validate the storyline
 *
 * @throws {OracleError} If no attempt got a reply at all
 * @throws {TerminalValidationError} If the last reply is not a valid storyline
 */
export const requestStoryline = (
    oracle: Oracle,
    payload: StorylinePayload,
    config: StorylineConfig,
) =>
    logger.withSource("requestStoryline", async (): Promise<StorylineReply> => {
        const userContent = `Three layers of coding (aggregate_concepts from selective coding, axial_themes with a few open-code examples):\n${JSON.stringify(payload)}\n\nReply with JSON only (storyline + anchors) as instructed.`;
        let raw = "";

        const result = await retryAttempts(
            async (): Promise<Result<Record<string, unknown>, AttemptError>> => {
                const reply = await attemptOracle(oracle, {
                    systemPrompt: STORYLINE_SYSTEM_PROMPT,
                    userContent,
                    timeout: config.timeout,
                });
                if (!reply.ok) {
                    return err<AttemptError>({ kind: "oracle", error: reply.error });
                }
                raw = reply.value;
                const data = extractJSON(reply.value);
                const problem = storylineProblem(data);
                if (problem || !data) {
                    return err<AttemptError>({
                        kind: "malformed",
                        failure: {
                            kind: data ? "invalid-shape" : "unparsable",
                            detail: problem ?? "reply is not a JSON object",
                        },
                    });
                }
                return ok(data);
            },
            config,
            (error, tries, maxAttempts) => {
                logger.warn(`Attempt ${tries}/${maxAttempts} failed: ${describeAttemptError(error)}`);
            },
        );

        if (result.ok) {
            return { result: validateStoryline(result.value, raw), raw };
        }
        if (result.error.kind === "oracle" && !raw) {
            throw result.error.error;
        }
        return { result: validateStoryline(extractJSON(raw), raw), raw };
    });
