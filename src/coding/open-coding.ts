/**
 * Open Coding
 *
 * One oracle call per question/answer block, labelling the answer with a short open
 * code. Replies are read leniently: a JSON `open_code` field, then a regex match of
 * that field in broken JSON, then the whole reply. Only oracle failures are retried;
 * a block whose calls all fail is coded with a visible failure marker.
 */

import type { PipelineConfig } from "../utils/core/config.js";
import { logger } from "../utils/core/logger.js";
import { sleep } from "../utils/core/misc.js";
import type { Result } from "../utils/core/result.js";
import { retryAttempts } from "../utils/core/retry.js";
import { extractJSON } from "../utils/ai/json.js";
import {
    attemptOracle,
    type LLMSession,
    type Oracle,
    type OracleError,
} from "../utils/ai/llms.js";
import type { OpenCodeRecord, QABlock } from "../schema.js";

import { readText } from "./normalizer.js";

export const OPEN_SYSTEM_PROMPT = `
You are an experienced qualitative researcher doing open coding on interview transcripts.
For the answer you are given, write one concise open code (a short phrase) that captures its core meaning.
Stay close to the interviewee's own words. Do not code the question.

Output JSON only: {"open_code":"..."}
`.trim();

export type OpenCodingConfig = PipelineConfig["open"];

export const buildOpenUserContent = ({ question, answer }: QABlock) =>
    [
        "Below is one question/answer exchange from an interview.",
        `[Question]: ${question}`,
        `[Answer]: ${answer}`,
        "",
        "Code the [Answer] only. The question is there to help you understand the context; do not code it.",
    ].join("\n");

const OPEN_CODE_FIELD = /"open_code"\s*:\s*"([^"]+)"/;

/** Read the open code out of a reply, falling back to the reply text itself. */
export const parseOpenCode = (raw: string) => {
    const data = extractJSON(raw);
    if (data && "open_code" in data) {
        return readText(data.open_code);
    }
    const match = OPEN_CODE_FIELD.exec(raw);
    if (match?.[1]) {
        return match[1].trim();
    }
    return raw.trim();
};

export const failureMarker = (error: OracleError) => `[oracle call failed: ${error.message}]`;

const codeAnswer = (
    oracle: Oracle,
    block: QABlock,
    config: OpenCodingConfig,
): Promise<Result<string, OracleError>> =>
    retryAttempts(
        () =>
            attemptOracle(oracle, {
                systemPrompt: OPEN_SYSTEM_PROMPT,
                userContent: buildOpenUserContent(block),
                timeout: config.timeout,
            }),
        config,
        (error, tries, maxAttempts) => {
            logger.warn(`Attempt ${tries}/${maxAttempts} failed: ${error.message}`);
        },
    );

/**
 * Code one answer
 *
 * @returns The open code, or `[oracle call failed: <error>]` when every attempt failed
 */
export const openCodeAnswer = async (
    oracle: Oracle,
    block: QABlock,
    config: OpenCodingConfig,
) => {
    const result = await codeAnswer(oracle, block, config);
    return result.ok ? parseOpenCode(result.value) : failureMarker(result.error);
};

/** Code every block in order; record ids are 1-based positions. */
export const runOpenCoding = (
    oracle: Oracle,
    blocks: QABlock[],
    config: OpenCodingConfig,
    session?: LLMSession,
) =>
    logger.withSource("runOpenCoding", async () => {
        const records: OpenCodeRecord[] = [];
        if (session) {
            session.expectedItems += blocks.length;
        }
        for (const [i, block] of blocks.entries()) {
            const result = await codeAnswer(oracle, block, config);
            let open_code: string;
            if (result.ok) {
                open_code = parseOpenCode(result.value);
                if (session) {
                    session.finishedItems++;
                }
            } else {
                open_code = failureMarker(result.error);
                logger.warn(`Block ${i + 1} left uncoded: ${result.error.message}`);
            }
            records.push({ id: i + 1, ...block, open_code });
            logger.info(`Coded ${i + 1}/${blocks.length}: ${open_code}`);
            await sleep(config.itemSleep);
        }
        return records;
    });
