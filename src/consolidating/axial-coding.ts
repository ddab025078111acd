/**
 * Axial Coding
 *
 * Groups all retained open codes into axial codes in a single oracle request.
 * A reply that never parses leaves every code unclassified (an empty map).
 */

import { z } from "zod";

import { readText, parseItemId } from "../coding/normalizer.js";
import type { UniqueCode } from "../schema.js";
import { isRecord, parseStructured } from "../utils/ai/json.js";
import {
    type AttemptError,
    attemptOracle,
    describeAttemptError,
    type LLMSession,
    type Oracle,
} from "../utils/ai/llms.js";
import type { PipelineConfig } from "../utils/core/config.js";
import { logger } from "../utils/core/logger.js";
import { sleep } from "../utils/core/misc.js";
import { err, ok, type Result } from "../utils/core/result.js";
import { retryAttempts } from "../utils/core/retry.js";

export const AXIAL_SYSTEM_PROMPT = `
You are a qualitative researcher doing axial coding.
You receive the retained open codes of a study, each with a numeric id.
Group related open codes into axial codes (themes). Name each axial code with a short phrase.
Every open code id should belong to exactly one axial code.

Input: {"open_codes":[{"id":1,"text":"..."}]}
Output JSON only:
{"axial_coding":[{"axial_code":"...","member_ids":[1,2]}]}
`.trim();

export type AxialConfig = PipelineConfig["axial"];

const AxialReplySchema = z.object({ axial_coding: z.array(z.unknown()) });

/**
 * Read `axial_coding` groups into code_id → axial_code
 *
 * Member ids are integer-parsed (unparsable ones skipped); ids outside `known` are
 * ignored; when an id appears in several groups the later group wins.
 */
export const readAxialGroups = (groups: unknown[], known: ReadonlySet<number>) => {
    const assignments = new Map<number, string>();
    for (const group of groups) {
        if (!isRecord(group)) {
            continue;
        }
        const axial = readText(group.axial_code);
        const members = Array.isArray(group.member_ids) ? group.member_ids : [];
        for (const member of members) {
            const id = parseItemId(member);
            if (id !== undefined && known.has(id)) {
                assignments.set(id, axial);
            }
        }
    }
    return assignments;
};

/**
 * Ask the oracle to group the retained codes
 *
 * @returns code_id → axial_code; empty when every attempt failed
 */
export const requestAxialCoding = (
    oracle: Oracle,
    retained: UniqueCode[],
    config: AxialConfig,
    session?: LLMSession,
) =>
    logger.withSource("requestAxialCoding", async () => {
        if (!retained.length) {
            logger.warn("No retained open codes; skipping axial coding");
            return new Map<number, string>();
        }

        const known = new Set(retained.map((code) => code.code_id));
        const payload = JSON.stringify({
            open_codes: retained.map((code) => ({ id: code.code_id, text: code.open_code.trim() })),
        });
        if (session) {
            session.expectedItems += retained.length;
        }

        const result = await retryAttempts(
            async (): Promise<Result<Map<number, string>, AttemptError>> => {
                const reply = await attemptOracle(oracle, {
                    systemPrompt: AXIAL_SYSTEM_PROMPT,
                    userContent: `Retained open codes (JSON):\n${payload}\n\nGroup them into axial codes as instructed and reply with JSON only.`,
                    timeout: config.timeout,
                });
                if (!reply.ok) {
                    return err<AttemptError>({ kind: "oracle", error: reply.error });
                }
                const parsed = parseStructured(reply.value, AxialReplySchema);
                if (!parsed.ok) {
                    return err<AttemptError>({ kind: "malformed", failure: parsed.error });
                }
                return ok(readAxialGroups(parsed.value.axial_coding, known));
            },
            config,
            (error, tries, maxAttempts) => {
                logger.warn(`Attempt ${tries}/${maxAttempts} failed: ${describeAttemptError(error)}`);
            },
        );

        if (!result.ok) {
            logger.warn("Axial coding failed; all retained codes stay unclassified");
            return new Map<number, string>();
        }
        if (session) {
            session.finishedItems += result.value.size;
        }
        logger.info(
            `Assigned ${result.value.size}/${retained.length} codes to ${new Set(result.value.values()).size} axial codes`,
        );
        await sleep(config.cooldown);
        return result.value;
    });
