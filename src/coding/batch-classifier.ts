/**
 * Resilient Batch Classifier
 *
 * Classifies an ordered list of texts through the oracle so that every item receives
 * exactly one verdict, whatever the oracle does:
 *
 * 1. Items are sent in top-level batches of at most `batchSize`, each item tagged with
 *    a local id 1..n, as `{"<itemKind>": [{"id": 1, "text": "..."}, ...]}`
 * 2. Each batch gets up to `retries` attempts; an attempt succeeds when the reply
 *    normalizes into n verdicts
 * 3. A batch whose attempts all fail is bisected at floor(n/2) and both halves are
 *    classified again, each with a fresh retry budget
 * 4. A single item whose attempts all fail gets the task's failure verdict
 *
 * Bisection shrinks a failing batch until a poison item is isolated, so only items that
 * cannot be classified on their own end up with the failure verdict. Calls are strictly
 * sequential; each call returns the verdicts of its own slice and the caller merges them.
 */

import { z } from "zod";

import {
    type AttemptError,
    attemptOracle,
    describeAttemptError,
    type LLMSession,
    type Oracle,
} from "../utils/ai/llms.js";
import { parseStructured } from "../utils/ai/json.js";
import { logger } from "../utils/core/logger.js";
import { sleep } from "../utils/core/misc.js";
import { err, ok, type Result, type RetryPolicy } from "../utils/core/result.js";
import { retryAttempts } from "../utils/core/retry.js";

import { type NumberedVerdict, normalizeResult, type VerdictReader } from "./normalizer.js";

/** The stage-specific half of a classification: wire keys, prompts, and defaults. */
export interface BatchTask<T> {
    /** Key of the item list in the request, e.g. "open_codes" */
    itemKind: string;
    reader: VerdictReader<T>;
    systemPrompt: string;
    /** Wrap the serialized batch into the user message */
    buildUserContent: (payload: string) => string;
    /** Verdict for a single item that failed every attempt */
    failed: (reason: string) => T;
}

export interface BatchClassifierConfig extends RetryPolicy {
    /** Maximum items per top-level batch */
    batchSize: number;
    /** Cooldown between top-level batches (ms) */
    batchSleep: number;
    /** Timeout of a single oracle call (ms) */
    timeout: number;
}

abstract class ClassifierError extends Error {
    override name = "BatchClassifier.Error";
    constructor(message: string, source?: string) {
        super(`${source ?? logger.source ?? "BatchClassifier"}: ${message}`);
    }
}

export class BatchClassifier<T> {
    static Error = ClassifierError;
    static ConfigError = class extends ClassifierError {
        override name = "BatchClassifier.ConfigError";
    };

    readonly #replySchema: z.ZodType<Record<string, unknown>, z.ZodTypeDef, unknown>;

    constructor(
        private readonly oracle: Oracle,
        private readonly task: BatchTask<T>,
        private readonly config: BatchClassifierConfig,
        private readonly session?: LLMSession,
    ) {
        if (!Number.isInteger(config.batchSize) || config.batchSize < 1) {
            throw new BatchClassifier.ConfigError(
                `Batch size must be a positive integer, got ${config.batchSize}`,
                "BatchClassifier#constructor",
            );
        }
        this.#replySchema = z.record(z.unknown()).refine(
            (reply) => Array.isArray(reply[task.reader.listKey]),
            { message: `missing "${task.reader.listKey}" list` },
        );
    }

    /**
     * Classify all texts
     *
     * @returns One verdict per text, keyed by 1-based global id (position + 1)
     */
    classify(texts: string[]) {
        return logger.withSource("BatchClassifier", "classify", async () => {
            const verdicts = new Map<number, T>();
            if (!texts.length) {
                logger.info(`No ${this.task.itemKind} to classify`);
                return verdicts;
            }

            const { batchSize } = this.config;
            const batches = Math.ceil(texts.length / batchSize);
            if (this.session) {
                this.session.expectedItems += texts.length;
            }
            logger.info(
                `Classifying ${texts.length} ${this.task.itemKind} in ${batches} batch(es) of up to ${batchSize}`,
            );

            for (let start = 0; start < texts.length; start += batchSize) {
                const batch = texts.slice(start, start + batchSize);
                logger.info(
                    `Batch ${start / batchSize + 1}/${batches}: items ${start + 1}-${start + batch.length}`,
                );
                for (const [id, verdict] of await this.classifyRange(batch, start)) {
                    verdicts.set(id, verdict);
                }
                if (start + batchSize < texts.length) {
                    await sleep(this.config.batchSleep);
                }
            }
            return verdicts;
        });
    }

    /**
     * Classify one slice, bisecting on persistent failure
     *
     * @param globalOffset - Global id of the slice's first item, minus one
     * @returns Exactly one verdict per item, keyed by global id
     */
    async classifyRange(items: string[], globalOffset: number): Promise<Map<number, T>> {
        const n = items.length;
        const range = `${globalOffset + 1}-${globalOffset + n}`;
        if (!n) {
            return new Map<number, T>();
        }

        const result = await retryAttempts(
            () => this.attempt(items),
            this.config,
            (error, tries, maxAttempts) => {
                logger.warn(
                    `Items ${range}: attempt ${tries}/${maxAttempts} failed (${describeAttemptError(error)})`,
                );
            },
        );

        if (result.ok) {
            if (this.session) {
                this.session.finishedItems += n;
            }
            return new Map(
                result.value.map(({ id, verdict }): [number, T] => [globalOffset + id, verdict]),
            );
        }

        if (n === 1) {
            logger.warn(`Item ${globalOffset + 1} could not be classified, marked for review`);
            return new Map<number, T>([
                [
                    globalOffset + 1,
                    this.task.failed(
                        `oracle or parse failure (single item), requires manual review: ${describeAttemptError(result.error)}`,
                    ),
                ],
            ]);
        }

        const mid = Math.floor(n / 2);
        logger.info(`Items ${range}: bisecting into ${mid} + ${n - mid}`);
        const left = await this.classifyRange(items.slice(0, mid), globalOffset);
        const right = await this.classifyRange(items.slice(mid), globalOffset + mid);
        return new Map([...left, ...right]);
    }

    /** One oracle round trip over a slice, as a Result. */
    async attempt(items: string[]): Promise<Result<NumberedVerdict<T>[], AttemptError>> {
        const payload = JSON.stringify({
            [this.task.itemKind]: items.map((text, i) => ({ id: i + 1, text })),
        });
        const reply = await attemptOracle(this.oracle, {
            systemPrompt: this.task.systemPrompt,
            userContent: this.task.buildUserContent(payload),
            timeout: this.config.timeout,
        });
        if (!reply.ok) {
            return err<AttemptError>({ kind: "oracle", error: reply.error });
        }

        const parsed = parseStructured(reply.value, this.#replySchema);
        if (!parsed.ok) {
            return err<AttemptError>({ kind: "malformed", failure: parsed.error });
        }
        return ok(normalizeResult(parsed.value, items.length, this.task.reader));
    }
}
