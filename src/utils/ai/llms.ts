/**
 * Oracle Client
 *
 * One fallible chat-completion call per invocation, on the Vercel AI SDK:
 * - Provider selection from a ModelConfig (OpenAI-compatible by default)
 * - A hard timeout per call; the request is aborted when it fires
 * - SDK-level retries disabled; retrying is up to the caller
 * - Token usage tracking per session for cost monitoring
 *
 * Every failure (network, HTTP status, malformed envelope, timeout, empty content)
 * surfaces as an OracleError.
 */

import { generateText, type LanguageModel } from "ai";
import { createAnthropic } from "@ai-sdk/anthropic";
import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { createOpenAI } from "@ai-sdk/openai";
import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import { createOpenRouter } from "@openrouter/ai-sdk-provider";

import type { ModelConfig } from "../core/config.js";
import { logger } from "../core/logger.js";
import { describeError, promiseWithTimeout } from "../core/misc.js";
import { err, ok, type Result } from "../core/result.js";

import { describeParseFailure, type ParseFailure } from "./json.js";

/** Fetch implementation handed to the provider; tests substitute an in-process one. */
export type FetchFunction = typeof globalThis.fetch;

/** Endpoint and credential used by OpenAI-compatible models without their own options. */
export interface OracleEndpoint {
    baseURL: string;
    apiKey: string;
}

/**
 * Session object tracking oracle usage and progress for a single model across requests
 *
 * @property config - The model configuration being used
 * @property model - The Vercel AI SDK LanguageModel instance
 * @property inputTokens - Cumulative input tokens consumed across all requests
 * @property outputTokens - Cumulative output tokens generated across all requests
 * @property expectedItems - Total number of items expected to be processed
 * @property finishedItems - Number of items that received an oracle verdict so far
 */
export interface LLMSession {
    config: ModelConfig;
    model: LanguageModel;
    inputTokens: number;
    outputTokens: number;
    expectedItems: number;
    finishedItems: number;
}

export interface Message {
    role: "system" | "user" | "assistant";
    content: string;
}

export class OracleError extends Error {
    override name = "OracleError";
    constructor(message: string, options?: ErrorOptions, source?: string) {
        super(`${source ?? logger.source ?? "oracle"}: ${message}`, options);
    }
}

/**
 * Create a Vercel AI SDK LanguageModel instance from a ModelConfig
 *
 * @param endpoint - Used by "openai-compatible" models that carry no options of their own
 * @param fetch - Optional fetch override passed to the provider
 *
 * @example
 * const model = getModel({ provider: "openai-compatible", name: "deepseek-chat" }, endpoint);
 */
export const getModel = (
    config: ModelConfig,
    endpoint: OracleEndpoint,
    fetch?: FetchFunction,
): LanguageModel => {
    switch (config.provider) {
        case "openai":
            return createOpenAI({
                apiKey: config.options?.apiKey ?? process.env.OPENAI_API_KEY,
                fetch,
            })(config.name);

        case "anthropic":
            return createAnthropic({
                apiKey: config.options?.apiKey ?? process.env.ANTHROPIC_API_KEY,
                fetch,
            })(config.name);

        case "google":
            return createGoogleGenerativeAI({
                apiKey: config.options?.apiKey ?? process.env.GOOGLE_API_KEY,
                fetch,
            })(config.name);

        case "openrouter":
            return createOpenRouter({
                apiKey: config.options?.apiKey ?? process.env.OPENROUTER_API_KEY,
                fetch,
            })(config.name);

        case "openai-compatible":
            return createOpenAICompatible({
                baseURL: config.options?.baseURL ?? endpoint.baseURL,
                apiKey: config.options?.apiKey ?? endpoint.apiKey,
                name: config.provider,
                fetch,
            }).chatModel(config.name);
    }
};

/** Start a fresh session with zeroed counters. */
export const createSession = (
    config: ModelConfig,
    endpoint: OracleEndpoint,
    fetch?: FetchFunction,
): LLMSession => ({
    config,
    model: getModel(config, endpoint, fetch),
    inputTokens: 0,
    outputTokens: 0,
    expectedItems: 0,
    finishedItems: 0,
});

/**
 * Run a task with a session and report its usage afterwards.
 */
export const useLLM = <T>(session: LLMSession, task: (session: LLMSession) => Promise<T>) =>
    logger.withSource("useLLM", async () => {
        logger.debug(`Using LLM ${session.config.name}`);
        const result = await task(session);
        logger.info(
            `LLM ${session.config.name} completed (input tokens: ${session.inputTokens}, output tokens: ${session.outputTokens}, finish rate: ${Math.round(
                (session.finishedItems / Math.max(1, session.expectedItems)) * 100,
            )}%)`,
        );
        return result;
    });

export interface OracleRequest {
    systemPrompt: string;
    userContent: string;
    /** Milliseconds before the call is abandoned */
    timeout: number;
}

/** A bound oracle: one request in, the raw reply text out. */
export type Oracle = (request: OracleRequest) => Promise<string>;

/** Reasoning models may prepend their chain of thought in <think> tags. */
const stripThinking = (text: string) => text.replace(/<think>[\s\S]*?<\/think>/g, "").trim();

/**
 * Send exactly one request to the model
 *
 * @returns The reply text, with any <think> block removed
 * @throws {OracleError} On transport/HTTP/envelope errors, timeout, or empty content
 */
export const requestLLM = (session: LLMSession, request: OracleRequest) =>
    logger.withSource("requestLLM", async () => {
        const { config, model } = session;
        const messages: Message[] = [
            { role: "system", content: request.systemPrompt },
            { role: "user", content: request.userContent },
        ];
        logger.debug(
            `[${config.name}] LLM request with timeout ${request.timeout}ms: \n${messages.map((m) => `${m.role}: ${m.content}`).join("\n---\n")}`,
        );

        const controller = new AbortController();
        const result = await promiseWithTimeout(
            generateText({
                model,
                messages,
                temperature: 0,
                maxRetries: 0,
                abortSignal: controller.signal,
            }),
            request.timeout,
            new OracleError(`No reply within ${request.timeout}ms`),
        ).catch((error: unknown) => {
            controller.abort();
            if (error instanceof OracleError) {
                throw error;
            }
            throw new OracleError(`Request failed: ${describeError(error)}`, { cause: error });
        });

        session.inputTokens += result.usage.inputTokens ?? 0;
        session.outputTokens += result.usage.outputTokens ?? 0;

        const text = stripThinking(result.text);
        if (!text) {
            throw new OracleError("Reply lacks message content");
        }
        logger.debug(
            `[${config.name}] LLM request completed (input tokens: ${session.inputTokens}, output tokens: ${session.outputTokens}): ${text}`,
        );
        return text;
    });

/** Bind a session into an Oracle function. */
export const bindOracle =
    (session: LLMSession): Oracle =>
    (request) =>
        requestLLM(session, request);

/** One oracle call as a Result; thrown values of any kind become OracleErrors. */
export const attemptOracle = async (
    oracle: Oracle,
    request: OracleRequest,
): Promise<Result<string, OracleError>> => {
    try {
        return ok(await oracle(request));
    } catch (error) {
        return err(
            error instanceof OracleError
                ? error
                : new OracleError(describeError(error), { cause: error }),
        );
    }
};

/** Why a single attempt produced nothing usable. */
export type AttemptError =
    | { kind: "oracle"; error: OracleError }
    | { kind: "malformed"; failure: ParseFailure };

export const describeAttemptError = (error: AttemptError) =>
    error.kind === "oracle" ? error.error.message : describeParseFailure(error.failure);

/** What a stage needs to reach the oracle; `session` is absent for bare oracles (tests). */
export interface OracleBinding {
    oracle: Oracle;
    session?: LLMSession;
}

export const bindSession = (session: LLMSession): OracleBinding => ({
    oracle: bindOracle(session),
    session,
});

/** Run a task against a binding, reporting session usage when there is one. */
export const useOracle = <T>(
    binding: OracleBinding,
    task: (oracle: Oracle, session?: LLMSession) => Promise<T>,
) => {
    const { oracle, session } = binding;
    return session ? useLLM(session, () => task(oracle, session)) : task(oracle);
};
