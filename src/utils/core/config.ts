/**
 * Configuration Management
 *
 * Loads everything the pipeline needs from three layers, later layers winning:
 * - Built-in defaults for every stage (batch sizes, retries, sleeps, timeouts)
 * - An optional `config.json` (model aliases under `llms`, stage models under `models`,
 *   stage parameters under `pipeline`)
 * - Environment variables, with `.env` loaded through dotenv
 *
 * The oracle credential (`ORACLE_API_KEY`) has no default: loading the oracle
 * configuration without it fails immediately.
 */

import { existsSync } from "fs";
import { resolve } from "path";

import * as dotenv from "dotenv";
import { z } from "zod";

import { readJSONFile } from "../io/file.js";

dotenv.config();

/** Pipeline stages that talk to the oracle, in execution order. */
export const STAGES = ["open", "filter", "axial", "selective", "storyline"] as const;
export type Stage = (typeof STAGES)[number];

export const PROVIDERS = [
    "openai-compatible",
    "openai",
    "anthropic",
    "google",
    "openrouter",
] as const;
export type Provider = (typeof PROVIDERS)[number];

/**
 * Configuration object for an LLM model
 *
 * @property provider - AI provider; "openai-compatible" targets `ORACLE_BASE_URL`
 * @property name - Model name/identifier used by the provider
 * @property options - Per-model endpoint and credential overrides
 */
export interface ModelConfig {
    provider: Provider;
    name: string;
    options?: {
        baseURL?: string;
        apiKey?: string;
    };
}

export interface StageParameters {
    /** Attempts per oracle request (or per batch) */
    retries: number;
    /** Pause between attempts (ms) */
    retrySleep: number;
    /** Timeout of a single oracle call (ms) */
    timeout: number;
}

export interface PipelineConfig {
    open: StageParameters & {
        /** Cooldown after each coded answer (ms) */
        itemSleep: number;
    };
    filter: StageParameters & {
        /** Maximum codes per filtering request */
        batchSize: number;
        /** Cooldown after each top-level batch (ms) */
        batchSleep: number;
    };
    axial: StageParameters & {
        /** Cooldown after a successful axial request (ms) */
        cooldown: number;
    };
    selective: StageParameters & {
        /** Characters of member open codes shown per axial code */
        excerptLimit: number;
    };
    storyline: StageParameters & {
        maxExamplesPerAxial: number;
        maxExampleChars: number;
    };
}

export const defaultPipelineConfig: PipelineConfig = {
    open: { retries: 3, retrySleep: 2000, timeout: 120_000, itemSleep: 1000 },
    filter: { retries: 2, retrySleep: 2000, timeout: 180_000, batchSize: 60, batchSleep: 1000 },
    axial: { retries: 3, retrySleep: 3000, timeout: 240_000, cooldown: 1000 },
    selective: { retries: 2, retrySleep: 3000, timeout: 300_000, excerptLimit: 220 },
    storyline: {
        retries: 2,
        retrySleep: 3000,
        timeout: 420_000,
        maxExamplesPerAxial: 6,
        maxExampleChars: 28,
    },
};

export const DEFAULT_BASE_URL = "https://api.deepseek.com";
export const DEFAULT_CHAT_MODEL = "deepseek-chat";
export const DEFAULT_REASONER_MODEL = "deepseek-reasoner";

export class ConfigError extends Error {
    override name = "ConfigError";
}

const ModelConfigSchema = z.object({
    provider: z.enum(PROVIDERS).default("openai-compatible"),
    name: z.string().min(1),
    options: z
        .object({
            baseURL: z.string().optional(),
            apiKey: z.string().optional(),
        })
        .optional(),
});

const Milliseconds = z.number().min(0);
const StageSchema = z.object({
    retries: z.number().int().min(1),
    retrySleep: Milliseconds,
    timeout: z.number().positive(),
});

const ConfigFileSchema = z.object({
    llms: z.record(z.union([z.string(), ModelConfigSchema])).default({}),
    models: z.record(z.enum(STAGES), z.string().min(1)).default({}),
    pipeline: z
        .object({
            open: StageSchema.extend({ itemSleep: Milliseconds }).partial(),
            filter: StageSchema.extend({
                batchSize: z.number().int().min(1),
                batchSleep: Milliseconds,
            }).partial(),
            axial: StageSchema.extend({ cooldown: Milliseconds }).partial(),
            selective: StageSchema.extend({ excerptLimit: z.number().int().min(0) }).partial(),
            storyline: StageSchema.extend({
                maxExamplesPerAxial: z.number().int().min(1),
                maxExampleChars: z.number().int().min(1),
            }).partial(),
        })
        .partial()
        .default({}),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Load `config.json`
 *
 * @param configPath - Explicit path; a missing explicit file is an error, while a
 *                     missing default `./config.json` just yields an empty configuration
 * @throws {ConfigError} If the file is not valid JSON or does not match the schema
 */
export const loadConfigFile = (configPath?: string): ConfigFile => {
    const path = configPath ?? resolve(process.cwd(), "config.json");
    if (!existsSync(path)) {
        if (configPath) {
            throw new ConfigError(`Configuration file not found: ${path}`);
        }
        return ConfigFileSchema.parse({});
    }

    let content: unknown;
    try {
        content = readJSONFile(path);
    } catch (error) {
        throw new ConfigError(
            `Failed to parse configuration file: ${error instanceof Error ? error.message : "Unknown error"}`,
        );
    }
    const parsed = ConfigFileSchema.safeParse(content);
    if (!parsed.success) {
        throw new ConfigError(
            `Invalid configuration file ${path}: ${parsed.error.issues
                .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
                .join("; ")}`,
        );
    }
    return parsed.data;
};

/** Merge stage parameters from `config.json` over the defaults. */
export const getPipelineConfig = (file: ConfigFile = loadConfigFile()): PipelineConfig => {
    const overrides = file.pipeline;
    return {
        open: { ...defaultPipelineConfig.open, ...overrides.open },
        filter: { ...defaultPipelineConfig.filter, ...overrides.filter },
        axial: { ...defaultPipelineConfig.axial, ...overrides.axial },
        selective: { ...defaultPipelineConfig.selective, ...overrides.selective },
        storyline: { ...defaultPipelineConfig.storyline, ...overrides.storyline },
    };
};

/**
 * Get a model configuration by name
 *
 * String entries in `llms` are aliases and are followed; a name with no entry is
 * used verbatim as an OpenAI-compatible model.
 *
 * @throws {ConfigError} If aliases form a cycle
 *
 * @example
 * // config.json: { "llms": { "reasoner": "deepseek-reasoner" } }
 * getModelConfig("reasoner", file.llms); // { provider: "openai-compatible", name: "deepseek-reasoner" }
 */
export const getModelConfig = (
    name: string,
    llms: ConfigFile["llms"] = {},
    seen = new Set<string>(),
): ModelConfig => {
    const entry = llms[name];
    if (entry === undefined) {
        return { provider: "openai-compatible", name };
    }
    if (typeof entry === "string") {
        if (seen.has(name)) {
            throw new ConfigError(`Model alias cycle: ${[...seen, name].join(" -> ")}`);
        }
        seen.add(name);
        return getModelConfig(entry, llms, seen);
    }
    return entry;
};

export interface OracleConfig {
    baseURL: string;
    apiKey: string;
    models: Record<Stage, ModelConfig>;
}

const readEnv = (env: NodeJS.ProcessEnv, key: string) => {
    const value = env[key]?.trim();
    return value ? value : undefined;
};

/**
 * Resolve the endpoint, credential and per-stage models
 *
 * Model precedence per stage: environment variable, then `models` in config.json,
 * then the built-in default.
 *
 * @throws {ConfigError} If `ORACLE_API_KEY` is missing or blank
 */
export const getOracleConfig = (
    env: NodeJS.ProcessEnv = process.env,
    file: ConfigFile = loadConfigFile(),
): OracleConfig => {
    const apiKey = readEnv(env, "ORACLE_API_KEY");
    if (!apiKey) {
        throw new ConfigError("Missing env var: ORACLE_API_KEY");
    }
    const reasoner = readEnv(env, "ORACLE_REASONER_MODEL");
    const names: Record<Stage, string> = {
        open: readEnv(env, "ORACLE_OPEN_MODEL") ?? file.models.open ?? DEFAULT_CHAT_MODEL,
        filter:
            readEnv(env, "ORACLE_FILTER_MODEL") ?? file.models.filter ?? DEFAULT_REASONER_MODEL,
        axial: readEnv(env, "ORACLE_AXIAL_MODEL") ?? file.models.axial ?? DEFAULT_REASONER_MODEL,
        selective: reasoner ?? file.models.selective ?? DEFAULT_REASONER_MODEL,
        storyline: reasoner ?? file.models.storyline ?? DEFAULT_REASONER_MODEL,
    };
    return {
        baseURL: readEnv(env, "ORACLE_BASE_URL") ?? DEFAULT_BASE_URL,
        apiKey,
        models: {
            open: getModelConfig(names.open, file.llms),
            filter: getModelConfig(names.filter, file.llms),
            axial: getModelConfig(names.axial, file.llms),
            selective: getModelConfig(names.selective, file.llms),
            storyline: getModelConfig(names.storyline, file.llms),
        },
    };
};
