import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";

import { afterAll, describe, expect, it } from "vitest";

import {
    ConfigError,
    defaultPipelineConfig,
    getModelConfig,
    getOracleConfig,
    getPipelineConfig,
    loadConfigFile,
} from "./config.js";

const folder = mkdtempSync(join(tmpdir(), "grounded-coder-config-"));
afterAll(() => {
    rmSync(folder, { recursive: true, force: true });
});

const writeConfig = (name: string, content: string) => {
    const path = join(folder, name);
    writeFileSync(path, content, "utf-8");
    return path;
};

const emptyFile = { llms: {}, models: {}, pipeline: {} };

describe("loadConfigFile", () => {
    it("fills defaults for absent sections", () => {
        expect(loadConfigFile(writeConfig("empty.json", "{}"))).toEqual(emptyFile);
    });

    it("fails on an explicit path that does not exist", () => {
        expect(() => loadConfigFile(join(folder, "missing.json"))).toThrow(ConfigError);
    });

    it("fails on invalid JSON", () => {
        expect(() => loadConfigFile(writeConfig("broken.json", "{ not json"))).toThrow(
            "Failed to parse configuration file",
        );
    });

    it("names the offending field", () => {
        const path = writeConfig("bad.json", JSON.stringify({ pipeline: { filter: { batchSize: 0 } } }));
        expect(() => loadConfigFile(path)).toThrow("pipeline.filter.batchSize");
    });
});

describe("getPipelineConfig", () => {
    it("merges stage overrides over the defaults", () => {
        const file = loadConfigFile(
            writeConfig("pipeline.json", JSON.stringify({ pipeline: { filter: { batchSize: 10 } } })),
        );
        const pipeline = getPipelineConfig(file);

        expect(pipeline.filter).toEqual({ ...defaultPipelineConfig.filter, batchSize: 10 });
        expect(pipeline.open).toEqual(defaultPipelineConfig.open);
    });
});

describe("getModelConfig", () => {
    const llms = {
        fast: "chat",
        chat: { provider: "openai-compatible" as const, name: "deepseek-chat" },
        loop: "again",
        again: "loop",
    };

    it("follows aliases to a model entry", () => {
        expect(getModelConfig("fast", llms)).toEqual({
            provider: "openai-compatible",
            name: "deepseek-chat",
        });
    });

    it("uses unknown names as OpenAI-compatible models", () => {
        expect(getModelConfig("some-model", llms)).toEqual({
            provider: "openai-compatible",
            name: "some-model",
        });
    });

    it("detects alias cycles", () => {
        expect(() => getModelConfig("loop", llms)).toThrow("Model alias cycle: loop -> again -> loop");
    });
});

describe("getOracleConfig", () => {
    it("requires the API key", () => {
        expect(() => getOracleConfig({}, emptyFile)).toThrow("Missing env var: ORACLE_API_KEY");
        expect(() => getOracleConfig({ ORACLE_API_KEY: "  " }, emptyFile)).toThrow(ConfigError);
    });

    it("uses the default endpoint and models", () => {
        const config = getOracleConfig({ ORACLE_API_KEY: "test-secret" }, emptyFile);

        expect(config.baseURL).toBe("https://api.deepseek.com");
        expect(config.apiKey).toBe("test-secret");
        expect(config.models.open.name).toBe("deepseek-chat");
        expect(config.models.filter.name).toBe("deepseek-reasoner");
        expect(config.models.storyline.name).toBe("deepseek-reasoner");
    });

    it("prefers environment variables over config.json models", () => {
        const config = getOracleConfig(
            {
                ORACLE_API_KEY: "test-secret",
                ORACLE_BASE_URL: "http://localhost:8080/v1",
                ORACLE_REASONER_MODEL: "env-reasoner",
            },
            { ...emptyFile, models: { open: "file-open", selective: "file-selective" } },
        );

        expect(config.baseURL).toBe("http://localhost:8080/v1");
        expect(config.models.open.name).toBe("file-open");
        expect(config.models.selective.name).toBe("env-reasoner");
        expect(config.models.storyline.name).toBe("env-reasoner");
    });
});
