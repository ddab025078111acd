import { describe, expect, it } from "vitest";

import { replyingOracle, scriptedOracle, testPipeline } from "../../test/fakes.js";
import { createSession } from "../utils/ai/llms.js";

import {
    buildOpenUserContent,
    OPEN_SYSTEM_PROMPT,
    openCodeAnswer,
    parseOpenCode,
    runOpenCoding,
} from "./open-coding.js";

const block = { question: "你觉得工作压力大吗？", answer: "是的，压力很大\n很累" };

describe("parseOpenCode", () => {
    it("reads the open_code field", () => {
        expect(parseOpenCode('```json\n{"open_code": " 工作压力大 "}\n```')).toBe("工作压力大");
    });

    it("falls back to a regex match in broken JSON", () => {
        expect(parseOpenCode('{"open_code": "heavy workload", "note": ')).toBe("heavy workload");
    });

    it("falls back to the whole reply", () => {
        expect(parseOpenCode("  exhausted by work  ")).toBe("exhausted by work");
    });
});

describe("buildOpenUserContent", () => {
    it("labels the question as context and the answer as the target", () => {
        const content = buildOpenUserContent(block);
        expect(content).toContain("[Question]: 你觉得工作压力大吗？");
        expect(content).toContain("[Answer]: 是的，压力很大\n很累");
    });
});

describe("openCodeAnswer", () => {
    it("retries oracle failures", async () => {
        const oracle = scriptedOracle([new Error("busy"), '{"open_code":"stress"}']);
        await expect(openCodeAnswer(oracle, block, testPipeline.open)).resolves.toBe("stress");
        expect(oracle).toHaveBeenCalledTimes(2);
        expect(oracle.mock.calls[0][0].systemPrompt).toBe(OPEN_SYSTEM_PROMPT);
    });

    it("returns a failure marker once attempts run out", async () => {
        const oracle = scriptedOracle([]);
        const code = await openCodeAnswer(oracle, block, { ...testPipeline.open, retries: 2 });

        expect(code.startsWith("[oracle call failed: ")).toBe(true);
        expect(code).toContain("script exhausted");
        expect(oracle).toHaveBeenCalledTimes(2);
    });
});

describe("runOpenCoding", () => {
    it("codes every block in order with 1-based ids", async () => {
        const oracle = replyingOracle((request) =>
            JSON.stringify({ open_code: request.userContent.includes("first") ? "one" : "two" }),
        );
        const session = createSession(
            { provider: "openai-compatible", name: "test-model" },
            { baseURL: "http://localhost:9", apiKey: "test-secret" },
        );
        const records = await runOpenCoding(
            oracle,
            [
                { question: "Q1", answer: "first answer" },
                { question: "Q2", answer: "second answer" },
            ],
            testPipeline.open,
            session,
        );

        expect(records).toEqual([
            { id: 1, question: "Q1", answer: "first answer", open_code: "one" },
            { id: 2, question: "Q2", answer: "second answer", open_code: "two" },
        ]);
        expect(session.expectedItems).toBe(2);
        expect(session.finishedItems).toBe(2);
    });

    it("keeps going after a block fails", async () => {
        const oracle = scriptedOracle([
            new Error("down"),
            new Error("down"),
            new Error("down"),
            '{"open_code":"recovered"}',
        ]);
        const records = await runOpenCoding(
            oracle,
            [
                { question: "Q1", answer: "A1" },
                { question: "Q2", answer: "A2" },
            ],
            testPipeline.open,
        );

        expect(records[0].open_code.startsWith("[oracle call failed: ")).toBe(true);
        expect(records[1].open_code).toBe("recovered");
    });
});
