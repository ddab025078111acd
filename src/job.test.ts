import { describe, expect, it, vi } from "vitest";

import { makeJob, SELECTIVE_REPLY, STORYLINE_REPLY } from "../test/job-fixture.js";
import { scriptedOracle } from "../test/fakes.js";

import { TerminalValidationError } from "./consolidating/storyline.js";
import { BaseStep } from "./steps/base-step.js";

describe("CodingJob", () => {
    it("runs every stage in order", async () => {
        const onStep = vi.fn<(step: BaseStep) => void>();
        const job = makeJob(scriptedOracle([STORYLINE_REPLY]), onStep);
        await job.execute();

        expect(onStep.mock.calls.map(([step]) => step._id)).toEqual(["1", "2", "3", "4", "5"]);
        expect(job.open.records.map((record) => record.open_code)).toEqual([
            "workload",
            "small talk",
            "manager support",
        ]);
        expect(job.filter.result.excluded.map((code) => code.open_code)).toEqual(["small talk"]);
        expect(job.axial.result.summary).toEqual([
            { axial_code: "Pressure", member_open_codes: "workload", n_members: 1 },
            { axial_code: "Support", member_open_codes: "manager support", n_members: 1 },
        ]);
        expect(job.axial.result.rows.map((row) => row.axial_code)).toEqual([
            "Pressure",
            "",
            "Support",
        ]);
        expect(job.selective.result).toEqual({
            aggregate_concepts: [
                {
                    concept: "Coping",
                    definition: "How pressure meets support",
                    covered_axial_codes: ["Pressure", "Support"],
                },
            ],
            notes: "Support is mentioned less often than pressure.",
        });
        expect(job.selective.raw).toBe(SELECTIVE_REPLY);
        expect(job.storyline.result).toEqual({
            storyline: "Pressure builds and support absorbs it.",
            anchors: ["Coping"],
        });
    });

    it("aborts on an invalid storyline after the earlier stages finish", async () => {
        const invalid = '{"storyline":"No anchors here"}';
        const job = makeJob(scriptedOracle([invalid, invalid]));

        await expect(job.execute()).rejects.toBeInstanceOf(TerminalValidationError);
        expect(job.selective.executed).toBe(true);
        expect(job.storyline.aborted).toBe(true);
        expect(job.storyline.executed).toBe(false);
        expect(() => job.storyline.result).toThrow(BaseStep.UnexecutedError);
    });

    it("refuses to run a step twice", async () => {
        const job = makeJob(scriptedOracle([STORYLINE_REPLY]));
        await job.execute();

        await expect(job.open.execute()).rejects.toThrow(BaseStep.ConfigError);
    });

    it("refuses to run a step before its dependencies", async () => {
        const job = makeJob(scriptedOracle([STORYLINE_REPLY]));

        await expect(job.filter.execute()).rejects.toThrow(BaseStep.UnexecutedError);
    });

    it("aborts a step whose upstream step failed", async () => {
        const job = makeJob(scriptedOracle([STORYLINE_REPLY]));
        job.open.abort();

        await expect(job.filter.execute()).rejects.toThrow(BaseStep.AbortedError);
        expect(job.filter.aborted).toBe(true);
        expect(job.filter.executed).toBe(false);
    });
});
