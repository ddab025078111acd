import { describe, expect, it } from "vitest";

import { payloadOf, scriptedOracle, testPipeline } from "../../test/fakes.js";
import type { AxialSummaryRow } from "../schema.js";

import {
    annotateCoverage,
    buildSelectivePayload,
    normalizeConcepts,
    requestSelectiveCoding,
    truncate,
} from "./selective-coding.js";

const summary: AxialSummaryRow[] = [
    { axial_code: "Support", member_open_codes: "manager helps; peers help", n_members: 2 },
    { axial_code: "Workload", member_open_codes: "deadlines; long hours", n_members: 2 },
];

describe("truncate", () => {
    it("cuts by code points", () => {
        expect(truncate("压力很大很累", 4)).toBe("压力很大");
        expect(truncate("short", 10)).toBe("short");
        expect(truncate("anything", 0)).toBe("");
    });
});

describe("buildSelectivePayload", () => {
    it("flattens newlines, truncates excerpts and drops blank axial codes", () => {
        const payload = buildSelectivePayload(
            [
                { axial_code: " Strain ", member_open_codes: "tired\nstressed", n_members: 2 },
                { axial_code: "  ", member_open_codes: "lost", n_members: 1 },
            ],
            10,
        );
        expect(JSON.parse(payload)).toEqual({
            axial_items: [{ axial_code: "Strain", member_open_codes_excerpt: "tired stre" }],
        });
    });
});

describe("normalizeConcepts", () => {
    it("trims fields and drops blank or non-string codes", () => {
        expect(
            normalizeConcepts([
                {
                    concept: " Strain ",
                    definition: "What wears people down",
                    covered_axial_codes: ["Workload ", "", null],
                },
                "not a concept",
                { concept: "Loose" },
            ]),
        ).toEqual([
            {
                concept: "Strain",
                definition: "What wears people down",
                covered_axial_codes: ["Workload"],
            },
            { concept: "Loose", definition: "", covered_axial_codes: [] },
        ]);
    });
});

describe("requestSelectiveCoding", () => {
    const reply =
        '{"aggregate_concepts":[{"concept":"Strain","definition":"Pressure at work","covered_axial_codes":["Workload"]},{"concept":"Buffers","definition":"What helps","covered_axial_codes":["Support"]}]}';

    it("sends the axial items and keeps the raw reply", async () => {
        const oracle = scriptedOracle([reply]);
        const { result, raw } = await requestSelectiveCoding(oracle, summary, testPipeline.selective);

        expect(payloadOf(oracle.mock.calls[0][0])).toEqual({
            axial_items: [
                { axial_code: "Support", member_open_codes_excerpt: "manager helps; peers help" },
                { axial_code: "Workload", member_open_codes_excerpt: "deadlines; long hours" },
            ],
        });
        expect(raw).toBe(reply);
        expect(result.aggregate_concepts.map((concept) => concept.concept)).toEqual([
            "Strain",
            "Buffers",
        ]);
    });

    it("keeps reply fields beyond the concepts", async () => {
        const oracle = scriptedOracle([
            '{"aggregate_concepts":[{"concept":" Strain ","covered_axial_codes":["Workload"]}],"notes":"thin data"}',
        ]);
        const { result } = await requestSelectiveCoding(oracle, summary, testPipeline.selective);

        expect(result).toEqual({
            aggregate_concepts: [
                { concept: "Strain", definition: "", covered_axial_codes: ["Workload"] },
            ],
            notes: "thin data",
        });
    });

    it("retries malformed replies", async () => {
        const oracle = scriptedOracle(["Let me think about it.", reply]);
        const { result } = await requestSelectiveCoding(oracle, summary, testPipeline.selective);

        expect(oracle).toHaveBeenCalledTimes(2);
        expect(result.aggregate_concepts).toHaveLength(2);
    });

    it("gives up with no concepts and the last reply", async () => {
        const oracle = scriptedOracle(["nope", "still nope"]);
        const { result, raw } = await requestSelectiveCoding(oracle, summary, {
            ...testPipeline.selective,
            retries: 2,
        });

        expect(result).toEqual({ aggregate_concepts: [] });
        expect(raw).toBe("still nope");
    });
});

describe("annotateCoverage", () => {
    it("leaves a partition unannotated", () => {
        const result = annotateCoverage(
            {
                aggregate_concepts: [
                    { concept: "All", definition: "", covered_axial_codes: ["Support", "Workload"] },
                ],
            },
            summary,
        );
        expect(result.coverage_warning).toBeUndefined();
    });

    it("attaches a warning when codes are missing", () => {
        const result = annotateCoverage(
            {
                aggregate_concepts: [
                    { concept: "Strain", definition: "", covered_axial_codes: ["Workload"] },
                ],
            },
            summary,
        );
        expect(result.coverage_warning).toEqual({ missing: ["Support"], extra: [], duplicated: [] });
    });

    it("carries other fields and replaces a stale warning", () => {
        const concepts = [
            { concept: "All", definition: "", covered_axial_codes: ["Support", "Workload"] },
        ];
        const result = annotateCoverage(
            {
                aggregate_concepts: concepts,
                notes: "thin data",
                coverage_warning: { missing: ["Other"], extra: [], duplicated: [] },
            },
            summary,
        );
        expect(result).toEqual({ aggregate_concepts: concepts, notes: "thin data" });
    });
});
