import { describe, expect, it } from "vitest";

import type { AxialCodedUnique } from "../schema.js";

import { makeAxialSummary } from "./axial-summary.js";

const code = (code_id: number, open_code: string, axial_code: string, retain = true) =>
    ({
        code_id,
        open_code,
        retain,
        exclude_reason: retain ? "" : "off topic",
        axial_code,
    }) satisfies AxialCodedUnique;

describe("makeAxialSummary", () => {
    it("groups retained codes by axial code in code-point order", () => {
        expect(
            makeAxialSummary([
                code(1, "long hours", "Workload"),
                code(2, "manager helps", "Support"),
                code(3, "deadlines", "Workload"),
                code(4, "peers help", " Support "),
            ]),
        ).toEqual([
            { axial_code: "Support", member_open_codes: "manager helps; peers help", n_members: 2 },
            { axial_code: "Workload", member_open_codes: "deadlines; long hours", n_members: 2 },
        ]);
    });

    it("counts distinct members only", () => {
        expect(
            makeAxialSummary([code(1, "stress", "Strain"), code(2, " stress ", "Strain")]),
        ).toEqual([{ axial_code: "Strain", member_open_codes: "stress", n_members: 1 }]);
    });

    it("skips excluded and unclassified codes", () => {
        expect(
            makeAxialSummary([code(1, "weather", "Small talk", false), code(2, "orphan", "")]),
        ).toEqual([]);
    });
});
