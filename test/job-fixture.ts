/**
 * A three-answer interview run end to end through fake oracles.
 */

import { CodingJob } from "../src/job.js";
import type { BaseStep } from "../src/steps/base-step.js";
import type { Oracle } from "../src/utils/ai/llms.js";

import { replyingOracle, scriptedOracle, testPipeline } from "./fakes.js";

export const TRANSCRIPT = [
    "Q: How is work?",
    "A: Deadlines everywhere",
    "Q: Nice weather today?",
    "A: Yes, sunny",
    "Q: Who helps you?",
    "A: My manager",
].join("\n");

const openOracle = replyingOracle((request) => {
    const code = request.userContent.includes("Deadlines")
        ? "workload"
        : request.userContent.includes("sunny")
          ? "small talk"
          : "manager support";
    return JSON.stringify({ open_code: code });
});

const FILTER_REPLY = JSON.stringify({
    filtering: [
        { id: 1, retain: true, exclude_reason: "" },
        { id: 2, retain: false, exclude_reason: "not about work" },
        { id: 3, retain: true, exclude_reason: "" },
    ],
});
const AXIAL_REPLY = JSON.stringify({
    axial_coding: [
        { axial_code: "Pressure", member_ids: [1] },
        { axial_code: "Support", member_ids: [3] },
    ],
});
export const SELECTIVE_REPLY = JSON.stringify({
    aggregate_concepts: [
        {
            concept: "Coping",
            definition: "How pressure meets support",
            covered_axial_codes: ["Pressure", "Support"],
        },
    ],
    notes: "Support is mentioned less often than pressure.",
});
export const STORYLINE_REPLY = JSON.stringify({
    storyline: "Pressure builds and support absorbs it.",
    anchors: ["Coping"],
});

export const makeJob = (storyline: Oracle, onStep?: (step: BaseStep) => void | Promise<void>) =>
    new CodingJob({
        transcript: TRANSCRIPT,
        llms: {
            open: { oracle: openOracle },
            filter: { oracle: scriptedOracle([FILTER_REPLY]) },
            axial: { oracle: scriptedOracle([AXIAL_REPLY]) },
            selective: { oracle: scriptedOracle([SELECTIVE_REPLY]) },
            storyline: { oracle: storyline },
        },
        pipeline: testPipeline,
        onStep,
    });
