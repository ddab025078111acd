/**
 * Selective Step
 *
 * Abstracts the axial codes into aggregate concepts and annotates the result with a
 * coverage warning when the concepts do not partition the axial codes.
 */

import {
    annotateCoverage,
    requestSelectiveCoding,
    type SelectiveConfig,
} from "../consolidating/selective-coding.js";
import type { SelectiveResult } from "../schema.js";
import { type OracleBinding, useOracle } from "../utils/ai/llms.js";

import type { AxialStep } from "./axial-step.js";
import { BaseStep } from "./base-step.js";

export interface SelectiveStepConfig {
    axial: AxialStep;
    llm: OracleBinding;
    parameters: SelectiveConfig;
}

export class SelectiveStep extends BaseStep {
    override dependsOn: BaseStep[];

    #result?: SelectiveResult;
    #raw?: string;

    get result() {
        return this._result(this.#result, "result");
    }

    /** The oracle reply the result was read from */
    get raw() {
        return this._result(this.#raw, "raw");
    }

    constructor(private readonly config: SelectiveStepConfig) {
        super();
        this.dependsOn = [config.axial];
    }

    override async execute() {
        await super.execute();

        await this._run(async () => {
            const { summary } = this.config.axial.result;
            const reply = await useOracle(this.config.llm, (oracle) =>
                requestSelectiveCoding(oracle, summary, this.config.parameters),
            );
            this.#raw = reply.raw;
            this.#result = annotateCoverage(reply.result, summary);
        });
    }
}
