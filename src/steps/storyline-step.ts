/**
 * Storyline Step
 *
 * The terminal stage. Its validation failure is fatal to the run.
 */

import {
    buildStorylinePayload,
    requestStoryline,
    type StorylineConfig,
} from "../consolidating/storyline.js";
import type { StorylineResult } from "../schema.js";
import { type OracleBinding, useOracle } from "../utils/ai/llms.js";
import { logger } from "../utils/core/logger.js";

import type { AxialStep } from "./axial-step.js";
import { BaseStep } from "./base-step.js";
import type { SelectiveStep } from "./selective-step.js";

export interface StorylineStepConfig {
    axial: AxialStep;
    selective: SelectiveStep;
    llm: OracleBinding;
    parameters: StorylineConfig;
}

export class StorylineStep extends BaseStep {
    override dependsOn: BaseStep[];

    #result?: StorylineResult;
    #raw?: string;

    get result() {
        return this._result(this.#result, "result");
    }

    get raw() {
        return this._result(this.#raw, "raw");
    }

    constructor(private readonly config: StorylineStepConfig) {
        super();
        this.dependsOn = [config.axial, config.selective];
    }

    override async execute() {
        await super.execute();

        await this._run(async () => {
            const payload = buildStorylinePayload(
                this.config.selective.result,
                this.config.axial.result.summary,
                this.config.parameters,
            );
            const reply = await useOracle(this.config.llm, (oracle) =>
                requestStoryline(oracle, payload, this.config.parameters),
            );
            logger.info(`Storyline with ${reply.result.anchors.length} anchors`);
            this.#raw = reply.raw;
            this.#result = reply.result;
        });
    }
}
