/**
 * Job Module
 *
 * Wires the five stages of a coding run and executes them strictly in sequence:
 * open coding → filtering → axial coding → selective coding → storyline.
 *
 * Each stage gets its own oracle binding (so stages can use different models) and its
 * own parameters. An optional `onStep` hook runs after every successful step; the CLI
 * uses it to export each stage's outputs as soon as they exist.
 */

import { AxialStep } from "./steps/axial-step.js";
import type { BaseStep } from "./steps/base-step.js";
import { FilterStep } from "./steps/filter-step.js";
import { OpenCodeStep } from "./steps/open-code-step.js";
import { SelectiveStep } from "./steps/selective-step.js";
import { StorylineStep } from "./steps/storyline-step.js";
import type { OracleBinding } from "./utils/ai/llms.js";
import { defaultPipelineConfig, type PipelineConfig, type Stage } from "./utils/core/config.js";
import { logger } from "./utils/core/logger.js";

export interface CodingJobConfig {
    /** Raw transcript text with Q:/A: markers */
    transcript: string;
    /** Oracle per stage */
    llms: Record<Stage, OracleBinding>;
    /** Stage parameters (defaults when omitted) */
    pipeline?: PipelineConfig;
    /** Called after each step succeeds */
    onStep?: (step: BaseStep) => void | Promise<void>;
}

export class CodingJob {
    readonly open: OpenCodeStep;
    readonly filter: FilterStep;
    readonly axial: AxialStep;
    readonly selective: SelectiveStep;
    readonly storyline: StorylineStep;

    /** Steps in execution order */
    readonly steps: BaseStep[];

    constructor(private readonly config: CodingJobConfig) {
        const _id = "CodingJob#constructor";
        logger.info("Creating job", _id);

        const pipeline = config.pipeline ?? defaultPipelineConfig;
        this.open = new OpenCodeStep({
            transcript: config.transcript,
            llm: config.llms.open,
            parameters: pipeline.open,
        });
        this.filter = new FilterStep({
            coder: this.open,
            llm: config.llms.filter,
            parameters: pipeline.filter,
        });
        this.axial = new AxialStep({
            filter: this.filter,
            llm: config.llms.axial,
            parameters: pipeline.axial,
        });
        this.selective = new SelectiveStep({
            axial: this.axial,
            llm: config.llms.selective,
            parameters: pipeline.selective,
        });
        this.storyline = new StorylineStep({
            axial: this.axial,
            selective: this.selective,
            llm: config.llms.storyline,
            parameters: pipeline.storyline,
        });

        this.steps = [this.open, this.filter, this.axial, this.selective, this.storyline];
        this.steps.forEach((step, i) => {
            step._id = `${i + 1}`;
        });
        logger.info(`Created job with ${this.steps.length} steps`, _id);
    }

    async #executeStep(step: BaseStep) {
        await logger.withSource("CodingJob#executeStep", async () => {
            logger.info(`Executing step ${step._id} (${step.constructor.name})`);
            await step.execute();
            logger.success(`Executed step ${step._id} (${step.constructor.name})`);
            await this.config.onStep?.(step);
        });
    }

    /**
     * Execute every step in order
     *
     * @throws The first step failure; the failing step is marked aborted
     */
    async execute() {
        const _id = "CodingJob#execute";
        logger.info("Executing job", _id);
        for (const step of this.steps) {
            await this.#executeStep(step);
        }
        logger.success("Job successfully executed", _id);
    }
}
