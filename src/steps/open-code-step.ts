/**
 * Open Code Step
 *
 * First stage: segments the transcript into question/answer blocks and gives every
 * answer an open code.
 */

import { runOpenCoding, type OpenCodingConfig } from "../coding/open-coding.js";
import { parseQABlocks } from "../coding/segmenter.js";
import type { OpenCodeRecord, QABlock } from "../schema.js";
import { type OracleBinding, useOracle } from "../utils/ai/llms.js";
import { logger } from "../utils/core/logger.js";

import { BaseStep } from "./base-step.js";

export interface OpenCodeStepConfig {
    /** Raw transcript text with Q:/A: markers */
    transcript: string;
    llm: OracleBinding;
    parameters: OpenCodingConfig;
}

export class OpenCodeStep extends BaseStep {
    override dependsOn: BaseStep[] = [];

    #blocks?: QABlock[];
    #records?: OpenCodeRecord[];

    get blocks() {
        return this._result(this.#blocks, "blocks");
    }

    /** One record per block, ids 1-based in transcript order */
    get records() {
        return this._result(this.#records, "records");
    }

    constructor(private readonly config: OpenCodeStepConfig) {
        super();
    }

    override async execute() {
        await super.execute();

        await this._run(async () => {
            const blocks = parseQABlocks(this.config.transcript);
            logger.info(`Segmented transcript into ${blocks.length} question/answer blocks`);
            if (!blocks.length) {
                logger.warn("No question/answer blocks found; check the Q:/A: markers");
            }
            this.#blocks = blocks;
            this.#records = await useOracle(this.config.llm, (oracle, session) =>
                runOpenCoding(oracle, blocks, this.config.parameters, session),
            );
        });
    }
}
