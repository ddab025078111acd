/**
 * Filter Step
 *
 * Deduplicates the open codes, screens every unique code for relevance through the
 * batch classifier, and carries the verdicts back onto the transcript rows.
 */

import { type FilterConfig, type FilteringResult, runFiltering } from "../coding/filtering.js";
import { type OracleBinding, useOracle } from "../utils/ai/llms.js";
import { logger } from "../utils/core/logger.js";

import { BaseStep } from "./base-step.js";
import type { OpenCodeStep } from "./open-code-step.js";

export interface FilterStepConfig {
    coder: OpenCodeStep;
    llm: OracleBinding;
    parameters: FilterConfig;
}

export class FilterStep extends BaseStep {
    override dependsOn: BaseStep[];

    #result?: FilteringResult;

    /** Unique view, retained/excluded split and row view */
    get result() {
        return this._result(this.#result, "result");
    }

    constructor(private readonly config: FilterStepConfig) {
        super();
        this.dependsOn = [config.coder];
    }

    override async execute() {
        await super.execute();

        await this._run(async () => {
            const records = this.config.coder.records;
            const result = await useOracle(this.config.llm, (oracle, session) =>
                runFiltering(oracle, records, this.config.parameters, session),
            );
            logger.info(
                `Open codes: ${records.length} total, ${result.index.size} unique, ${result.retained.length} retained, ${result.excluded.length} excluded`,
            );
            this.#result = result;
        });
    }
}
