/**
 * Axial Step
 *
 * Groups the retained codes into axial codes, then labels the unique view and the
 * transcript rows and summarizes each axial code.
 */

import { attachAxialToRows, attachAxialToUnique } from "../coding/identity.js";
import { type AxialConfig, requestAxialCoding } from "../consolidating/axial-coding.js";
import { makeAxialSummary } from "../consolidating/axial-summary.js";
import type { AxialCodedRow, AxialCodedUnique, AxialSummaryRow } from "../schema.js";
import { type OracleBinding, useOracle } from "../utils/ai/llms.js";
import { logger } from "../utils/core/logger.js";

import { BaseStep } from "./base-step.js";
import type { FilterStep } from "./filter-step.js";

export interface AxialStepConfig {
    filter: FilterStep;
    llm: OracleBinding;
    parameters: AxialConfig;
}

export interface AxialResult {
    /** Retained unique codes with their axial code ("" if unclassified) */
    unique: AxialCodedUnique[];
    summary: AxialSummaryRow[];
    rows: AxialCodedRow[];
}

export class AxialStep extends BaseStep {
    override dependsOn: BaseStep[];

    #result?: AxialResult;

    get result() {
        return this._result(this.#result, "result");
    }

    constructor(private readonly config: AxialStepConfig) {
        super();
        this.dependsOn = [config.filter];
    }

    override async execute() {
        await super.execute();

        await this._run(async () => {
            const { retained, rows } = this.config.filter.result;
            const assignments = await useOracle(this.config.llm, (oracle, session) =>
                requestAxialCoding(oracle, retained, this.config.parameters, session),
            );
            const unique = attachAxialToUnique(retained, assignments);
            const summary = makeAxialSummary(unique);
            const unclassified = unique.filter((code) => !code.axial_code).length;
            if (unclassified) {
                logger.warn(`${unclassified} retained codes have no axial code`);
            }
            logger.info(`Summarized ${summary.length} axial codes`);
            this.#result = { unique, summary, rows: attachAxialToRows(rows, unique) };
        });
    }
}
