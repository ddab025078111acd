/**
 * Stage Exporter
 *
 * Writes what each finished step produced under a fixed output tree:
 *
 *     open_coding.xlsx
 *     filtering/  open_code_filter_row_level, open_code_unique_with_filter,
 *                 open_code_retain_unique, open_code_exclude_unique (.xlsx)
 *     axial/      open_code_retain_unique_axial, axial_coding_summary,
 *                 axial_coding_row_level (.xlsx)
 *     selective/  selective_coding_raw.txt, selective_coding_agg_only.{json,xlsx}
 *     storyline/  storyline_raw.txt, storyline.txt, storyline.json
 */

import { join } from "path";

import { TerminalValidationError } from "./consolidating/storyline.js";
import type {
    AggregateConcept,
    AxialCodedRow,
    AxialCodedUnique,
    AxialSummaryRow,
    FilteredRow,
    OpenCodeRecord,
    UniqueCodeWithVerdict,
} from "./schema.js";
import { AxialStep } from "./steps/axial-step.js";
import type { BaseStep } from "./steps/base-step.js";
import { FilterStep } from "./steps/filter-step.js";
import { OpenCodeStep } from "./steps/open-code-step.js";
import { SelectiveStep } from "./steps/selective-step.js";
import { StorylineStep } from "./steps/storyline-step.js";
import { logger } from "./utils/core/logger.js";
import { exportTable, type TableColumn } from "./utils/io/export.js";
import { writeJSONFile, writeTextFile } from "./utils/io/file.js";

const RECORD_COLUMNS: TableColumn<OpenCodeRecord>[] = [
    { header: "id", key: "id", width: 6 },
    { header: "question", key: "question", width: 40, wrap: true },
    { header: "answer", key: "answer", width: 80, wrap: true },
    { header: "open_code", key: "open_code", width: 40, wrap: true },
];

const VERDICT_COLUMNS = [
    { header: "retain", key: "retain", width: 8 },
    { header: "exclude_reason", key: "exclude_reason", width: 50, wrap: true },
] as const;

const ROW_COLUMNS: TableColumn<FilteredRow>[] = [
    ...RECORD_COLUMNS,
    { header: "code_id", key: "code_id", width: 8 },
    ...VERDICT_COLUMNS,
];

const UNIQUE_COLUMNS: TableColumn<UniqueCodeWithVerdict>[] = [
    { header: "code_id", key: "code_id", width: 8 },
    { header: "open_code", key: "open_code", width: 40, wrap: true },
    ...VERDICT_COLUMNS,
];

const AXIAL_UNIQUE_COLUMNS: TableColumn<AxialCodedUnique>[] = [
    ...UNIQUE_COLUMNS,
    { header: "axial_code", key: "axial_code", width: 30, wrap: true },
];

const AXIAL_ROW_COLUMNS: TableColumn<AxialCodedRow>[] = [
    ...ROW_COLUMNS,
    { header: "axial_code", key: "axial_code", width: 30, wrap: true },
];

const SUMMARY_COLUMNS: TableColumn<AxialSummaryRow>[] = [
    { header: "axial_code", key: "axial_code", width: 30, wrap: true },
    { header: "member_open_codes", key: "member_open_codes", width: 80, wrap: true },
    { header: "n_members", key: "n_members", width: 10 },
];

const CONCEPT_COLUMNS: TableColumn<AggregateConcept>[] = [
    { header: "concept", key: "concept", width: 30, wrap: true },
    { header: "definition", key: "definition", width: 60, wrap: true },
    { header: "covered_axial_codes", key: "covered_axial_codes", width: 60, wrap: true },
];

/**
 * Export the outputs of a step that has just executed
 *
 * @returns The written paths
 */
export const exportStep = (step: BaseStep, outDir: string) =>
    logger.withSource("exportStep", async (): Promise<string[]> => {
        const paths: string[] = [];
        if (step instanceof OpenCodeStep) {
            paths.push(
                await exportTable(join(outDir, "open_coding.xlsx"), RECORD_COLUMNS, step.records),
            );
        } else if (step instanceof FilterStep) {
            const { rows, unique, retained, excluded } = step.result;
            const folder = join(outDir, "filtering");
            paths.push(
                await exportTable(join(folder, "open_code_filter_row_level.xlsx"), ROW_COLUMNS, rows),
                await exportTable(
                    join(folder, "open_code_unique_with_filter.xlsx"),
                    UNIQUE_COLUMNS,
                    unique,
                ),
                await exportTable(join(folder, "open_code_retain_unique.xlsx"), UNIQUE_COLUMNS, retained),
                await exportTable(join(folder, "open_code_exclude_unique.xlsx"), UNIQUE_COLUMNS, excluded),
            );
        } else if (step instanceof AxialStep) {
            const { unique, summary, rows } = step.result;
            const folder = join(outDir, "axial");
            paths.push(
                await exportTable(
                    join(folder, "open_code_retain_unique_axial.xlsx"),
                    AXIAL_UNIQUE_COLUMNS,
                    unique,
                ),
                await exportTable(join(folder, "axial_coding_summary.xlsx"), SUMMARY_COLUMNS, summary),
                await exportTable(join(folder, "axial_coding_row_level.xlsx"), AXIAL_ROW_COLUMNS, rows),
            );
        } else if (step instanceof SelectiveStep) {
            const folder = join(outDir, "selective");
            paths.push(
                writeTextFile(join(folder, "selective_coding_raw.txt"), step.raw),
                writeJSONFile(join(folder, "selective_coding_agg_only.json"), step.result),
                await exportTable(
                    join(folder, "selective_coding_agg_only.xlsx"),
                    CONCEPT_COLUMNS,
                    step.result.aggregate_concepts,
                ),
            );
        } else if (step instanceof StorylineStep) {
            const folder = join(outDir, "storyline");
            paths.push(
                writeTextFile(join(folder, "storyline_raw.txt"), step.raw),
                writeTextFile(join(folder, "storyline.txt"), step.result.storyline),
                writeJSONFile(join(folder, "storyline.json"), step.result),
            );
        }
        logger.info(`Exported ${paths.length} files for step ${step._id}`);
        return paths;
    });

/**
 * Keep the rejected storyline reply on disk when validation aborts the run
 *
 * @returns The written path, or undefined for any other error
 */
export const exportFailure = (error: unknown, outDir: string) => {
    if (!(error instanceof TerminalValidationError)) {
        return undefined;
    }
    return writeTextFile(join(outDir, "storyline", "storyline_raw.txt"), error.raw);
};
