/**
 * One question/answer turn of an interview transcript.
 * The question is context only; coding is based on the answer.
 */
export interface QABlock {
    question: string;
    answer: string;
}

/**
 * One coded answer. `id` is 1-based in transcript order.
 * Later stages never mutate a record; they produce extended copies.
 */
export interface OpenCodeRecord extends QABlock {
    id: number;
    open_code: string;
}

/** A deduplicated open code with its stable 1-based id (order of first appearance). */
export interface UniqueCode {
    code_id: number;
    open_code: string;
}

/** Relevance verdict; `exclude_reason` is empty exactly when `retain` is true. */
export interface RetainVerdict {
    retain: boolean;
    exclude_reason: string;
}

export interface UniqueCodeWithVerdict extends UniqueCode, RetainVerdict {}

/** A transcript row after filtering; `code_id` is "" when its text is not in the unique set. */
export interface FilteredRow extends OpenCodeRecord, RetainVerdict {
    code_id: number | "";
}

/** `axial_code` is "" for codes the axial stage left unclassified. */
export interface AxialCodedUnique extends UniqueCodeWithVerdict {
    axial_code: string;
}

export interface AxialCodedRow extends FilteredRow {
    axial_code: string;
}

export interface AxialSummaryRow {
    axial_code: string;
    /** Distinct member open codes, sorted, joined by "; " */
    member_open_codes: string;
    n_members: number;
}

export interface AggregateConcept {
    concept: string;
    definition: string;
    covered_axial_codes: string[];
}

/** Axial codes that break the partition of the axial set by aggregate concepts. */
export interface CoverageReport {
    missing: string[];
    extra: string[];
    duplicated: string[];
}

/** Fields beyond `aggregate_concepts` are kept as the model returned them. */
export interface SelectiveResult {
    aggregate_concepts: AggregateConcept[];
    coverage_warning?: CoverageReport;
    [key: string]: unknown;
}

export interface AxialTheme {
    axial_code: string;
    open_code_examples: string[];
}

export interface StorylinePayload {
    aggregate_concepts: AggregateConcept[];
    axial_themes: AxialTheme[];
}

/** The terminal output. Fields beyond `storyline` and `anchors` are kept as returned. */
export interface StorylineResult {
    storyline: string;
    anchors: unknown[];
    [key: string]: unknown;
}
