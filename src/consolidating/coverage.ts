import type { AggregateConcept, CoverageReport } from "../schema.js";

/**
 * Check that aggregate concepts partition the known axial codes
 *
 * - `missing`: known codes no concept covers, in known order
 * - `extra`: covered codes that are not known, in first-seen order
 * - `duplicated`: codes covered more than once, in first-seen order
 */
export const validateCoverage = (
    concepts: AggregateConcept[],
    axialCodes: string[],
): CoverageReport => {
    const known = new Set(axialCodes.map((code) => code.trim()).filter(Boolean));
    const counts = new Map<string, number>();
    for (const concept of concepts) {
        for (const raw of concept.covered_axial_codes) {
            const code = raw.trim();
            if (code) {
                counts.set(code, (counts.get(code) ?? 0) + 1);
            }
        }
    }

    return {
        missing: [...known].filter((code) => !counts.has(code)),
        extra: [...counts.keys()].filter((code) => !known.has(code)),
        duplicated: [...counts].filter(([, count]) => count > 1).map(([code]) => code),
    };
};

export const hasCoverageIssues = (report: CoverageReport) =>
    report.missing.length > 0 || report.extra.length > 0 || report.duplicated.length > 0;
