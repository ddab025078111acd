import type { AxialCodedUnique, AxialSummaryRow } from "../schema.js";

/** Code-point order, independent of locale. */
export const byCodePoint = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/**
 * One row per non-empty axial code, sorted by axial code
 *
 * Only retained codes count. Member texts are de-duplicated, sorted and joined by "; ";
 * codes without an axial code are left out rather than counted as empty groups.
 */
export const makeAxialSummary = (codes: AxialCodedUnique[]): AxialSummaryRow[] => {
    const groups = new Map<string, Set<string>>();
    for (const code of codes) {
        const axial = code.axial_code.trim();
        if (!code.retain || !axial) {
            continue;
        }
        const members = groups.get(axial) ?? new Set<string>();
        members.add(code.open_code.trim());
        groups.set(axial, members);
    }

    return [...groups.keys()].sort(byCodePoint).map((axial_code) => {
        const members = [...(groups.get(axial_code) ?? [])].sort(byCodePoint);
        return {
            axial_code,
            member_open_codes: members.join("; "),
            n_members: members.length,
        };
    });
};
