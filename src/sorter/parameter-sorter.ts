/**
 * Parameter Sorter
 *
 * Orders every sibling list of a parameter tree:
 * 1. required parameters before optional ones (hard partition)
 * 2. fewer sub-parameters first
 * 3. ascending label, code-unit order, case-sensitive
 *
 * Sort numbers are then assigned continuously across the whole list, so
 * numeric comparison alone reproduces the order.
 */

import type { UIParameter } from '../schema/ui-parameter.js';
import { countSubParameters } from '../schema/ui-parameter.js';
import { DEFAULT_ENGINE_OPTIONS } from '../config/engine-options.js';

export interface SortOptions {
    /** Numbering base when no sibling carries a sort value */
    defaultSort: number;
}

/**
 * Reorder siblings in place, renumber them, and recurse into every
 * sub-parameter list, including those of map value parameters.
 * Returns the same array.
 */
export function sortParameters(siblings: UIParameter[], options: Partial<SortOptions> = {}): UIParameter[] {
    const defaultSort = options.defaultSort ?? DEFAULT_ENGINE_OPTIONS.defaultSort;
    const base = resolveSortBase(siblings, defaultSort);

    const required = siblings.filter((parameter) => parameter.validate.required).sort(compareWithinGroup);
    const optional = siblings.filter((parameter) => !parameter.validate.required).sort(compareWithinGroup);

    siblings.splice(0, siblings.length, ...required, ...optional);

    siblings.forEach((parameter, index) => {
        parameter.sort = base + index;
        if (parameter.subParameters && parameter.subParameters.length > 0) {
            sortParameters(parameter.subParameters, { defaultSort });
        }
        const valueChildren = parameter.additionalParameter?.subParameters;
        if (valueChildren && valueChildren.length > 0) {
            sortParameters(valueChildren, { defaultSort });
        }
    });

    return siblings;
}

/**
 * Smallest positive sort value among siblings, else the default.
 * Zero counts as unset.
 */
export function resolveSortBase(siblings: UIParameter[], defaultSort: number): number {
    let base: number | undefined;
    for (const parameter of siblings) {
        if (Number.isInteger(parameter.sort) && parameter.sort > 0 && (base === undefined || parameter.sort < base)) {
            base = parameter.sort;
        }
    }
    return base ?? defaultSort;
}

function compareWithinGroup(a: UIParameter, b: UIParameter): number {
    const bySubCount = countSubParameters(a) - countSubParameters(b);
    if (bySubCount !== 0) return bySubCount;

    const byLabel = compareCodeUnits(a.label, b.label);
    if (byLabel !== 0) return byLabel;

    // equal labels: keep the order total
    return compareCodeUnits(a.jsonKey, b.jsonKey);
}

function compareCodeUnits(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}
