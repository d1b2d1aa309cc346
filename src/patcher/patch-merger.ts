/**
 * Patch Merger
 *
 * Overlays operator-authored partial parameters onto a derived tree.
 * The result always has the base tree's shape: same siblings, same order,
 * same keys at every level. Only fields of matched nodes change, and the
 * base tree itself is left untouched.
 */

import type { PartialUIParameter, UIParameter, Validate } from '../schema/ui-parameter.js';
import type { RenderReporter } from '../reporting/render-reporter.js';

/**
 * Merge overrides into base, matching entries by jsonKey one nesting
 * level at a time. Unmatched overrides are discarded.
 */
export function patchParameters(
    base: UIParameter[],
    overrides: PartialUIParameter[] | null | undefined,
    reporter?: RenderReporter
): UIParameter[] {
    if (!overrides || overrides.length === 0) {
        return base.map(cloneParameter);
    }

    const overrideIndex = indexOverrides(overrides, reporter);
    const patched = base.map((parameter) => {
        const override = overrideIndex.get(parameter.jsonKey);
        overrideIndex.delete(parameter.jsonKey);
        return override ? applyOverride(parameter, override, reporter) : cloneParameter(parameter);
    });

    for (const jsonKey of overrideIndex.keys()) {
        reporter?.report('UNMATCHED_OVERRIDE', jsonKey, 'no derived parameter with this key, override discarded');
    }

    return patched;
}

/**
 * Index overrides by key; a repeated key replaces the earlier entry
 */
function indexOverrides(overrides: PartialUIParameter[], reporter?: RenderReporter): Map<string, PartialUIParameter> {
    const index = new Map<string, PartialUIParameter>();
    for (const override of overrides) {
        if (index.has(override.jsonKey)) {
            reporter?.report('DUPLICATE_OVERRIDE', override.jsonKey, 'key overridden more than once, last entry wins');
        }
        index.set(override.jsonKey, override);
    }
    return index;
}

function applyOverride(base: UIParameter, override: PartialUIParameter, reporter?: RenderReporter): UIParameter {
    const patched = cloneParameter(base);

    if (override.label !== undefined) patched.label = override.label;
    if (override.description !== undefined) patched.description = override.description;
    if (override.uiType !== undefined) patched.uiType = override.uiType;
    if (override.conditions !== undefined) patched.conditions = override.conditions.map((rule) => structuredClone(rule));
    if (override.sort !== undefined) patched.sort = override.sort;
    if (override.disable !== undefined) patched.disable = override.disable;
    if (override.style !== undefined) patched.style = { ...override.style };
    if (override.additional !== undefined) patched.additional = override.additional;
    if (override.subParameterGroupOption !== undefined) {
        patched.subParameterGroupOption = override.subParameterGroupOption.map((group) => ({ ...group, keys: [...group.keys] }));
    }
    if (override.validate !== undefined) {
        patched.validate = mergeValidate(patched.validate, override.validate);
    }

    if (override.subParameters !== undefined) {
        if (base.subParameters && base.subParameters.length > 0) {
            patched.subParameters = patchParameters(base.subParameters, override.subParameters, reporter);
        } else if (override.subParameters.length > 0) {
            reporter?.report('STRUCTURE_MISMATCH', base.jsonKey, 'override declares sub-parameters but the derived parameter has none');
        }
    }

    return patched;
}

/**
 * Replace only the validation fields the override sets
 */
function mergeValidate(base: Validate, override: Partial<Validate>): Validate {
    const merged: Validate = { ...base };
    for (const [field, value] of Object.entries(override)) {
        if (value !== undefined) {
            Object.assign(merged, { [field]: structuredClone(value) });
        }
    }
    return merged;
}

/**
 * Deep copy of a parameter so patched output never aliases the base tree
 */
export function cloneParameter(parameter: UIParameter): UIParameter {
    return structuredClone(parameter);
}
