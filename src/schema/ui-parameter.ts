/**
 * UI Parameter Types
 *
 * The renderable tree derived from a parameter schema, plus the partial
 * shape operators author to customize it.
 */

import type { ParameterKind } from './schema-types.js';

// ==========================================
// VALIDATION & CONDITIONS
// ==========================================

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export interface Option {
    label: string;
    value: unknown;
}

export interface Validate {
    /** Whether the property is listed in its parent's required list */
    required: boolean;
    /** Allowed values, copied verbatim from the schema */
    enum?: unknown[];
    /** Choice widget entries derived from enum */
    options?: Option[];
    pattern?: string;
    min?: number;
    max?: number;
    minLength?: number;
    maxLength?: number;
    defaultValue?: unknown;
    /** Value cannot change once set */
    immutable?: boolean;
}

export type ConditionOperator = '==' | '!=' | 'in';

export type ConditionAction = 'enable' | 'disable';

/**
 * Visibility rule gating when a parameter is shown.
 * Only overrides carry conditions; derivation never invents them.
 */
export interface ConditionRule {
    /** Key of the parameter whose value is tested */
    jsonKey: string;
    /** Defaults to '==' */
    operator?: ConditionOperator;
    value: unknown;
    /** Defaults to 'enable' */
    action?: ConditionAction;
}

export interface Style {
    colSpan?: number;
}

export interface GroupOption {
    label: string;
    keys: string[];
}

// ==========================================
// UI PARAMETER
// ==========================================

export interface UIParameter {
    /** Dot-delimited path from the tree root; identity across derive, sort and patch */
    jsonKey: string;
    label: string;
    description?: string;
    /** Widget tag a renderer dispatches on */
    uiType: string;
    kind: ParameterKind;
    validate: Validate;
    conditions: ConditionRule[];
    /** Order among siblings only */
    sort: number;
    /** Present for object and array-of-object parameters */
    subParameters?: UIParameter[];
    disable?: boolean;
    style?: Style;
    subParameterGroupOption?: GroupOption[];
    /** Map parameters accept extra keys described by additionalParameter */
    additional?: boolean;
    additionalParameter?: UIParameter;
}

/**
 * Operator-authored customization of one parameter. Only jsonKey is
 * mandatory; every field that is set replaces the derived value.
 */
export interface PartialUIParameter {
    jsonKey: string;
    label?: string;
    description?: string;
    uiType?: string;
    validate?: Partial<Validate>;
    conditions?: ConditionRule[];
    sort?: number;
    subParameters?: PartialUIParameter[];
    disable?: boolean;
    style?: Style;
    subParameterGroupOption?: GroupOption[];
    additional?: boolean;
}

/**
 * Number of nested children a parameter has
 */
export function countSubParameters(parameter: UIParameter): number {
    return parameter.subParameters?.length ?? 0;
}

/**
 * Visit every parameter of a tree depth-first, parents before children
 */
export function walkParameters(parameters: UIParameter[], visit: (parameter: UIParameter, depth: number) => void, depth: number = 0): void {
    for (const parameter of parameters) {
        visit(parameter, depth);
        if (parameter.subParameters) {
            walkParameters(parameter.subParameters, visit, depth + 1);
        }
    }
}

/**
 * Find a parameter anywhere in the tree by its jsonKey
 */
export function findParameter(parameters: UIParameter[], jsonKey: string): UIParameter | undefined {
    for (const parameter of parameters) {
        if (parameter.jsonKey === jsonKey) return parameter;
        if (parameter.subParameters) {
            const nested = findParameter(parameter.subParameters, jsonKey);
            if (nested) return nested;
        }
    }
    return undefined;
}
