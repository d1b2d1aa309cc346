/**
 * UI Type Registry
 *
 * Maps schema nodes onto the closed set of parameter kinds and the
 * widget tags a renderer dispatches on:
 * - Kind classification (object, map, arrays, enum, scalars, fallback)
 * - Default widget per kind, with format and item-type refinements
 * - Option label rendering for enumerations
 */

import type { ParameterKind, SchemaNode } from '../schema/schema-types.js';
import { SCALAR_SCHEMA_TYPES, hasProperties, isSchemaNode } from '../schema/schema-types.js';

// ==========================================
// WIDGET DEFINITIONS
// ==========================================

export type UIType =
    | 'Input'
    | 'Password'
    | 'Number'
    | 'Switch'
    | 'Select'
    | 'Strings'
    | 'Numbers'
    | 'Switches'
    | 'Structs'
    | 'Group'
    | 'KV';

/**
 * Default widget for each kind
 */
export const DEFAULT_UI_TYPES: Record<ParameterKind, UIType> = {
    'object': 'Group',
    'map': 'KV',
    'array-of-scalar': 'Strings',
    'array-of-object': 'Structs',
    'enum': 'Select',
    'string': 'Input',
    'number': 'Number',
    'boolean': 'Switch',
    'fallback': 'Input'
};

/**
 * String formats with a dedicated widget
 */
const STRING_FORMAT_UI_TYPES: Record<string, UIType> = {
    password: 'Password'
};

/**
 * Widget for arrays, keyed by the item type
 */
const ARRAY_ITEM_UI_TYPES: Record<string, UIType> = {
    string: 'Strings',
    number: 'Numbers',
    integer: 'Numbers',
    boolean: 'Switches'
};

// ==========================================
// CLASSIFICATION
// ==========================================

/**
 * Decide which kind of parameter a schema node yields.
 * Anything the walker cannot render structurally becomes 'fallback'.
 */
export function classifySchemaNode(node: unknown): ParameterKind {
    if (!isSchemaNode(node)) return 'fallback';

    if (Array.isArray(node.enum) && node.enum.length > 0) {
        return 'enum';
    }

    // properties without a declared type still describe an object
    if (isObjectShaped(node)) {
        return 'object';
    }

    switch (node.type) {
        case 'string':
            return 'string';
        case 'number':
        case 'integer':
            return 'number';
        case 'boolean':
            return 'boolean';
        case 'object':
            if (isSchemaNode(node.additionalProperties)) return 'map';
            return 'fallback';
        case 'array':
            return classifyArrayItems(node.items);
        default:
            return 'fallback';
    }
}

function isObjectShaped(node: SchemaNode): boolean {
    return (node.type === undefined || node.type === 'object') && hasProperties(node);
}

function classifyArrayItems(items: SchemaNode | null | undefined): ParameterKind {
    if (!isSchemaNode(items)) return 'fallback';
    if (isObjectShaped(items)) return 'array-of-object';
    if (items.type !== undefined && SCALAR_SCHEMA_TYPES.has(items.type)) return 'array-of-scalar';
    return 'fallback';
}

/**
 * Get the default widget for a classified node
 */
export function getDefaultUIType(kind: ParameterKind, node: SchemaNode): UIType {
    if (kind === 'string' && node.format) {
        return STRING_FORMAT_UI_TYPES[node.format] ?? DEFAULT_UI_TYPES.string;
    }
    if (kind === 'array-of-scalar' && isSchemaNode(node.items) && node.items.type) {
        return ARRAY_ITEM_UI_TYPES[node.items.type] ?? DEFAULT_UI_TYPES[kind];
    }
    return DEFAULT_UI_TYPES[kind];
}

// ==========================================
// LABELS
// ==========================================

/**
 * Upper-case the first character
 */
export function firstUpper(text: string): string {
    if (!text) return text;
    return text.charAt(0).toUpperCase() + text.slice(1);
}

/**
 * Render the label shown for an enumeration value
 */
export function renderOptionLabel(value: unknown): string {
    if (value === null) return 'null';
    if (typeof value === 'object') return JSON.stringify(value);
    return firstUpper(String(value));
}
