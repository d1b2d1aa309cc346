/**
 * Schema Types for Definition Parameters
 *
 * TypeScript interfaces for the OpenAPI v3 / JSON-Schema subset that
 * component, trait and workflow-step definitions use to describe their
 * configurable parameters.
 */

// ==========================================
// SCHEMA NODE
// ==========================================

/**
 * One node of a parameter schema document (read-only input)
 */
export interface SchemaNode {
    /** Declared type; anything other than the JSON-Schema primitives is treated as unsupported */
    type?: string;
    title?: string;
    description?: string;
    /** String format hint (e.g. 'password') */
    format?: string;
    /** Allowed values */
    enum?: unknown[];
    default?: unknown;

    // Nested type definitions
    /** For 'object' type: child schemas keyed by property name */
    properties?: Record<string, SchemaNode>;
    /** For 'array' type: item schema */
    items?: SchemaNode | null;
    /** Property names that are mandatory at this level */
    required?: string[];
    /** For map-like objects: value schema (keys are always strings) */
    additionalProperties?: SchemaNode | boolean;

    // Numeric constraints
    minimum?: number;
    maximum?: number;

    // String constraints
    minLength?: number;
    maxLength?: number;
    pattern?: string;
}

/**
 * Closed set of parameter shapes the walker can emit.
 * 'map' covers objects described through additionalProperties.
 */
export type ParameterKind =
    | 'object'
    | 'map'
    | 'array-of-scalar'
    | 'array-of-object'
    | 'enum'
    | 'string'
    | 'number'
    | 'boolean'
    | 'fallback';

export const SCALAR_SCHEMA_TYPES: ReadonlySet<string> = new Set(['string', 'number', 'integer', 'boolean']);

/**
 * Narrow an unknown value to a schema node (a plain, non-array object)
 */
export function isSchemaNode(value: unknown): value is SchemaNode {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Whether a node declares at least one property
 */
export function hasProperties(node: SchemaNode): node is SchemaNode & { properties: Record<string, SchemaNode> } {
    return isSchemaNode(node.properties) && Object.keys(node.properties).length > 0;
}

// ==========================================
// JSON KEY UTILITIES
// ==========================================

/**
 * Build a child key from its parent key; root children use the bare name
 */
export function joinKey(parentKey: string, name: string): string {
    return parentKey ? `${parentKey}.${name}` : name;
}

/**
 * Split a jsonKey into its segments
 */
export function splitKey(jsonKey: string): string[] {
    return jsonKey.split('.');
}
