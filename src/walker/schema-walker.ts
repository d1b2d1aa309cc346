/**
 * Schema Walker
 *
 * Recursively derives the default UI parameter tree from a parameter
 * schema. Every schema property yields exactly one parameter; nodes the
 * walker cannot render structurally degrade to a 'fallback' parameter
 * instead of failing the tree.
 */

import type { SchemaNode } from '../schema/schema-types.js';
import { isSchemaNode, joinKey } from '../schema/schema-types.js';
import type { UIParameter, Validate } from '../schema/ui-parameter.js';
import { classifySchemaNode, getDefaultUIType, renderOptionLabel } from '../knowledge/ui-type-registry.js';
import { DEFAULT_ENGINE_OPTIONS } from '../config/engine-options.js';
import type { RenderReporter } from '../reporting/render-reporter.js';

// ==========================================
// TYPES
// ==========================================

export interface WalkOptions {
    defaultSort: number;
    reporter?: RenderReporter;
}

interface WalkContext {
    defaultSort: number;
    reporter?: RenderReporter;
}

// ==========================================
// DERIVATION
// ==========================================

/**
 * Derive the root-level parameters of a schema, unsorted.
 * Anything other than a schema object derives to an empty list.
 */
export function deriveParameters(schemaRoot: SchemaNode | null | undefined, options: Partial<WalkOptions> = {}): UIParameter[] {
    if (!isSchemaNode(schemaRoot)) return [];

    return deriveChildren(schemaRoot, '', {
        defaultSort: options.defaultSort ?? DEFAULT_ENGINE_OPTIONS.defaultSort,
        reporter: options.reporter
    });
}

function deriveChildren(node: SchemaNode, parentKey: string, context: WalkContext): UIParameter[] {
    if (!isSchemaNode(node.properties)) return [];

    const required = Array.isArray(node.required) ? node.required : [];

    return Object.entries(node.properties).map(([name, child]) =>
        deriveParameter(name, joinKey(parentKey, name), child, required.includes(name), context)
    );
}

function deriveParameter(
    name: string,
    jsonKey: string,
    schema: unknown,
    required: boolean,
    context: WalkContext
): UIParameter {
    const kind = classifySchemaNode(schema);
    const node: SchemaNode = isSchemaNode(schema) ? schema : {};

    const parameter: UIParameter = {
        jsonKey,
        label: typeof node.title === 'string' && node.title !== '' ? node.title : name,
        uiType: getDefaultUIType(kind, node),
        kind,
        validate: deriveValidate(node, required),
        conditions: [],
        sort: context.defaultSort
    };

    if (typeof node.description === 'string' && node.description !== '') {
        parameter.description = node.description;
    }

    switch (kind) {
        case 'object':
            parameter.subParameters = deriveChildren(node, jsonKey, context);
            break;
        case 'array-of-object':
            // items share the array's key; the schema describes the item shape once
            if (isSchemaNode(node.items)) {
                parameter.subParameters = deriveChildren(node.items, jsonKey, context);
            }
            break;
        case 'fallback':
            context.reporter?.report('FALLBACK_NODE', jsonKey, describeFallback(schema));
            break;
        default:
            break;
    }

    if ((kind === 'object' || kind === 'map') && isSchemaNode(node.additionalProperties)) {
        parameter.additional = true;
        parameter.additionalParameter = deriveParameter(name, jsonKey, node.additionalProperties, false, context);
    }

    return parameter;
}

function deriveValidate(node: SchemaNode, required: boolean): Validate {
    const validate: Validate = { required };

    if (Array.isArray(node.enum)) {
        validate.enum = [...node.enum];
        validate.options = node.enum.map((value) => ({ label: renderOptionLabel(value), value }));
    }
    if (node.default !== undefined) validate.defaultValue = node.default;
    if (typeof node.pattern === 'string') validate.pattern = node.pattern;
    if (typeof node.minimum === 'number') validate.min = node.minimum;
    if (typeof node.maximum === 'number') validate.max = node.maximum;
    if (typeof node.minLength === 'number') validate.minLength = node.minLength;
    if (typeof node.maxLength === 'number') validate.maxLength = node.maxLength;

    return validate;
}

/**
 * Explain why a node was rendered with the generic widget
 */
function describeFallback(schema: unknown): string {
    if (!isSchemaNode(schema)) {
        return 'schema is not an object, rendered as generic input';
    }
    const declared = schema.type;
    if (declared === 'object') {
        return 'object declares no properties, rendered as generic input';
    }
    if (declared === 'array') {
        return 'array items are missing or unsupported, rendered as generic input';
    }
    if (declared === undefined) {
        return 'schema declares no type, rendered as generic input';
    }
    return `unsupported type "${declared}", rendered as generic input`;
}
