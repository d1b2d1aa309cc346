/**
 * Document Parser
 *
 * Reads the two stored documents the engine renders from:
 * - the parameter schema (JSON or YAML mapping)
 * - the operator override document (YAML/JSON list of partial parameters)
 */

import * as yaml from 'js-yaml';
import { z } from 'zod';

import type { SchemaNode } from '../schema/schema-types.js';
import { isSchemaNode } from '../schema/schema-types.js';
import type { JsonValue, PartialUIParameter } from '../schema/ui-parameter.js';
import { DocumentParseError } from '../errors/engine-errors.js';
import type { IssueDetail } from '../errors/engine-errors.js';

// ==========================================
// OVERRIDE SHAPE
// ==========================================

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
    z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

const jsonKeySchema = z.string({ required_error: 'jsonKey is required' }).trim().min(1, 'jsonKey must not be empty');

export const conditionRuleSchema = z.object({
    jsonKey: jsonKeySchema,
    operator: z.enum(['==', '!=', 'in'], {
        errorMap: () => ({ message: 'operator must be one of ==, != or in' })
    }).optional(),
    value: jsonValueSchema,
    action: z.enum(['enable', 'disable'], {
        errorMap: () => ({ message: 'action must be enable or disable' })
    }).optional()
});

const validateOverrideSchema = z.object({
    required: z.boolean().optional(),
    enum: z.array(jsonValueSchema).optional(),
    options: z.array(z.object({ label: z.string(), value: jsonValueSchema })).optional(),
    pattern: z.string().optional(),
    min: z.number().optional(),
    max: z.number().optional(),
    minLength: z.number().int().min(0).optional(),
    maxLength: z.number().int().min(0).optional(),
    defaultValue: jsonValueSchema.optional(),
    immutable: z.boolean().optional()
});

export const partialUIParameterSchema: z.ZodType<PartialUIParameter, z.ZodTypeDef, unknown> = z.lazy(() =>
    z.object({
        jsonKey: jsonKeySchema,
        label: z.string().optional(),
        description: z.string().optional(),
        uiType: z.string().optional(),
        validate: validateOverrideSchema.optional(),
        conditions: z.array(conditionRuleSchema).optional(),
        sort: z.number().int('sort must be an integer').min(0, 'sort must be non-negative').optional(),
        subParameters: z.array(partialUIParameterSchema).optional(),
        disable: z.boolean().optional(),
        style: z.object({ colSpan: z.number().int().positive().optional() }).optional(),
        subParameterGroupOption: z.array(z.object({ label: z.string(), keys: z.array(z.string()) })).optional(),
        additional: z.boolean().optional()
    })
);

export const overrideDocumentSchema = z.array(partialUIParameterSchema, {
    invalid_type_error: 'override document must be a list of parameters'
});

// ==========================================
// PARSING
// ==========================================

/**
 * Load YAML (a superset of JSON), turning syntax errors into a DocumentParseError
 */
function loadDocument(text: string, documentKind: string): unknown {
    try {
        return yaml.load(text);
    } catch (error) {
        if (error instanceof yaml.YAMLException) {
            throw new DocumentParseError(documentKind, [
                { path: [], message: `${error.reason} (line ${error.mark.line + 1}, column ${error.mark.column + 1})` }
            ]);
        }
        throw error;
    }
}

/**
 * Parse a stored parameter schema document
 */
export function parseSchemaDocument(text: string): SchemaNode {
    const document = loadDocument(text, 'schema');
    if (!isSchemaNode(document)) {
        throw new DocumentParseError('schema', [{ path: [], message: 'schema document must be a mapping' }]);
    }
    return document;
}

/**
 * Validate an already-loaded override list
 */
export function validateOverrides(value: unknown): PartialUIParameter[] {
    const result = overrideDocumentSchema.safeParse(value);
    if (!result.success) {
        throw new DocumentParseError('override', toIssueDetails(result.error));
    }
    return result.data;
}

/**
 * Parse a stored override document. A missing or blank document means no overrides.
 */
export function parseOverrideDocument(text: string | null | undefined): PartialUIParameter[] {
    if (text === null || text === undefined || text.trim() === '') {
        return [];
    }
    const document = loadDocument(text, 'override');
    if (document === null || document === undefined) {
        return [];
    }
    return validateOverrides(document);
}

/**
 * Serialize overrides as the YAML document that gets stored
 */
export function serializeOverrideDocument(overrides: PartialUIParameter[]): string {
    return yaml.dump(overrides, { noRefs: true, skipInvalid: true, lineWidth: -1 });
}

export function toIssueDetails(error: z.ZodError): IssueDetail[] {
    return error.issues.map((issue) => ({ path: issue.path, message: issue.message }));
}
