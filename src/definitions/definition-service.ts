/**
 * Definition UI Schema Service
 *
 * Joins the engine to the stores that hold a definition's parameter
 * schema and its operator overrides. Stores are passed in explicitly;
 * the service keeps only a render cache keyed by the revisions of the
 * two documents.
 */

import type { SchemaNode } from '../schema/schema-types.js';
import type { PartialUIParameter, UIParameter } from '../schema/ui-parameter.js';
import { UISchemaEngine } from '../engine/ui-schema-engine.js';
import { validateConditions } from '../conditions/condition-evaluator.js';
import {
    overrideDocumentSchema,
    parseOverrideDocument,
    parseSchemaDocument,
    serializeOverrideDocument,
    toIssueDetails
} from '../parser/document-parser.js';
import { DefinitionSchemaNotFoundError, InvalidUISchemaError } from '../errors/engine-errors.js';
import { createLogger } from '../reporting/logger.js';
import type { Logger } from '../reporting/logger.js';

// ==========================================
// TYPES
// ==========================================

export type DefinitionType = 'component' | 'trait' | 'workflowstep' | 'policy';

export interface DefinitionRef {
    name: string;
    type: DefinitionType;
}

export interface StoredDocument {
    content: string;
    /** Changes whenever content changes */
    revision: string;
}

/**
 * Where the raw documents live (a config-map store in a cluster, a
 * database, or an in-memory stand-in)
 */
export interface DefinitionDocumentStore {
    getSchemaDocument(ref: DefinitionRef): Promise<StoredDocument | null>;
    getUISchemaDocument(ref: DefinitionRef): Promise<StoredDocument | null>;
    saveUISchemaDocument(ref: DefinitionRef, content: string): Promise<StoredDocument>;
}

export interface DefinitionDetail {
    name: string;
    type: DefinitionType;
    apiSchema: SchemaNode;
    uiSchema: UIParameter[];
}

interface CacheEntry {
    schemaRevision: string;
    uiSchemaRevision: string;
    detail: DefinitionDetail;
}

/**
 * Store name of a definition's parameter schema, e.g. workflowstep-schema-apply-object
 */
export function schemaDocumentName(ref: DefinitionRef): string {
    return `${ref.type}-schema-${ref.name}`;
}

/**
 * Store name of a definition's override document, e.g. workflowstep-uischema-apply-object
 */
export function uiSchemaDocumentName(ref: DefinitionRef): string {
    return `${ref.type}-uischema-${ref.name}`;
}

// ==========================================
// SERVICE CLASS
// ==========================================

export class DefinitionUISchemaService {
    private readonly store: DefinitionDocumentStore;
    private readonly engine: UISchemaEngine;
    private readonly logger: Logger;
    private readonly cache = new Map<string, CacheEntry>();

    constructor(store: DefinitionDocumentStore, engine: UISchemaEngine = new UISchemaEngine(), logger?: Logger) {
        this.store = store;
        this.engine = engine;
        this.logger = logger ?? createLogger('definition-ui-schema');
    }

    /**
     * Parameter schema plus the customized parameter tree of a definition
     */
    async detailDefinition(ref: DefinitionRef): Promise<DefinitionDetail> {
        const schemaDocument = await this.store.getSchemaDocument(ref);
        if (!schemaDocument) {
            throw new DefinitionSchemaNotFoundError(ref.type, ref.name);
        }
        const uiSchemaDocument = await this.store.getUISchemaDocument(ref);
        const uiSchemaRevision = uiSchemaDocument?.revision ?? '';

        const cacheKey = schemaDocumentName(ref);
        const cached = this.cache.get(cacheKey);
        if (cached && cached.schemaRevision === schemaDocument.revision && cached.uiSchemaRevision === uiSchemaRevision) {
            this.logger.debug(`cache hit for ${cacheKey}`);
            return structuredClone(cached.detail);
        }
        this.logger.debug(`cache miss for ${cacheKey}`);

        const apiSchema = parseSchemaDocument(schemaDocument.content);
        const overrides = parseOverrideDocument(uiSchemaDocument?.content);
        const detail: DefinitionDetail = {
            name: ref.name,
            type: ref.type,
            apiSchema,
            uiSchema: this.engine.renderFinal(apiSchema, overrides)
        };

        this.cache.set(cacheKey, { schemaRevision: schemaDocument.revision, uiSchemaRevision, detail });
        return structuredClone(detail);
    }

    /**
     * Validate and store operator overrides, returning the re-rendered tree
     */
    async addDefinitionUISchema(ref: DefinitionRef, overrides: PartialUIParameter[]): Promise<UIParameter[]> {
        const parsed = overrideDocumentSchema.safeParse(overrides);
        if (!parsed.success) {
            throw new InvalidUISchemaError(toIssueDetails(parsed.error));
        }

        const schemaDocument = await this.store.getSchemaDocument(ref);
        if (!schemaDocument) {
            throw new DefinitionSchemaNotFoundError(ref.type, ref.name);
        }
        const apiSchema = parseSchemaDocument(schemaDocument.content);
        validateConditions(parsed.data, this.engine.renderDefault(apiSchema));

        await this.store.saveUISchemaDocument(ref, serializeOverrideDocument(parsed.data));
        this.logger.info(`stored ${parsed.data.length} UI schema overrides as ${uiSchemaDocumentName(ref)}`);

        const detail = await this.detailDefinition(ref);
        return detail.uiSchema;
    }

    /**
     * Drop every cached render
     */
    clearCache(): void {
        this.cache.clear();
    }
}
