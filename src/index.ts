/**
 * Definition UI Schema
 * Derives, orders and customizes the UI parameter tree of a definition
 */

export { UISchemaEngine, renderDefault, renderFinal } from './engine/ui-schema-engine.js';
export { deriveParameters } from './walker/schema-walker.js';
export { sortParameters, resolveSortBase } from './sorter/parameter-sorter.js';
export { patchParameters, cloneParameter } from './patcher/patch-merger.js';
export {
    parseSchemaDocument,
    parseOverrideDocument,
    serializeOverrideDocument,
    validateOverrides
} from './parser/document-parser.js';
export { validateConditions, isParameterVisible, matchesCondition, readValue } from './conditions/condition-evaluator.js';
export {
    DefinitionUISchemaService,
    schemaDocumentName,
    uiSchemaDocumentName
} from './definitions/definition-service.js';
export { classifySchemaNode, getDefaultUIType, DEFAULT_UI_TYPES } from './knowledge/ui-type-registry.js';
export { DEFAULT_ENGINE_OPTIONS, resolveEngineOptions, loadEngineOptionsFromEnv } from './config/engine-options.js';
export { RenderReporter, createRenderReporter } from './reporting/render-reporter.js';
export { createLogger } from './reporting/logger.js';
export {
    DocumentParseError,
    EngineConfigError,
    InvalidUISchemaError,
    DefinitionSchemaNotFoundError
} from './errors/engine-errors.js';
export { joinKey, splitKey } from './schema/schema-types.js';
export { countSubParameters, walkParameters, findParameter } from './schema/ui-parameter.js';

export type { SchemaNode, ParameterKind } from './schema/schema-types.js';
export type {
    UIParameter,
    PartialUIParameter,
    Validate,
    Option,
    ConditionRule,
    ConditionOperator,
    ConditionAction,
    Style,
    GroupOption,
    JsonValue
} from './schema/ui-parameter.js';
export type { RenderResult } from './engine/ui-schema-engine.js';
export type {
    DefinitionType,
    DefinitionRef,
    StoredDocument,
    DefinitionDocumentStore,
    DefinitionDetail
} from './definitions/definition-service.js';
export type { UIType } from './knowledge/ui-type-registry.js';
export type { EngineOptions } from './config/engine-options.js';
export type { RenderDiagnostic, RenderSummary, DiagnosticCode } from './reporting/render-reporter.js';
export type { Logger } from './reporting/logger.js';
