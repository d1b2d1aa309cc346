/**
 * UI Schema Engine
 *
 * Three-stage pipeline turning a definition's parameter schema into the
 * parameter tree served to clients:
 *
 * Stage 1: Derive - walk the schema into a default parameter tree
 * Stage 2: Sort   - order every sibling list and number it
 * Stage 3: Patch  - overlay the operator's overrides onto the sorted tree
 *
 * Every call is a pure function of its arguments; returned trees belong
 * to the caller.
 */

import type { SchemaNode } from '../schema/schema-types.js';
import type { PartialUIParameter, UIParameter } from '../schema/ui-parameter.js';
import { deriveParameters } from '../walker/schema-walker.js';
import { sortParameters } from '../sorter/parameter-sorter.js';
import { patchParameters } from '../patcher/patch-merger.js';
import { resolveEngineOptions } from '../config/engine-options.js';
import type { EngineOptions } from '../config/engine-options.js';
import { RenderReporter } from '../reporting/render-reporter.js';
import type { RenderDiagnostic, RenderSummary } from '../reporting/render-reporter.js';
import { createLogger } from '../reporting/logger.js';
import type { Logger } from '../reporting/logger.js';

// ==========================================
// TYPES
// ==========================================

export interface RenderResult {
    parameters: UIParameter[];
    diagnostics: RenderDiagnostic[];
    summary: RenderSummary;
}

// ==========================================
// ENGINE CLASS
// ==========================================

export class UISchemaEngine {
    private readonly options: EngineOptions;
    private readonly logger: Logger;

    constructor(options: Partial<EngineOptions> = {}, logger?: Logger) {
        this.options = resolveEngineOptions(options);
        this.logger = logger ?? createLogger('ui-schema', { debug: this.options.debug });
    }

    /**
     * Derive and sort the default tree
     */
    renderDefault(schema: SchemaNode | null | undefined): UIParameter[] {
        return this.render(schema).parameters;
    }

    /**
     * Derive, sort, then overlay the overrides. Without overrides this is renderDefault.
     */
    renderFinal(schema: SchemaNode | null | undefined, overrides?: PartialUIParameter[] | null): UIParameter[] {
        return this.render(schema, overrides).parameters;
    }

    /**
     * Run the pipeline and also return what was reported along the way
     */
    render(schema: SchemaNode | null | undefined, overrides?: PartialUIParameter[] | null): RenderResult {
        const reporter = new RenderReporter();
        const { defaultSort } = this.options;

        const derived = deriveParameters(schema, { defaultSort, reporter });
        const sorted = sortParameters(derived, { defaultSort });
        const parameters = overrides && overrides.length > 0
            ? patchParameters(sorted, overrides, reporter)
            : sorted;

        const diagnostics = reporter.getDiagnostics();
        const summary = reporter.generateSummary();

        this.logger.debug(
            `rendered ${parameters.length} root parameters with ${overrides?.length ?? 0} overrides, ${summary.totalDiagnostics} diagnostics`
        );
        for (const diagnostic of diagnostics) {
            this.logger.debug(`${diagnostic.code} ${diagnostic.jsonKey}: ${diagnostic.message}`);
        }

        return { parameters, diagnostics, summary };
    }
}

// ==========================================
// EXPORTS
// ==========================================

/**
 * Convenience function to render the default tree
 */
export function renderDefault(schema: SchemaNode | null | undefined, options?: Partial<EngineOptions>): UIParameter[] {
    return new UISchemaEngine(options).renderDefault(schema);
}

/**
 * Convenience function to render the customized tree
 */
export function renderFinal(
    schema: SchemaNode | null | undefined,
    overrides?: PartialUIParameter[] | null,
    options?: Partial<EngineOptions>
): UIParameter[] {
    return new UISchemaEngine(options).renderFinal(schema, overrides);
}
