import { describe, it, expect, vi } from 'vitest';
import { UISchemaEngine, renderDefault, renderFinal } from '../src/engine/ui-schema-engine.js';
import { parseOverrideDocument, parseSchemaDocument } from '../src/parser/document-parser.js';
import type { Logger } from '../src/reporting/logger.js';
import type { UIParameter } from '../src/schema/ui-parameter.js';
import { findParameter, walkParameters } from '../src/schema/ui-parameter.js';
import { readFixture } from './helpers/fixtures.js';

function createTestLogger(): Logger {
    return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function keysOf(parameters: UIParameter[] | undefined): string[] {
    return (parameters ?? []).map((parameter) => parameter.jsonKey);
}

function requireParameter(parameters: UIParameter[], jsonKey: string): UIParameter {
    const parameter = findParameter(parameters, jsonKey);
    if (!parameter) throw new Error(`missing parameter ${jsonKey}`);
    return parameter;
}

const DEFAULT_ROOT_ORDER = [
    'exposeType',
    'image',
    'port',
    'cpu',
    'cmd',
    'imagePullPolicy',
    'labels',
    'memory',
    'readinessProbe',
    'volumeMounts',
    'env',
    'livenessProbe'
];

describe('UI Schema Engine', () => {
    const schema = parseSchemaDocument(readFixture('webservice-schema.json'));
    const overrides = parseOverrideDocument(readFixture('ui-custom-schema.yaml'));

    describe('renderDefault', () => {
        it('should derive and sort the default tree', () => {
            const parameters = renderDefault(schema);

            expect(keysOf(parameters)).toEqual(DEFAULT_ROOT_ORDER);
            expect(parameters.map((parameter) => parameter.sort)).toEqual([
                100, 101, 102, 103, 104, 105, 106, 107, 108, 109, 110, 111
            ]);
        });

        it('should sort nested lists too', () => {
            const parameters = renderDefault(schema);

            expect(keysOf(requireParameter(parameters, 'livenessProbe').subParameters)).toEqual([
                'livenessProbe.failureThreshold',
                'livenessProbe.initialDelaySeconds',
                'livenessProbe.periodSeconds',
                'livenessProbe.successThreshold',
                'livenessProbe.timeoutSeconds',
                'livenessProbe.exec',
                'livenessProbe.tcpSocket',
                'livenessProbe.httpGet'
            ]);
            expect(keysOf(requireParameter(parameters, 'livenessProbe.httpGet').subParameters)).toEqual([
                'livenessProbe.httpGet.port',
                'livenessProbe.httpGet.host',
                'livenessProbe.httpGet.path'
            ]);
        });

        it('should number every required entry below every optional one', () => {
            const parameters = renderDefault(schema);
            const siblingLists: UIParameter[][] = [parameters];
            walkParameters(parameters, (parameter) => {
                if (parameter.subParameters) siblingLists.push(parameter.subParameters);
            });

            for (const siblings of siblingLists) {
                const required = siblings.filter((sibling) => sibling.validate.required).map((sibling) => sibling.sort);
                const optional = siblings.filter((sibling) => !sibling.validate.required).map((sibling) => sibling.sort);
                if (required.length > 0 && optional.length > 0) {
                    expect(Math.max(...required)).toBeLessThan(Math.min(...optional));
                }
            }
            expect(siblingLists).toHaveLength(12);
        });

        it('should honour a configured default sort', () => {
            const parameters = renderDefault(schema, { defaultSort: 1 });
            expect(parameters[0].sort).toBe(1);
            expect(parameters[11].sort).toBe(12);
        });

        it('should render nothing for a missing schema', () => {
            expect(renderDefault(null)).toEqual([]);
        });
    });

    describe('renderFinal', () => {
        it('should keep the default shape after patching', () => {
            const parameters = renderFinal(schema, overrides);

            expect(parameters).toHaveLength(12);
            expect(keysOf(parameters)).toEqual(DEFAULT_ROOT_ORDER);
            expect(parameters[11].jsonKey).toBe('livenessProbe');
            expect(parameters[11].subParameters).toHaveLength(8);
        });

        it('should apply overrides without reordering', () => {
            const parameters = renderFinal(schema, overrides);
            const probe = parameters[11];

            expect(probe.label).toBe('Liveness Probe');
            expect(probe.sort).toBe(20);
            expect(probe.description).toBe('Instructions for assessing whether the container is alive');

            const httpGet = requireParameter(parameters, 'livenessProbe.httpGet');
            expect(httpGet.uiType).toBe('Ignore');
            expect(keysOf(httpGet.subParameters)).toEqual([
                'livenessProbe.httpGet.port',
                'livenessProbe.httpGet.host',
                'livenessProbe.httpGet.path'
            ]);

            const path = requireParameter(parameters, 'livenessProbe.httpGet.path');
            expect(path.validate).toEqual({ required: true, defaultValue: '/healthz' });
            expect(path.sort).toBe(102);
        });

        it('should leave untouched parameters as derived', () => {
            const defaults = renderDefault(schema);
            const parameters = renderFinal(schema, overrides);

            expect(requireParameter(parameters, 'env')).toEqual(requireParameter(defaults, 'env'));
            expect(requireParameter(parameters, 'image').validate).toEqual({
                required: true,
                pattern: '^[a-z0-9./:-]+$'
            });
            expect(requireParameter(parameters, 'image').label).toBe('Container Image');
            expect(requireParameter(parameters, 'cpu').conditions).toEqual([
                { jsonKey: 'exposeType', operator: '==', value: 'LoadBalancer' }
            ]);
        });

        it('should behave as renderDefault without overrides', () => {
            expect(renderFinal(schema, null)).toEqual(renderDefault(schema));
            expect(renderFinal(schema, [])).toEqual(renderDefault(schema));
        });
    });

    describe('render', () => {
        it('should report discarded and mismatched overrides', () => {
            const engine = new UISchemaEngine({}, createTestLogger());
            const result = engine.render(schema, overrides);

            expect(result.diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.jsonKey])).toEqual([
                ['STRUCTURE_MISMATCH', 'labels'],
                ['UNMATCHED_OVERRIDE', 'livenessProbe.grpc'],
                ['UNMATCHED_OVERRIDE', 'unknownField']
            ]);
            expect(result.summary.totalDiagnostics).toBe(3);
            expect(result.summary.byCode.UNMATCHED_OVERRIDE).toBe(2);
            expect(result.summary.bySeverity).toEqual({ warning: 1, info: 2 });
        });

        it('should log a summary and each diagnostic at debug level', () => {
            const logger = createTestLogger();
            new UISchemaEngine({ debug: true }, logger).render(schema, overrides);

            expect(logger.debug).toHaveBeenCalledTimes(4);
            expect(logger.debug).toHaveBeenNthCalledWith(1, 'rendered 12 root parameters with 5 overrides, 3 diagnostics');
            expect(logger.debug).toHaveBeenNthCalledWith(2, 'STRUCTURE_MISMATCH labels: override declares sub-parameters but the derived parameter has none');
        });

        it('should hand out trees that do not share state between calls', () => {
            const engine = new UISchemaEngine({}, createTestLogger());
            const first = engine.renderFinal(schema, overrides);
            first[0].label = 'changed';

            expect(engine.renderFinal(schema, overrides)[0].label).toBe('exposeType');
        });
    });
});
