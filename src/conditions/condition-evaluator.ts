/**
 * Condition Rules
 *
 * Validation of operator-authored visibility rules and evaluation of
 * those rules against the values a form currently holds.
 */

import type { ConditionRule, PartialUIParameter, UIParameter } from '../schema/ui-parameter.js';
import { findParameter } from '../schema/ui-parameter.js';
import { splitKey } from '../schema/schema-types.js';
import { InvalidUISchemaError } from '../errors/engine-errors.js';
import type { IssueDetail } from '../errors/engine-errors.js';

// ==========================================
// VALIDATION
// ==========================================

/**
 * Check that every condition of an override tree refers to a parameter
 * of the derived tree other than the one it gates. All problems are
 * reported in a single error.
 */
export function validateConditions(overrides: PartialUIParameter[], parameters: UIParameter[]): void {
    const issues: IssueDetail[] = [];
    collectConditionIssues(overrides, parameters, [], issues);
    if (issues.length > 0) {
        throw new InvalidUISchemaError(issues);
    }
}

function collectConditionIssues(
    overrides: PartialUIParameter[],
    parameters: UIParameter[],
    path: (string | number)[],
    issues: IssueDetail[]
): void {
    overrides.forEach((override, index) => {
        const at = [...path, index];
        override.conditions?.forEach((rule, ruleIndex) => {
            const rulePath = [...at, 'conditions', ruleIndex, 'jsonKey'];
            if (rule.jsonKey === override.jsonKey) {
                issues.push({ path: rulePath, message: `condition of "${override.jsonKey}" cannot depend on itself` });
            } else if (!findParameter(parameters, rule.jsonKey)) {
                issues.push({ path: rulePath, message: `condition refers to unknown parameter "${rule.jsonKey}"` });
            }
        });
        if (override.subParameters) {
            collectConditionIssues(override.subParameters, parameters, [...at, 'subParameters'], issues);
        }
    });
}

// ==========================================
// EVALUATION
// ==========================================

/**
 * Read a value by dot-delimited key from nested form values
 */
export function readValue(values: Record<string, unknown>, jsonKey: string): unknown {
    let current: unknown = values;
    for (const segment of splitKey(jsonKey)) {
        if (typeof current !== 'object' || current === null || Array.isArray(current)) {
            return undefined;
        }
        current = Object.getOwnPropertyDescriptor(current, segment)?.value;
    }
    return current;
}

/**
 * Whether one rule's test holds for the given values
 */
export function matchesCondition(rule: ConditionRule, values: Record<string, unknown>): boolean {
    const actual = readValue(values, rule.jsonKey);

    switch (rule.operator ?? '==') {
        case '==':
            return isSameValue(actual, rule.value);
        case '!=':
            return !isSameValue(actual, rule.value);
        case 'in':
            if (Array.isArray(rule.value)) {
                return rule.value.some((candidate) => isSameValue(actual, candidate));
            }
            if (typeof rule.value === 'string' && typeof actual === 'string') {
                return rule.value.includes(actual);
            }
            return false;
    }
}

/**
 * A parameter is shown when every enable rule holds and no disable rule does
 */
export function isParameterVisible(parameter: Pick<UIParameter, 'conditions' | 'disable'>, values: Record<string, unknown>): boolean {
    if (parameter.disable) return false;

    for (const rule of parameter.conditions) {
        const matched = matchesCondition(rule, values);
        if ((rule.action ?? 'enable') === 'enable' ? !matched : matched) {
            return false;
        }
    }
    return true;
}

function isSameValue(actual: unknown, expected: unknown): boolean {
    if (typeof actual !== 'object' || actual === null || typeof expected !== 'object' || expected === null) {
        return actual === expected;
    }
    return JSON.stringify(actual) === JSON.stringify(expected);
}
