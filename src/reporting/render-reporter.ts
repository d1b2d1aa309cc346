/**
 * Render Reporter
 *
 * Collects the non-fatal findings of a render (unsupported schema nodes,
 * overrides that matched nothing) with grouping, summary statistics
 * and a plain-text report.
 */

// ==========================================
// TYPES
// ==========================================

export type DiagnosticCode =
    | 'FALLBACK_NODE'
    | 'UNMATCHED_OVERRIDE'
    | 'STRUCTURE_MISMATCH'
    | 'DUPLICATE_OVERRIDE';

export type DiagnosticSeverity = 'warning' | 'info';

export interface RenderDiagnostic {
    code: DiagnosticCode;
    jsonKey: string;
    message: string;
    severity: DiagnosticSeverity;
}

export interface RenderSummary {
    totalDiagnostics: number;
    byCode: Record<DiagnosticCode, number>;
    bySeverity: Record<DiagnosticSeverity, number>;
    processingTimeMs: number;
}

const SEVERITY_BY_CODE: Record<DiagnosticCode, DiagnosticSeverity> = {
    FALLBACK_NODE: 'warning',
    UNMATCHED_OVERRIDE: 'info',
    STRUCTURE_MISMATCH: 'warning',
    DUPLICATE_OVERRIDE: 'info'
};

// ==========================================
// RENDER REPORTER CLASS
// ==========================================

export class RenderReporter {
    private diagnostics: RenderDiagnostic[];
    private startTime: number;

    constructor() {
        this.diagnostics = [];
        this.startTime = Date.now();
    }

    /**
     * Record one finding
     */
    report(code: DiagnosticCode, jsonKey: string, message: string): void {
        this.diagnostics.push({
            code,
            jsonKey,
            message,
            severity: SEVERITY_BY_CODE[code]
        });
    }

    /**
     * Group diagnostics by code, keeping insertion order within a group
     */
    groupByCode(): Map<DiagnosticCode, RenderDiagnostic[]> {
        const byCode = new Map<DiagnosticCode, RenderDiagnostic[]>();

        for (const diagnostic of this.diagnostics) {
            const group = byCode.get(diagnostic.code);
            if (group) {
                group.push(diagnostic);
            } else {
                byCode.set(diagnostic.code, [diagnostic]);
            }
        }

        return byCode;
    }

    /**
     * Generate summary statistics
     */
    generateSummary(): RenderSummary {
        const summary: RenderSummary = {
            totalDiagnostics: this.diagnostics.length,
            byCode: { FALLBACK_NODE: 0, UNMATCHED_OVERRIDE: 0, STRUCTURE_MISMATCH: 0, DUPLICATE_OVERRIDE: 0 },
            bySeverity: { warning: 0, info: 0 },
            processingTimeMs: Date.now() - this.startTime
        };

        for (const diagnostic of this.diagnostics) {
            summary.byCode[diagnostic.code]++;
            summary.bySeverity[diagnostic.severity]++;
        }

        return summary;
    }

    /**
     * Format report as text
     */
    formatAsText(): string {
        const lines: string[] = [];
        const summary = this.generateSummary();

        lines.push('UI Schema Render Report');
        lines.push('─'.repeat(40));
        lines.push(`Total: ${summary.totalDiagnostics}`);

        for (const [code, group] of this.groupByCode()) {
            lines.push('');
            lines.push(`${code} (${group.length}):`);
            for (const diagnostic of group) {
                lines.push(`  [${diagnostic.severity.toUpperCase()}] ${diagnostic.jsonKey}: ${diagnostic.message}`);
            }
        }

        return lines.join('\n');
    }

    getDiagnostics(): RenderDiagnostic[] {
        return [...this.diagnostics];
    }

    /**
     * Clear all diagnostics and restart the clock
     */
    clear(): void {
        this.diagnostics = [];
        this.startTime = Date.now();
    }
}

/**
 * Create a new reporter instance
 */
export function createRenderReporter(): RenderReporter {
    return new RenderReporter();
}
