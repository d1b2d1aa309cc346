/**
 * Error classes surfaced by document parsing, configuration and the
 * definition service. Walking, sorting and patching never throw on data.
 */

export interface IssueDetail {
    path: (string | number)[];
    message: string;
}

/**
 * Render an issue as `path: message`, using <root> for the document itself
 */
export function formatIssue({ path, message }: IssueDetail): string {
    const location = path.length > 0 ? path.join('.') : '<root>';
    return `${location}: ${message}`;
}

function formatIssues(header: string, issues: IssueDetail[]): string {
    if (issues.length === 0) return header;
    const details = issues.map((issue) => `  • ${formatIssue(issue)}`).join('\n');
    return `${header}\n${details}`;
}

/**
 * A schema or override document could not be read into the expected shape
 */
export class DocumentParseError extends Error {
    readonly issues: IssueDetail[];

    constructor(documentKind: string, issues: IssueDetail[]) {
        super(formatIssues(`Invalid ${documentKind} document`, issues));
        this.name = 'DocumentParseError';
        this.issues = issues;
    }
}

export class EngineConfigError extends Error {
    constructor(issues: IssueDetail[]) {
        super(formatIssues('Invalid engine configuration', issues));
        this.name = 'EngineConfigError';
    }
}

/**
 * Operator-authored UI schema failed validation and was not stored
 */
export class InvalidUISchemaError extends Error {
    readonly issues: IssueDetail[];

    constructor(issues: IssueDetail[]) {
        super(formatIssues('Invalid UI schema', issues));
        this.name = 'InvalidUISchemaError';
        this.issues = issues;
    }
}

export class DefinitionSchemaNotFoundError extends Error {
    constructor(type: string, name: string) {
        super(`No parameter schema stored for ${type} definition "${name}"`);
        this.name = 'DefinitionSchemaNotFoundError';
    }
}
