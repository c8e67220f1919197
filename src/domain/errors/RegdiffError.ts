export type RegdiffErrorCode =
    | 'MALFORMED_DIFF'
    | 'INVALID_HUNK'
    | 'NUMBER_PARSE_INVARIANT'
    | 'DIFF_PROCESS'
    | 'INVALID_CONFIG';

export abstract class RegdiffError extends Error {
    abstract readonly code: RegdiffErrorCode;

    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * An added/deleted line arrived before any hunk header.
 */
export class MalformedDiffError extends RegdiffError {
    readonly code = 'MALFORMED_DIFF';

    constructor(
        readonly lineNumber: number,
        readonly line: string
    ) {
        super(`Line ${lineNumber} changes content outside of any hunk: ${JSON.stringify(line)}`);
    }
}

export class InvalidHunkError extends RegdiffError {
    readonly code = 'INVALID_HUNK';

    constructor(
        readonly rawLineCount: number,
        readonly contentLineCount: number
    ) {
        super(`Hunk has ${rawLineCount} raw line(s) for ${contentLineCount} added/deleted line(s)`);
    }
}

/**
 * Text matched by the number pattern did not parse as a float.
 * Only reachable if the pattern itself is wrong.
 */
export class NumberParseError extends RegdiffError {
    readonly code = 'NUMBER_PARSE_INVARIANT';

    constructor(readonly literal: string) {
        super(`Number pattern matched a non-numeric literal: ${JSON.stringify(literal)}`);
    }
}

export class DiffProcessError extends RegdiffError {
    readonly code = 'DIFF_PROCESS';

    constructor(
        message: string,
        readonly exitCode: number | null,
        readonly stderr: string,
        options?: ErrorOptions
    ) {
        super(message, options);
    }
}

export class ConfigError extends RegdiffError {
    readonly code = 'INVALID_CONFIG';

    constructor(
        readonly configPath: string,
        message: string,
        options?: ErrorOptions
    ) {
        super(`${configPath}: ${message}`, options);
    }
}
