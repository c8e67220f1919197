import { Diff } from './Diff';

export interface FilePair {
    /** Path relative to the output and regression directories. */
    name: string;
    currentPath: string;
    baselinePath: string;
}

export type ComparisonStatus =
    | 'match'
    | 'tolerated'
    | 'differ'
    | 'missing-baseline'
    | 'missing-output'
    | 'error';

export interface ComparisonResult {
    pair: FilePair;
    status: ComparisonStatus;
    diff?: Diff;
    errorMessage?: string;
}

export type StatusCounts = Record<ComparisonStatus, number>;

export interface RunSummary {
    results: ComparisonResult[];
    counts: StatusCounts;
    passed: boolean;
}

const PASSING_STATUSES: ReadonlySet<ComparisonStatus> = new Set<ComparisonStatus>(['match', 'tolerated']);

export function isPassing(status: ComparisonStatus): boolean {
    return PASSING_STATUSES.has(status);
}

export function summarize(results: ComparisonResult[]): RunSummary {
    const counts: StatusCounts = {
        'match': 0,
        'tolerated': 0,
        'differ': 0,
        'missing-baseline': 0,
        'missing-output': 0,
        'error': 0,
    };
    for (const result of results) {
        counts[result.status]++;
    }
    return {
        results,
        counts,
        passed: results.every(r => isPassing(r.status)),
    };
}

/**
 * Status of a parsed pair once classification has run.
 */
export function statusOf(diff: Diff): ComparisonStatus {
    if (!diff.isEmpty) return 'differ';
    return diff.toleratedHunkCount > 0 ? 'tolerated' : 'match';
}
