import { Diff } from '../entities/Diff';
import { Hunk } from '../entities/Hunk';
import { ComparisonOptions } from '../entities/ComparisonOptions';
import { MalformedDiffError } from '../errors/RegdiffError';

/**
 * ed-style range header: `5,7c5,7`, `3a4`, `12d11`.
 * digits, optional comma, optional digits, optional command letter,
 * optional digits, optional comma, optional digits.
 */
const HUNK_HEADER_PATTERN = /^\d+,?\d*[a-zA-Z]?\d*,?\d*$/;
const ADDED_PATTERN = /^>(?: (.*))?$/s;
const DELETED_PATTERN = /^<(?: (.*))?$/s;

export function isHunkHeader(line: string): boolean {
    return HUNK_HEADER_PATTERN.test(line);
}

interface HunkCollector {
    accept(line: string): void;
    finish(): Diff;
}

function createHunkCollector(): HunkCollector {
    const diff = new Diff();
    let current: Hunk | null = null;
    let lineNumber = 0;

    const requireHunk = (line: string): Hunk => {
        if (!current) {
            throw new MalformedDiffError(lineNumber, line);
        }
        return current;
    };

    return {
        accept(line: string): void {
            lineNumber++;

            if (isHunkHeader(line)) {
                if (current) {
                    diff.add(current);
                }
                current = Hunk.open(line);
            }

            const added = ADDED_PATTERN.exec(line);
            if (added) {
                requireHunk(line).appendAdded(line, added[1] ?? '');
                return;
            }

            const deleted = DELETED_PATTERN.exec(line);
            if (deleted) {
                requireHunk(line).appendDeleted(line, deleted[1] ?? '');
            }
            // Anything else (`---` separators, banners) carries no structure.
        },

        finish(): Diff {
            if (current) {
                diff.add(current);
                current = null;
            }
            return diff;
        },
    };
}

export class DiffParser {
    /**
     * Parse ed-style diff output into hunks, in order. No classification
     * is applied.
     */
    parse(lines: Iterable<string>): Diff {
        const collector = createHunkCollector();
        for (const line of lines) {
            collector.accept(line);
        }
        return collector.finish();
    }

    /**
     * Same as `parse`, for lines read from a stream. If the stream ends
     * early the hunk in progress is still flushed.
     */
    async parseAsync(lines: AsyncIterable<string>): Promise<Diff> {
        const collector = createHunkCollector();
        for await (const line of lines) {
            collector.accept(line);
        }
        return collector.finish();
    }
}

/**
 * Applies tolerance classification unless exact mode is requested.
 */
export function classifyDiff(diff: Diff, options: ComparisonOptions): Diff {
    if (options.exactMode) {
        return diff;
    }
    return diff.classify(options.epsilon);
}
