import { Hunk } from './Hunk';

/**
 * Whole-diff view for one file pair. Hunks resolved by tolerance are
 * dropped, but their raw-line count is kept in `omittedLines`.
 */
export class Diff {
    private _hunks: Hunk[] = [];
    private _omittedLines = 0;
    private _toleratedHunkCount = 0;

    get hunks(): readonly Hunk[] {
        return this._hunks;
    }

    get hunkCount(): number {
        return this._hunks.length;
    }

    get totalChangedLines(): number {
        return this._hunks.reduce((sum, hunk) => sum + hunk.lineCount, 0);
    }

    get omittedLines(): number {
        return this._omittedLines;
    }

    get toleratedHunkCount(): number {
        return this._toleratedHunkCount;
    }

    get isEmpty(): boolean {
        return this._hunks.length === 0;
    }

    add(hunk: Hunk): void {
        this._hunks.push(hunk);
    }

    /**
     * Drops every hunk whose only difference is numeric noise within
     * epsilon. Retained hunks keep their relative order.
     */
    classify(epsilon: number): this {
        const retained: Hunk[] = [];
        for (const hunk of this._hunks) {
            if (hunk.isToleranceOnlyDifference(epsilon)) {
                this._omittedLines += hunk.lineCount;
                this._toleratedHunkCount++;
            } else {
                retained.push(hunk);
            }
        }
        this._hunks = retained;
        return this;
    }
}
