import { linesDifferOnlyByPrecision } from '../services/NumericTolerance';
import { InvalidHunkError } from '../errors/RegdiffError';

export interface HunkData {
    rawLines: string[];
    addedLines: string[];
    deletedLines: string[];
}

/**
 * One contiguous block of an ed-style line diff: the range header followed
 * by its `<` (deleted) and `>` (added) lines.
 */
export class Hunk {
    private readonly _rawLines: string[];
    private readonly _addedLines: string[];
    private readonly _deletedLines: string[];

    /**
     * @throws InvalidHunkError when `rawLines` cannot hold every added and
     * deleted line.
     */
    constructor(data: HunkData) {
        const contentLineCount = data.addedLines.length + data.deletedLines.length;
        if (data.rawLines.length < contentLineCount) {
            throw new InvalidHunkError(data.rawLines.length, contentLineCount);
        }
        this._rawLines = [...data.rawLines];
        this._addedLines = [...data.addedLines];
        this._deletedLines = [...data.deletedLines];
    }

    get rawLines(): readonly string[] {
        return this._rawLines;
    }

    get addedLines(): readonly string[] {
        return this._addedLines;
    }

    get deletedLines(): readonly string[] {
        return this._deletedLines;
    }

    get header(): string | undefined {
        return this._rawLines[0];
    }

    get lineCount(): number {
        return this._rawLines.length;
    }

    appendAdded(rawLine: string, content: string): void {
        this._rawLines.push(rawLine);
        this._addedLines.push(content);
    }

    appendDeleted(rawLine: string, content: string): void {
        this._rawLines.push(rawLine);
        this._deletedLines.push(content);
    }

    /**
     * Pairs the i-th deleted line with the i-th added line. Reordered lines
     * never pair up, so a reordering is always a real difference.
     */
    isToleranceOnlyDifference(epsilon: number): boolean {
        if (this._addedLines.length !== this._deletedLines.length) {
            return false;
        }

        return this._addedLines.every((added, i) =>
            linesDifferOnlyByPrecision(this._deletedLines[i], added, epsilon)
        );
    }

    static open(header: string): Hunk {
        return new Hunk({
            rawLines: [header],
            addedLines: [],
            deletedLines: [],
        });
    }
}
