export interface IDiffPort {
    /**
     * Stream the ed-style diff of two files, one line at a time.
     * The baseline is the old side (`<`), the current file the new side (`>`).
     */
    diffLines(baselinePath: string, currentPath: string): AsyncIterable<string>;
}
