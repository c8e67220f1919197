export const DEFAULT_EPSILON = 6e-4;

export interface ComparisonOptions {
    /** Largest absolute difference still treated as equal (exclusive). */
    epsilon: number;
    /** Skip tolerance classification and keep every hunk. */
    exactMode: boolean;
}

export const DEFAULT_COMPARISON_OPTIONS: ComparisonOptions = {
    epsilon: DEFAULT_EPSILON,
    exactMode: false,
};
