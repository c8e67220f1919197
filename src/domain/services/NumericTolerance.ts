import { NumberParseError } from '../errors/RegdiffError';

/**
 * Optional sign, then digits with an optional fraction or a bare fraction,
 * then an optional exponent. Never matches the empty string.
 */
const NUMBER_PATTERN = /[-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][-+]?\d+)?/g;

const DIGIT_PATTERN = /\d/;

export function extractNumbers(line: string): number[] {
    const literals = line.match(NUMBER_PATTERN) ?? [];
    return literals
        .filter(literal => literal.length > 0)
        .map(literal => {
            const value = Number(literal);
            if (Number.isNaN(value)) {
                throw new NumberParseError(literal);
            }
            return value;
        });
}

export function stripNumbers(line: string): string {
    return line.replace(NUMBER_PATTERN, '');
}

/**
 * True when two lines differ only in the values of their embedded numbers,
 * and every pair of numbers is closer than epsilon.
 */
export function linesDifferOnlyByPrecision(deleted: string, added: string, epsilon: number): boolean {
    if (!DIGIT_PATTERN.test(deleted) || !DIGIT_PATTERN.test(added)) {
        return false;
    }

    const deletedNumbers = extractNumbers(deleted);
    const addedNumbers = extractNumbers(added);
    if (deletedNumbers.length !== addedNumbers.length) {
        return false;
    }

    for (let i = 0; i < deletedNumbers.length; i++) {
        if (!(Math.abs(deletedNumbers[i] - addedNumbers[i]) < epsilon)) {
            return false;
        }
    }

    return stripNumbers(deleted) === stripNumbers(added);
}
