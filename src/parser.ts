/** Reserved input character separating chord names. */
export const CHORD_SEPARATOR = ",";

/**
 * Splits raw input into chord-name tokens: comma-separated, trimmed, empty
 * tokens dropped. Names are not checked here; the table decides.
 */
export function parseChordInput(input: string): string[] {
    return input
        .split(CHORD_SEPARATOR)
        .map((token) => token.trim())
        .filter((token) => token.length > 0);
}
