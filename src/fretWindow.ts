import type { Chord } from "./chords";

/** Narrowest fret range a diagram shows. */
export const MIN_WINDOW = 5;

export interface FretWindow {
    low: number;
    high: number;
}

export function windowSize(window: FretWindow): number {
    return window.high - window.low + 1;
}

/** Fret numbers of the strings that are pressed, in string order. */
export function frettedFrets(chord: Chord): number[] {
    return chord.positions.filter((f): f is number => typeof f === "number");
}

function fit(frets: readonly number[], minWindow: number): FretWindow {
    if (frets.length === 0) return { low: 1, high: minWindow };
    const low = Math.min(...frets);
    const high = Math.max(...frets);
    // Only `high` grows, so `low` stays on the lowest pressed fret (≥ 1).
    return { low, high: Math.max(high, low + minWindow - 1) };
}

/**
 * Smallest window holding every pressed fret, at least `minWindow` wide.
 * Open/muted-only chords get the window at the nut.
 */
export function fretWindow(chord: Chord, minWindow = MIN_WINDOW): FretWindow {
    return fit(frettedFrets(chord), minWindow);
}

/**
 * One window for a batch of chords. It starts at the nut when any chord has
 * an open string or a note on fret 1, otherwise at the lowest pressed fret,
 * and reaches the highest pressed fret or `minWindow` frets, whichever is more.
 */
export function sharedFretWindow(
    chords: readonly Chord[],
    minWindow = MIN_WINDOW,
): FretWindow {
    const frets = chords.flatMap(frettedFrets);
    const hasOpen = chords.some((c) => c.positions.includes("open"));
    const low = frets.length === 0 || hasOpen ? 1 : Math.max(1, Math.min(...frets));
    const high = frets.length === 0 ? low : Math.max(...frets);
    return { low, high: Math.max(high, low + minWindow - 1) };
}
