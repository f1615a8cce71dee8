import { STRING_NAMES, type Chord, type Fret } from "./chords";
import type { FretWindow } from "./fretWindow";
import { displayWidth, padColumns } from "./text";

/** One chord drawn as text: the label line first, every line `width` columns wide. */
export interface DiagramBlock {
    readonly name: string;
    readonly width: number;
    readonly lines: readonly string[];
}

export const MARKERS = {
    open: "O",
    muted: "X",
    finger: "●",
    string: "-",
    fret: "|",
} as const;

const CELL = MARKERS.string.repeat(3);
const FINGER_CELL = MARKERS.string + MARKERS.finger + MARKERS.string;

// "A O " in front of the first fret bar.
const PREFIX_WIDTH = 4;

function block(name: string, rows: string[]): DiagramBlock {
    const width = rows.reduce((m, r) => Math.max(m, displayWidth(r)), 0);
    return { name, width, lines: rows.map((r) => padColumns(r, width)) };
}

function nutMarker(fret: Fret): string {
    if (fret === "open") return MARKERS.open;
    if (fret === "muted") return MARKERS.muted;
    return " ";
}

/** Absolute fret numbers, each centred over its 3-column cell. */
function fretNumbers(frets: number[]): string {
    const labels = frets.map((f) => String(f).padStart(2).padEnd(3));
    return " ".repeat(PREFIX_WIDTH + 1) + labels.join(" ");
}

function stringRow(name: string, fret: Fret, frets: number[]): string {
    const cells = frets.map((f) => (f === fret ? FINGER_CELL : CELL));
    return (
        `${name} ${nutMarker(fret)} ` +
        MARKERS.fret +
        cells.map((c) => c + MARKERS.fret).join("")
    );
}

/**
 * Draws `chord` over `window`: highest string (A) on top, frets left to
 * right, open/muted markers before the first fret bar.
 *
 *     Am
 *           1   2   3   4   5
 *     A O |---|---|---|---|---|
 *     E O |---|---|---|---|---|
 *     C O |---|---|---|---|---|
 *     G   |---|-●-|---|---|---|
 */
export function renderDiagram(chord: Chord, window: FretWindow): DiagramBlock {
    const frets: number[] = [];
    for (let f = window.low; f <= window.high; f++) frets.push(f);

    const rows = [chord.name, fretNumbers(frets)];
    for (let s = STRING_NAMES.length - 1; s >= 0; s--) {
        rows.push(
            stringRow(STRING_NAMES[s] ?? "", chord.positions[s] ?? "muted", frets),
        );
    }
    return block(chord.name, rows);
}

/** Placeholder kept in the grid for a token the table does not know. */
export function renderUnknown(name: string): DiagramBlock {
    return block(name, [name, "(unknown chord)"]);
}
