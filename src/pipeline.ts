import type { Chord, ChordTable } from "./chords";
import { renderDiagram, renderUnknown, type DiagramBlock } from "./diagram";
import { fretWindow, MIN_WINDOW, sharedFretWindow } from "./fretWindow";
import { layoutGrid, type Frame, type GridOptions } from "./grid";
import { parseChordInput } from "./parser";

/**
 * "per-chord": each diagram gets its own window.
 * "shared": every diagram shows the one window covering the whole batch.
 */
export type WindowMode = "per-chord" | "shared";

export interface RenderOptions {
    width: number;
    windowMode?: WindowMode;
    minWindow?: number;
    grid?: Partial<GridOptions>;
}

export interface RenderResult {
    tokens: string[];
    chords: Chord[];
    unknown: string[];
    blocks: DiagramBlock[];
    frame: Frame;
}

type Entry = { token: string; chord?: Chord };

/** parse → lookup → window → render → layout, for one snapshot of input. */
export function renderChordSheet(
    input: string,
    table: ChordTable,
    options: RenderOptions,
): RenderResult {
    const { width, windowMode = "per-chord", minWindow = MIN_WINDOW } = options;
    const tokens = parseChordInput(input);

    const entries: Entry[] = tokens.map((token) => {
        const found = table.lookup(token);
        return found.ok ? { token, chord: found.chord } : { token };
    });
    const chords = entries.flatMap((e) => e.chord ?? []);
    const unknown = entries.flatMap((e) => (e.chord ? [] : [e.token]));

    const shared =
        windowMode === "shared" ? sharedFretWindow(chords, minWindow) : null;

    const blocks = entries.map(({ token, chord }) =>
        chord
            ? renderDiagram(chord, shared ?? fretWindow(chord, minWindow))
            : renderUnknown(token),
    );

    return {
        tokens,
        chords,
        unknown,
        blocks,
        frame: layoutGrid(blocks, width, options.grid),
    };
}
