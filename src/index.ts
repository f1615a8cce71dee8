export {
    ChordDataError,
    ChordTable,
    STRING_NAMES,
    defaultChordTable,
    formatPositions,
    parsePositions,
} from "./chords";
export type {
    Chord,
    ChordDataset,
    Fret,
    LookupResult,
    Positions,
    UnknownChord,
} from "./chords";
export { CHORD_SEPARATOR, parseChordInput } from "./parser";
export {
    MIN_WINDOW,
    fretWindow,
    frettedFrets,
    sharedFretWindow,
    windowSize,
} from "./fretWindow";
export type { FretWindow } from "./fretWindow";
export { MARKERS, renderDiagram, renderUnknown } from "./diagram";
export type { DiagramBlock } from "./diagram";
export { DEFAULT_GRID, layoutGrid, packRows } from "./grid";
export type { Frame, GridOptions } from "./grid";
export { renderChordSheet } from "./pipeline";
export type { RenderOptions, RenderResult, WindowMode } from "./pipeline";
export { BufferWriter, Cursor, Event, Screen, TerminalWriter } from "./terminal";
export type { ITerminalWriter, SubEvent, TerminalSize } from "./terminal";
export { displayWidth, padColumns, sliceColumns } from "./text";
export { ChordInput, Command, Label, Panel, ScrollState, Widget } from "./widgets";
export type { KeyHint, LinePainter } from "./widgets";
export { App, paintDiagram, wrapText } from "./app";
export type { AppOptions, AppState } from "./app";
