import * as readline from "readline";
import chalk from "chalk";
import type { ChordTable } from "./chords";
import { MARKERS } from "./diagram";
import { renderChordSheet, type RenderResult, type WindowMode } from "./pipeline";
import { splashLines } from "./splash";
import type { ITerminalWriter, TerminalSize } from "./terminal";
import { ChordInput, Command, Label, Panel, type LinePainter } from "./widgets";

export type AppState = "splash" | "input" | "diagrams" | "help";

export interface AppOptions {
    table: ChordTable;
    writer: ITerminalWriter;
    size: () => TerminalSize;
    windowMode?: WindowMode;
}

const HELP_TEXT: readonly string[] = [
    "Keybindings",
    "",
    "type      edit the chord list, commas between chords",
    "↑ / ↓     scroll diagrams",
    "tab       toggle one shared fret range for all diagrams",
    "ctrl-u    clear the input",
    "?         show / hide this help",
    "esc       close help, or quit",
    "ctrl-c    quit",
    "",
    "Chord names: [Note][Accidental][Type]",
    "Note = C, D, E, F, G, A, B",
    "Accidental = none, # or b",
    "Type = none (major), m, 7, maj7, m7, dim7, m7b5, 9, maj9, m9, 6, m6, add9, madd9, sus2, sus4, 7sus2, 7sus4, 7+5, 7b5, mM7, 6/9, aug, dim, add11, madd11",
    "Other voicings: append :2 or :3, e.g. C:2",
    "",
    "Example: C, Ebm7, F#dim, G:2",
];

const EMPTY_PROMPT = ["Type one or more chords, separated by commas."];

const UNKNOWN_RE = /\(unknown chord\)/g;

export const paintDiagram: LinePainter = (line) =>
    line
        .split(MARKERS.finger)
        .join(chalk.cyan(MARKERS.finger))
        .replace(UNKNOWN_RE, (m) => chalk.red(m));

/** Greedy word wrap; words longer than `width` are cut. */
export function wrapText(text: string, width: number): string[] {
    if (width <= 0) return [];
    if (text.length <= width) return [text];
    const out: string[] = [];
    let line = "";
    for (const word of text.split(" ")) {
        const next = line ? `${line} ${word}` : word;
        if (next.length <= width) {
            line = next;
            continue;
        }
        if (line) out.push(line);
        line = word;
        while (line.length > width) {
            out.push(line.slice(0, width));
            line = line.slice(width);
        }
    }
    if (line) out.push(line);
    return out;
}

/**
 * Interactive front end. Owns the input buffer and the current state;
 * every edit re-runs the whole render pipeline, every `render()` redraws
 * the whole screen through the writer.
 */
export class App {
    private _state: AppState = "splash";
    private _windowMode: WindowMode;
    private _result: RenderResult;

    private readonly _title: Label;
    private readonly _status: Label;
    private readonly _input: ChordInput;
    private readonly _panel: Panel;
    private readonly _help: Panel;
    private readonly _footer: Command;

    constructor(private readonly options: AppOptions) {
        const { writer } = options;
        const { columns } = options.size();
        this._windowMode = options.windowMode ?? "per-chord";

        this._title = new Label(writer, "ukegrid · ukulele chord diagrams", "yellow");
        this._status = new Label(writer, "", "gray");
        this._input = new ChordInput(writer, columns, "C, Am, F, G", () => {
            this._refresh();
            this._panel.scrollToTop();
        });
        this._panel = new Panel(writer, "Diagrams", columns, 3, "gray", paintDiagram);
        this._help = new Panel(writer, "Help", columns, 3, "yellow");
        this._footer = new Command(writer, [
            { keys: ["?"], label: "help" },
            { keys: ["up", "down"], label: "scroll" },
            { keys: ["tab"], label: "shared frets" },
            { keys: ["escape"], label: "quit" },
        ]);
        this._result = this._compute();
    }

    get state(): AppState {
        return this._state;
    }
    get windowMode(): WindowMode {
        return this._windowMode;
    }
    get result(): RenderResult {
        return this._result;
    }
    get input(): string {
        return this._input.getValue();
    }

    /** Returns false when the user asked to quit. */
    handleKey(key: readline.Key): boolean {
        if (key.name === "resize") return true;

        switch (this._state) {
            case "splash":
                this._state = "input";
                return this.handleKey(key);
            case "help":
                return this._handleHelpKey(key);
            default:
                return this._handleEditKey(key);
        }
    }

    private _handleHelpKey(key: readline.Key): boolean {
        if (key.name === "escape" || key.sequence === "?") {
            this._state = this._resolvedState();
        } else if (key.name === "up") {
            this._help.scrollBy(-1);
        } else if (key.name === "down") {
            this._help.scrollBy(1);
        }
        return true;
    }

    private _handleEditKey(key: readline.Key): boolean {
        const n = key.name;

        if (key.sequence === "?") {
            this._state = "help";
            this._help.scrollToTop();
        } else if (n === "escape") {
            return false;
        } else if (n === "up" || n === "down") {
            this._panel.scrollBy(n === "up" ? -1 : 1);
        } else if (n === "pageup" || n === "pagedown") {
            const page = this._panel.innerHeight();
            this._panel.scrollBy(n === "pageup" ? -page : page);
        } else if (n === "tab") {
            this._windowMode =
                this._windowMode === "shared" ? "per-chord" : "shared";
            this._refresh();
        } else {
            this._input.handleKey(key);
        }
        return true;
    }

    private _resolvedState(): AppState {
        return this._result.chords.length > 0 ? "diagrams" : "input";
    }

    private _compute(): RenderResult {
        return renderChordSheet(this._input.getValue(), this.options.table, {
            width: this._panel.innerWidth(),
            windowMode: this._windowMode,
        });
    }

    private _refresh(): void {
        this._result = this._compute();
        if (this._state === "input" || this._state === "diagrams")
            this._state = this._resolvedState();
    }

    private _statusText(): string {
        const { chords, unknown } = this._result;
        const parts: string[] = [];
        if (chords.length > 0)
            parts.push(`${chords.length} chord${chords.length === 1 ? "" : "s"}`);
        if (unknown.length > 0) parts.push(`not found: ${unknown.join(", ")}`);
        if (this._windowMode === "shared") parts.push("shared fret range");
        return parts.join(" · ");
    }

    private _panelContent(): readonly string[] {
        if (this._state === "splash") return splashLines(this._panel.innerWidth());
        if (this._result.tokens.length === 0) return EMPTY_PROMPT;
        return this._result.frame.lines;
    }

    // ── Rendering ─────────────────────────────────────────────────────────────

    render(): void {
        const { columns, rows } = this.options.size();

        this._input.setWidth(columns);
        this._panel.resize(columns, Math.max(3, rows - 4));
        this._result = this._compute();

        this._title.renderLine(0, 1, 1, columns);
        this._input.renderLine(0, 2, 1, columns);
        this._status.setText(this._statusText());
        this._status.renderLine(0, 3, 1, columns);

        this._panel.setContent(this._panelContent());
        this._panel.renderAt(4, 1, columns);
        this._footer.renderLine(0, rows, 1, columns);

        if (this._state === "help") this._renderHelp(columns, rows);
    }

    private _renderHelp(columns: number, rows: number): void {
        const w = Math.max(12, columns - 10);
        const h = Math.max(5, rows - 6);
        this._help.resize(w, h);
        this._help.setContent(
            HELP_TEXT.flatMap((line) =>
                line ? wrapText(line, this._help.innerWidth()) : [""],
            ),
        );
        const row = Math.floor((rows - h) / 2) + 1;
        const col = Math.floor((columns - w) / 2) + 1;
        this._help.renderAt(row, col, w);
    }
}
