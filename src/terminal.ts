import * as readline from "readline";
import { displayWidth } from "./text";

// ══════════════════════════════════════════════════════════════════════════════
//  § 1. DRAW REGION
// ══════════════════════════════════════════════════════════════════════════════

/** Everything that draws depends on this interface, never on process.stdout. */
export interface ITerminalWriter {
    moveTo(row: number, col: number): void;
    write(text: string): void;
}

export interface TerminalSize {
    columns: number;
    rows: number;
}

// ══════════════════════════════════════════════════════════════════════════════
//  § 2. INFRASTRUCTURE
// ══════════════════════════════════════════════════════════════════════════════

/** ITerminalWriter backed by an output stream + ANSI cursor addressing. */
export class TerminalWriter implements ITerminalWriter {
    constructor(private readonly out: NodeJS.WriteStream = process.stdout) {}

    moveTo(row: number, col: number): void {
        this.out.write(`\x1b[${row};${col}H`);
    }
    write(text: string): void {
        this.out.write(text);
    }
    size(): TerminalSize {
        return { columns: this.out.columns || 80, rows: this.out.rows || 24 };
    }
}

const SGR = /\x1b\[[0-9;]*m/g;

/**
 * In-memory character grid. Rows and columns are 1-based like the ANSI
 * cursor and wide characters take two columns; text written past the right
 * edge is dropped, colour codes are discarded.
 */
export class BufferWriter implements ITerminalWriter {
    private readonly _cells: string[][];
    private _row = 1;
    private _col = 1;

    constructor(
        readonly columns: number,
        readonly rows: number,
    ) {
        this._cells = Array.from({ length: rows }, () =>
            new Array<string>(columns).fill(" "),
        );
    }

    moveTo(row: number, col: number): void {
        this._row = row;
        this._col = col;
    }

    write(text: string): void {
        const cells = this._cells[this._row - 1];
        for (const ch of text.replace(SGR, "")) {
            const width = Math.max(1, displayWidth(ch));
            if (cells && this._col >= 1 && this._col + width - 1 <= this.columns) {
                cells[this._col - 1] = ch;
                // A wide character covers the next cell too.
                if (width === 2) cells[this._col] = "";
            }
            this._col += width;
        }
    }

    size(): TerminalSize {
        return { columns: this.columns, rows: this.rows };
    }

    /** Row text with trailing blanks removed. */
    line(row: number): string {
        return (this._cells[row - 1] ?? []).join("").trimEnd();
    }

    lines(): string[] {
        return this._cells.map((_, i) => this.line(i + 1));
    }

    clear(): void {
        for (const cells of this._cells) cells.fill(" ");
    }
}

// ── Screen ───────────────────────────────────────────────────────────────────

export class Screen {
    private active = false;

    constructor(private readonly out: NodeJS.WriteStream = process.stdout) {}

    enter(): void {
        if (this.active) return;
        this.active = true;
        this.out.write("\x1b[?1049h\x1b[2J\x1b[H");
    }

    exit(): void {
        if (!this.active) return;
        this.active = false;
        this.out.write("\x1b[?1049l");
    }

    clear(): void {
        this.out.write("\x1b[2J\x1b[H");
    }
}

// ── Cursor ───────────────────────────────────────────────────────────────────

export class Cursor {
    static hide(out: NodeJS.WriteStream = process.stdout): void {
        out.write("\x1b[?25l");
    }
    static show(out: NodeJS.WriteStream = process.stdout): void {
        out.write("\x1b[?25h");
    }
}

// ── Event ────────────────────────────────────────────────────────────────────

export interface SubEvent {
    name: string;
    next(key: readline.Key): void;
}

/**
 * Keypress hub. Ctrl-C and termination signals always run `onExit`; every
 * other key is fanned out to the subscribers in registration order.
 */
export class Event {
    private readonly subEvents: SubEvent[] = [];

    constructor(
        private proc: NodeJS.Process,
        private onExit: () => void,
    ) {
        readline.emitKeypressEvents(proc.stdin);
        proc.stdin.resume();
    }

    setup(): void {
        this.proc.stdin.on("keypress", (_str: string | undefined, key?: readline.Key) => {
            if (!key) return;
            if (key.ctrl && key.name === "c") {
                this.onExit();
                return;
            }
            [...this.subEvents].forEach((e) => e.next(key));
        });
        (["SIGINT", "SIGTERM"] as const).forEach((sig) => {
            this.proc.on(sig, () => this.onExit());
        });
        this.proc.stdout.on("resize", () =>
            [...this.subEvents].forEach((e) => e.next({ name: "resize" })),
        );
    }

    add(sub: SubEvent): void {
        if (!this.subEvents.find((e) => e.name === sub.name))
            this.subEvents.push(sub);
    }
}
