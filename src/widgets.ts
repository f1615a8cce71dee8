import * as readline from "readline";
import chalk from "chalk";
import type { ITerminalWriter } from "./terminal";
import { displayWidth, padColumns, sliceColumns } from "./text";

// ══════════════════════════════════════════════════════════════════════════════
//  § 1. STATE HELPERS
// ══════════════════════════════════════════════════════════════════════════════

// ── ScrollState  (2-D scroll offsets shared by Panel & ChordInput) ───────────

export class ScrollState {
    private _x = 0;
    private _y = 0;

    get x(): number {
        return this._x;
    }
    get y(): number {
        return this._y;
    }

    setY(value: number, max: number): void {
        this._y = Math.max(0, Math.min(value, max));
    }

    /** Ensure a cursor column stays within a viewport of `viewportWidth`. */
    clampHorizontal(cursor: number, viewportWidth: number): void {
        if (cursor < this._x) this._x = cursor;
        if (cursor >= this._x + viewportWidth)
            this._x = cursor - viewportWidth + 1;
        this._x = Math.max(0, this._x);
    }

    reset(): void {
        this._x = 0;
        this._y = 0;
    }
}

// ══════════════════════════════════════════════════════════════════════════════
//  § 2. WIDGET BASE
// ══════════════════════════════════════════════════════════════════════════════

/**
 * A widget is a stack of lines. The owner asks for each line in turn and
 * tells it where to draw and how many columns it may use; a widget always
 * fills those columns so a redraw overwrites the previous frame.
 */
export abstract class Widget {
    constructor(protected readonly writer: ITerminalWriter) {}

    abstract lineCount(): number;

    abstract renderLine(
        lineIndex: number,
        termRow: number,
        termCol: number,
        maxWidth: number,
    ): void;

    renderAt(row: number, col: number, maxWidth: number): void {
        for (let li = 0; li < this.lineCount(); li++)
            this.renderLine(li, row + li, col, maxWidth);
    }
}

// ══════════════════════════════════════════════════════════════════════════════
//  § 3. DISPLAY WIDGETS
// ══════════════════════════════════════════════════════════════════════════════

// ── Label ────────────────────────────────────────────────────────────────────

export class Label extends Widget {
    constructor(
        writer: ITerminalWriter,
        private text: string,
        private color = "white",
    ) {
        super(writer);
    }

    lineCount() {
        return 1;
    }

    setText(text: string): void {
        this.text = text;
    }

    renderLine(_li: number, row: number, col: number, maxWidth: number): void {
        this.writer.moveTo(row, col);
        if (displayWidth(this.text) > maxWidth) {
            this.writer.write(
                chalk.keyword(this.color)(sliceColumns(this.text, maxWidth - 2)) +
                    chalk.gray(".."),
            );
        } else {
            this.writer.write(
                chalk.keyword(this.color)(padColumns(this.text, maxWidth)),
            );
        }
    }
}

// ── Command  (key hint such as "⎋ quit") ─────────────────────────────────────

const KEY_SYMBOLS: Record<string, string> = {
    backspace: "⌫",
    ctrl: "⌃",
    enter: "↵",
    escape: "⎋",
    tab: "⇥",
    up: "↑",
    down: "↓",
};

type SegColour = "cyan" | "gray" | "white";

interface Seg {
    plain: string;
    colour: SegColour;
}

export interface KeyHint {
    label: string;
    keys: string[];
}

export class Command extends Widget {
    constructor(
        writer: ITerminalWriter,
        private hints: KeyHint[],
    ) {
        super(writer);
    }

    lineCount() {
        return 1;
    }

    private _segs(): Seg[] {
        const out: Seg[] = [];
        this.hints.forEach(({ label, keys }, h) => {
            if (h > 0) out.push({ plain: "  ", colour: "gray" });
            keys.forEach((key, i) => {
                const lo = key.toLowerCase();
                out.push({
                    plain: KEY_SYMBOLS[lo] ?? key,
                    colour: lo in KEY_SYMBOLS ? "cyan" : "gray",
                });
                if (i < keys.length - 1) out.push({ plain: "/", colour: "gray" });
            });
            out.push({ plain: " " + label, colour: "white" });
        });
        return out;
    }

    renderLine(_li: number, row: number, col: number, maxWidth: number): void {
        let used = 0;
        let out = "";

        for (const seg of this._segs()) {
            const fits = maxWidth - used;
            if (seg.plain.length > fits) {
                const cut = seg.plain.slice(0, Math.max(0, fits - 2));
                if (cut) out += chalk`{${seg.colour} ${cut}}`;
                if (fits >= 2) out += chalk`{gray ..}`;
                used = maxWidth;
                break;
            }
            out += chalk`{${seg.colour} ${seg.plain}}`;
            used += seg.plain.length;
        }

        this.writer.moveTo(row, col);
        this.writer.write(out + " ".repeat(Math.max(0, maxWidth - used)));
    }
}

// ── Panel  (titled box with vertically scrolling text) ───────────────────────

export type LinePainter = (plain: string) => string;

export class Panel extends Widget {
    private _lines: readonly string[] = [];
    private readonly _scroll = new ScrollState();

    constructor(
        writer: ITerminalWriter,
        private title: string,
        private width: number,
        private height: number,
        private borderColor = "gray",
        private readonly paint: LinePainter = (s) => s,
    ) {
        super(writer);
    }

    lineCount() {
        return this.height;
    }

    /** Columns available to content: "│ " + text + scrollbar + "│". */
    innerWidth(): number {
        return Math.max(0, this.width - 4);
    }
    innerHeight(): number {
        return Math.max(0, this.height - 2);
    }

    get scrollY(): number {
        return this._scroll.y;
    }

    private _maxScrollY(): number {
        return Math.max(0, this._lines.length - this.innerHeight());
    }

    resize(width: number, height: number): void {
        this.width = width;
        this.height = height;
        this._scroll.setY(this._scroll.y, this._maxScrollY());
    }

    setContent(lines: readonly string[]): void {
        this._lines = lines;
        this._scroll.setY(this._scroll.y, this._maxScrollY());
    }

    scrollBy(delta: number): void {
        this._scroll.setY(this._scroll.y + delta, this._maxScrollY());
    }

    scrollToTop(): void {
        this._scroll.reset();
    }

    renderLine(li: number, row: number, col: number, maxWidth: number): void {
        const w = Math.min(this.width, maxWidth);
        if (w < 4) return;
        const b = (s: string) => chalk.keyword(this.borderColor)(s);

        this.writer.moveTo(row, col);

        if (li === 0) {
            const t = this.title.slice(0, Math.max(0, w - 3));
            const pad = "─".repeat(Math.max(0, w - 3 - t.length));
            this.writer.write(b("┌─") + chalk.white.bold(t) + b(pad + "┐"));
            return;
        }
        if (li === this.height - 1) {
            this.writer.write(b("└" + "─".repeat(w - 2) + "┘"));
            return;
        }

        const iw = w - 4;
        const ih = this.innerHeight();
        const msY = this._maxScrollY();
        const vThumbH =
            msY > 0
                ? Math.max(1, Math.round((ih / this._lines.length) * ih))
                : 0;
        const vThumbTop =
            msY > 0 ? Math.round((this._scroll.y / msY) * (ih - vThumbH)) : 0;
        const vis = li - 1;
        const isThumb = msY > 0 && vis >= vThumbTop && vis < vThumbTop + vThumbH;
        const sbChar =
            msY > 0 ? (isThumb ? chalk.white("┃") : chalk.gray("║")) : " ";

        const text = sliceColumns(this._lines[this._scroll.y + vis] ?? "", iw);
        this.writer.write(
            b("│") + " " + this.paint(text) + " ".repeat(iw - displayWidth(text)) + sbChar + b("│"),
        );
    }
}

// ══════════════════════════════════════════════════════════════════════════════
//  § 4. CHORD INPUT  (single-line editor)
// ══════════════════════════════════════════════════════════════════════════════

export class ChordInput extends Widget {
    private _value = "";
    private _cursor = 0;
    private readonly _scroll = new ScrollState();

    constructor(
        writer: ITerminalWriter,
        private width: number,
        private placeholder = "",
        private onChange?: (value: string) => void,
    ) {
        super(writer);
    }

    lineCount() {
        return 1;
    }

    getValue() {
        return this._value;
    }
    setWidth(width: number) {
        this.width = width;
        this._clampScroll();
    }

    private _edit(value: string, cursor: number): void {
        this._value = value;
        this._cursor = cursor;
        this.onChange?.(this._value);
    }

    /** Returns false for keys that are not line-editing keys. */
    handleKey(key: readline.Key): boolean {
        const n = key.name;
        const v = this._value;
        const c = this._cursor;

        if (key.ctrl && n === "u") {
            if (v.length > 0) this._edit("", 0);
        } else if (n === "left") {
            this._cursor = Math.max(0, c - 1);
        } else if (n === "right") {
            this._cursor = Math.min(v.length, c + 1);
        } else if (n === "home") {
            this._cursor = 0;
        } else if (n === "end") {
            this._cursor = v.length;
        } else if (n === "backspace") {
            if (c > 0) this._edit(v.slice(0, c - 1) + v.slice(c), c - 1);
        } else if (n === "delete") {
            if (c < v.length) this._edit(v.slice(0, c) + v.slice(c + 1), c);
        } else if (
            n !== "return" &&
            n !== "escape" &&
            n !== "tab" &&
            key.sequence &&
            !key.ctrl &&
            !key.meta &&
            key.sequence.length === 1
        ) {
            this._edit(v.slice(0, c) + key.sequence + v.slice(c), c + 1);
        } else {
            return false;
        }

        this._clampScroll();
        return true;
    }

    private _clampScroll(): void {
        this._scroll.clampHorizontal(this._cursor, Math.max(1, this.width - 2));
    }

    renderLine(_li: number, row: number, col: number, maxWidth: number): void {
        const w = Math.min(this.width, maxWidth);
        const inner = Math.max(0, w - 2);

        let content: string;
        if (!this._value.length) {
            content =
                chalk.bgWhite.black(" ") +
                chalk.gray(padColumns(sliceColumns(this.placeholder, inner - 1), inner - 1));
        } else {
            const at = this._value[this._cursor] ?? " ";
            const atWidth = Math.max(1, displayWidth(at));
            // The scroll offset counts characters; wide ones can still push the cursor out.
            let start = this._scroll.x;
            while (
                start < this._cursor &&
                displayWidth(this._value.slice(start, this._cursor)) + atWidth > inner
            )
                start++;
            const before = this._value.slice(start, this._cursor);
            const rest = Math.max(0, inner - displayWidth(before) - atWidth);
            const after = sliceColumns(this._value.slice(this._cursor + 1), rest);
            content =
                chalk.white(before) +
                chalk.bgWhite.black(at) +
                chalk.white(padColumns(after, rest));
        }

        this.writer.moveTo(row, col);
        this.writer.write(chalk.white("[") + content + chalk.white("]"));
    }
}
