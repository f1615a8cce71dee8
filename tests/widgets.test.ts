import type * as readline from "readline";
import { describe, expect, it, vi } from "vitest";
import { BufferWriter } from "../src/terminal";
import { ChordInput, Command, Label, Panel, ScrollState } from "../src/widgets";

const char = (ch: string): readline.Key => ({ sequence: ch, name: ch.toLowerCase() });

describe("ScrollState", () => {
    it("keeps a cursor inside the viewport", () => {
        const scroll = new ScrollState();
        scroll.clampHorizontal(12, 10);
        expect(scroll.x).toBe(3);
        scroll.clampHorizontal(1, 10);
        expect(scroll.x).toBe(1);
    });

    it("clamps vertical offsets", () => {
        const scroll = new ScrollState();
        scroll.setY(7, 4);
        expect(scroll.y).toBe(4);
        scroll.setY(-2, 4);
        expect(scroll.y).toBe(0);
    });
});

describe("ChordInput", () => {
    it("edits at the cursor and reports every change", () => {
        const onChange = vi.fn();
        const input = new ChordInput(new BufferWriter(20, 1), 20, "", onChange);

        for (const ch of "C, Am") input.handleKey(char(ch));
        expect(input.getValue()).toBe("C, Am");
        expect(onChange).toHaveBeenCalledTimes(5);
        expect(onChange).toHaveBeenLastCalledWith("C, Am");

        input.handleKey({ name: "backspace" });
        input.handleKey({ name: "left" });
        input.handleKey(char("B"));
        expect(input.getValue()).toBe("C, BA");
        input.handleKey(char("x"));
        expect(input.getValue()).toBe("C, BxA");

        input.handleKey({ name: "home" });
        input.handleKey({ name: "delete" });
        expect(input.getValue()).toBe(", BxA");

        input.handleKey({ name: "u", ctrl: true, sequence: "\x15" });
        expect(input.getValue()).toBe("");
        expect(onChange).toHaveBeenLastCalledWith("");
    });

    it("leaves non-editing keys to its owner", () => {
        const input = new ChordInput(new BufferWriter(20, 1), 20);
        expect(input.handleKey({ name: "return", sequence: "\r" })).toBe(false);
        expect(input.handleKey({ name: "escape", sequence: "\x1b" })).toBe(false);
        expect(input.handleKey({ name: "tab", sequence: "\t" })).toBe(false);
        expect(input.getValue()).toBe("");
    });

    it("draws the value between brackets", () => {
        const writer = new BufferWriter(20, 1);
        const input = new ChordInput(writer, 10);
        for (const ch of "Am") input.handleKey(char(ch));
        input.renderLine(0, 1, 1, 20);
        expect(writer.line(1)).toBe("[Am      ]");
    });

    it("scrolls so the cursor stays visible", () => {
        const writer = new BufferWriter(20, 1);
        const input = new ChordInput(writer, 8);
        for (const ch of "C, Am, F") input.handleKey(char(ch));
        input.renderLine(0, 1, 1, 20);
        expect(writer.line(1)).toBe("[Am, F ]");
    });

    it("keeps wide characters inside the brackets", () => {
        const writer = new BufferWriter(20, 1);
        const input = new ChordInput(writer, 8);
        for (const ch of "和和和和") input.handleKey(char(ch));
        input.renderLine(0, 1, 1, 20);
        expect(writer.line(1)).toBe("[和和  ]");
    });

    it("draws the placeholder when empty", () => {
        const writer = new BufferWriter(20, 1);
        new ChordInput(writer, 12, "C, G").renderLine(0, 1, 1, 20);
        expect(writer.line(1)).toBe("[ C, G     ]");
    });
});

describe("Label", () => {
    it("truncates long text", () => {
        const writer = new BufferWriter(20, 1);
        new Label(writer, "hello world").renderLine(0, 1, 1, 8);
        expect(writer.line(1)).toBe("hello ..");
    });

    it("truncates by columns", () => {
        const writer = new BufferWriter(20, 1);
        new Label(writer, "not found: 和和和和").renderLine(0, 1, 1, 16);
        expect(writer.line(1)).toBe("not found: 和..");
    });

    it("keeps braces in the text", () => {
        const writer = new BufferWriter(20, 1);
        new Label(writer, "not found: {red x}").renderLine(0, 1, 1, 20);
        expect(writer.line(1)).toBe("not found: {red x}");
    });

    it("overwrites what was there before", () => {
        const writer = new BufferWriter(20, 1);
        const label = new Label(writer, "a long label");
        label.renderLine(0, 1, 1, 20);
        label.setText("short");
        label.renderLine(0, 1, 1, 20);
        expect(writer.line(1)).toBe("short");
    });
});

describe("Command", () => {
    const hints = [
        { keys: ["?"], label: "help" },
        { keys: ["up", "down"], label: "scroll" },
        { keys: ["escape"], label: "quit" },
    ];

    it("renders key symbols and labels", () => {
        const writer = new BufferWriter(40, 1);
        const command = new Command(writer, hints);
        command.renderLine(0, 1, 1, 40);
        expect(writer.line(1)).toBe("? help  ↑/↓ scroll  ⎋ quit");
    });

    it("stops at the available width", () => {
        const writer = new BufferWriter(40, 1);
        new Command(writer, hints).renderLine(0, 1, 1, 8);
        expect(writer.line(1)).toBe("? help");
    });
});

describe("Panel", () => {
    it("draws a titled box and clips content", () => {
        const writer = new BufferWriter(12, 4);
        const panel = new Panel(writer, "Box", 10, 4);
        panel.setContent(["hello", "world!!!!!!"]);
        panel.renderAt(1, 1, 10);
        expect(writer.lines()).toEqual([
            "┌─Box────┐",
            "│ hello  │",
            "│ world! │",
            "└────────┘",
        ]);
    });

    it("scrolls and shows a scrollbar when content overflows", () => {
        const writer = new BufferWriter(10, 4);
        const panel = new Panel(writer, "Box", 10, 4);
        panel.setContent(["1", "2", "3", "4", "5"]);
        panel.scrollBy(10);
        expect(panel.scrollY).toBe(3);
        panel.renderAt(1, 1, 10);
        expect(writer.line(2)).toBe("│ 4     ║│");
        expect(writer.line(3)).toBe("│ 5     ┃│");

        panel.scrollToTop();
        expect(panel.scrollY).toBe(0);
    });

    it("clips wide characters by columns so the border stays put", () => {
        const writer = new BufferWriter(10, 3);
        const panel = new Panel(writer, "", 10, 3);
        panel.setContent(["和和和和"]);
        panel.renderAt(1, 1, 10);
        expect(writer.line(2)).toBe("│ 和和和 │");

        panel.setContent(["a和和和"]);
        panel.renderAt(1, 1, 10);
        expect(writer.line(2)).toBe("│ a和和  │");
    });

    it("paints content after clipping", () => {
        const writer = new BufferWriter(10, 3);
        const paint = vi.fn((s: string) => s.toUpperCase());
        const panel = new Panel(writer, "", 10, 3, "gray", paint);
        panel.setContent(["abcdefghij"]);
        panel.renderAt(1, 1, 10);
        expect(paint).toHaveBeenCalledWith("abcdef");
        expect(writer.line(2)).toBe("│ ABCDEF │");
    });
});
