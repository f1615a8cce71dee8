import { describe, expect, it } from "vitest";
import { defaultChordTable } from "../src/chords";
import {
    USAGE,
    UsageError,
    execute,
    parseArgs,
    printChords,
    resolveWidth,
    type CliIO,
} from "../src/cli";

const table = defaultChordTable();

function capture(columns?: number): CliIO & { stdout: string[]; stderr: string[] } {
    const stdout: string[] = [];
    const stderr: string[] = [];
    return {
        stdout,
        stderr,
        columns,
        out: (text) => stdout.push(text),
        err: (text) => stderr.push(text),
    };
}

describe("parseArgs", () => {
    it("starts the viewer without chords", () => {
        expect(parseArgs([])).toEqual({ kind: "interactive", windowMode: "per-chord" });
        expect(parseArgs(["--shared"])).toEqual({ kind: "interactive", windowMode: "shared" });
    });

    it("joins positional chords into one input", () => {
        expect(parseArgs(["C", "Am,F", "G"])).toEqual({
            kind: "print",
            input: "C,Am,F,G",
            windowMode: "per-chord",
        });
    });

    it("reads options", () => {
        expect(parseArgs(["--shared", "--width", "40", "C"])).toEqual({
            kind: "print",
            input: "C",
            windowMode: "shared",
            width: 40,
        });
        expect(parseArgs(["C", "--width=60"])).toEqual({
            kind: "print",
            input: "C",
            windowMode: "per-chord",
            width: 60,
        });
        expect(parseArgs(["--list"])).toEqual({ kind: "list" });
        expect(parseArgs(["C", "-h"])).toEqual({ kind: "help" });
    });

    it("rejects bad usage", () => {
        expect(() => parseArgs(["--bogus"])).toThrow(UsageError);
        expect(() => parseArgs(["--width"])).toThrow("--width needs a value");
        expect(() => parseArgs(["--width=0", "C"])).toThrow(
            '--width expects a positive integer, got "0"',
        );
        expect(() => parseArgs(["--width", "40"])).toThrow(
            "--width only applies when printing chords",
        );
    });
});

describe("resolveWidth", () => {
    it("prefers the flag, then the terminal, then $COLUMNS", () => {
        expect(resolveWidth(50, 120, { COLUMNS: "100" })).toBe(50);
        expect(resolveWidth(undefined, 120, { COLUMNS: "100" })).toBe(120);
        expect(resolveWidth(undefined, undefined, { COLUMNS: "100" })).toBe(100);
        expect(resolveWidth(undefined, undefined, { COLUMNS: "wide" })).toBe(80);
        expect(resolveWidth(undefined, undefined, {})).toBe(80);
    });
});

describe("printChords", () => {
    it("prints one diagram without trailing blanks", () => {
        expect(printChords("Am", table, 80)).toEqual({
            text: [
                "Am",
                "      2   3   4   5   6",
                "A O |---|---|---|---|---|",
                "E O |---|---|---|---|---|",
                "C O |---|---|---|---|---|",
                "G   |-●-|---|---|---|---|",
            ].join("\n"),
            unknown: [],
        });
    });
});

describe("execute", () => {
    it("prints diagrams and succeeds when every chord is known", () => {
        const io = capture(100);
        expect(execute({ kind: "print", input: "C,Am", windowMode: "per-chord" }, table, io)).toBe(0);
        expect(io.stdout).toHaveLength(1);
        expect(io.stdout[0]?.split("\n")[0]).toBe("C".padEnd(25) + "  " + "Am");
        expect(io.stderr).toEqual([]);
    });

    it("fails when a chord is unknown", () => {
        const io = capture(100);
        expect(execute({ kind: "print", input: "C,Hm", windowMode: "per-chord" }, table, io)).toBe(1);
        expect(io.stderr).toEqual(["chord not found: Hm"]);
    });

    it("wraps at the requested width", () => {
        const io = capture(200);
        execute({ kind: "print", input: "C,Am,F", windowMode: "per-chord", width: 30 }, table, io);
        expect(io.stdout[0]?.split("\n")).toHaveLength(20);
    });

    it("lists chord names and prints usage", () => {
        const io = capture();
        expect(execute({ kind: "list" }, table, io)).toBe(0);
        expect(io.stdout[0]?.split("\n")).toHaveLength(442);
        expect(execute({ kind: "help" }, table, io)).toBe(0);
        expect(io.stdout[1]).toBe(USAGE);
    });
});
