import chalk from "chalk";
import { paintDiagram } from "./app";
import type { ChordTable } from "./chords";
import { renderChordSheet, type WindowMode } from "./pipeline";

export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "UsageError";
    }
}

export type CliCommand =
    | { kind: "interactive"; windowMode: WindowMode }
    | { kind: "print"; input: string; windowMode: WindowMode; width?: number }
    | { kind: "list" }
    | { kind: "help" };

export const USAGE = `Usage: ukegrid [options] [chord...]

Without chords, opens the interactive chord viewer.
With chords (comma or space separated), prints their diagrams and exits.

Options:
  --shared       one fret range for every diagram
  --width <n>    layout width for printed diagrams
  --list         print the known chord names
  -h, --help     show this message

Examples:
  ukegrid
  ukegrid C Am F G
  ukegrid "Dm7, G7, Cmaj7" --shared`;

function parseWidth(value: string | undefined): number {
    if (value === undefined) throw new UsageError("--width needs a value");
    if (!/^\d+$/.test(value) || Number(value) < 1)
        throw new UsageError(`--width expects a positive integer, got "${value}"`);
    return Number(value);
}

export function parseArgs(argv: readonly string[]): CliCommand {
    const chords: string[] = [];
    let windowMode: WindowMode = "per-chord";
    let width: number | undefined;
    let list = false;

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i] ?? "";
        if (arg === "-h" || arg === "--help") return { kind: "help" };
        if (arg === "--list") list = true;
        else if (arg === "--shared") windowMode = "shared";
        else if (arg === "--width") width = parseWidth(argv[++i]);
        else if (arg.startsWith("--width=")) width = parseWidth(arg.slice(8));
        else if (arg.startsWith("-") && arg.length > 1)
            throw new UsageError(`unknown option "${arg}"`);
        else chords.push(arg);
    }

    if (list) return { kind: "list" };
    if (chords.length === 0) {
        if (width !== undefined)
            throw new UsageError("--width only applies when printing chords");
        return { kind: "interactive", windowMode };
    }
    const input = chords.join(",");
    return width === undefined
        ? { kind: "print", input, windowMode }
        : { kind: "print", input, windowMode, width };
}

/** --width, else the terminal, else $COLUMNS, else 80. */
export function resolveWidth(
    flag: number | undefined,
    columns: number | undefined,
    env: NodeJS.ProcessEnv = process.env,
): number {
    if (flag !== undefined) return flag;
    if (columns) return columns;
    const fromEnv = Number(env.COLUMNS);
    return Number.isInteger(fromEnv) && fromEnv > 0 ? fromEnv : 80;
}

export interface PrintResult {
    text: string;
    unknown: string[];
}

export function printChords(
    input: string,
    table: ChordTable,
    width: number,
    windowMode: WindowMode = "per-chord",
): PrintResult {
    const { frame, unknown } = renderChordSheet(input, table, {
        width,
        windowMode,
    });
    return {
        text: frame.lines.map((l) => paintDiagram(l.trimEnd())).join("\n"),
        unknown,
    };
}

export interface CliIO {
    out(text: string): void;
    err(text: string): void;
    columns?: number;
}

/** Runs a non-interactive command; returns the process exit code. */
export function execute(
    command: Exclude<CliCommand, { kind: "interactive" }>,
    table: ChordTable,
    io: CliIO,
): number {
    switch (command.kind) {
        case "help":
            io.out(USAGE);
            return 0;
        case "list":
            io.out(table.names().join("\n"));
            return 0;
        case "print": {
            const width = resolveWidth(command.width, io.columns);
            const { text, unknown } = printChords(
                command.input,
                table,
                width,
                command.windowMode,
            );
            if (text) io.out(text);
            if (unknown.length > 0) {
                io.err(chalk.red(`chord not found: ${unknown.join(", ")}`));
                return 1;
            }
            return 0;
        }
    }
}
