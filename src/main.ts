#!/usr/bin/env node
import * as readline from "readline";
import chalk from "chalk";
import { App } from "./app";
import { ChordDataError, defaultChordTable, type ChordTable } from "./chords";
import { execute, parseArgs, USAGE, UsageError } from "./cli";
import type { WindowMode } from "./pipeline";
import { Cursor, Event, Screen, TerminalWriter } from "./terminal";

function runInteractive(table: ChordTable, windowMode: WindowMode): void {
    if (!process.stdin.isTTY || !process.stdout.isTTY) {
        throw new UsageError(
            "the interactive viewer needs a terminal; pass chord names to print them",
        );
    }

    const screen = new Screen();
    const writer = new TerminalWriter();
    const app = new App({ table, writer, size: () => writer.size(), windowMode });

    const restore = () => {
        screen.exit();
        Cursor.show();
    };
    const quit = () => {
        restore();
        process.exit(0);
    };
    process.on("exit", restore);

    screen.enter();
    process.stdin.setRawMode(true);
    Cursor.hide();
    app.render();

    const event = new Event(process, quit);
    event.add({
        name: "main",
        next(key: readline.Key) {
            if (!app.handleKey(key)) return quit();
            if (key.name === "resize") screen.clear();
            app.render();
        },
    });
    event.setup();
}

function main(argv: string[]): void {
    try {
        const command = parseArgs(argv);
        if (command.kind === "help") {
            console.log(USAGE);
            return;
        }

        const table = defaultChordTable();
        if (command.kind === "interactive") {
            runInteractive(table, command.windowMode);
            return;
        }
        process.exitCode = execute(command, table, {
            out: (text) => console.log(text),
            err: (text) => console.error(text),
            columns: process.stdout.isTTY ? process.stdout.columns : undefined,
        });
    } catch (err) {
        if (err instanceof UsageError) {
            console.error(chalk.red(`error: ${err.message}`));
            console.error(USAGE);
            process.exitCode = 2;
        } else if (err instanceof ChordDataError) {
            console.error(chalk.red(`error: ${err.message}`));
            process.exitCode = 1;
        } else {
            throw err;
        }
    }
}

main(process.argv.slice(2));
