import type { DiagramBlock } from "./diagram";
import { displayWidth, padColumns } from "./text";

export interface GridOptions {
    /** Spaces between blocks in a row. */
    hGap: number;
    /** Blank lines between rows. */
    vGap: number;
}

export const DEFAULT_GRID: GridOptions = { hGap: 2, vGap: 1 };

/** Composed text of a whole grid; lines are as wide (in columns) as their row. */
export interface Frame {
    readonly width: number;
    readonly lines: readonly string[];
}

/**
 * Greedy left-to-right packing of block widths into rows of at most
 * `available` columns. A block wider than `available` gets a row of its own.
 */
export function packRows(
    widths: readonly number[],
    available: number,
    hGap: number,
): number[][] {
    const rows: number[][] = [];
    let cur: number[] = [];
    let used = 0;

    widths.forEach((w, i) => {
        const needed = cur.length === 0 ? w : used + hGap + w;
        if (needed > available && cur.length > 0) {
            rows.push(cur);
            cur = [i];
            used = w;
        } else {
            cur.push(i);
            used = needed;
        }
    });
    if (cur.length > 0) rows.push(cur);
    return rows;
}

export function layoutGrid(
    blocks: readonly DiagramBlock[],
    availableWidth: number,
    options: Partial<GridOptions> = {},
): Frame {
    const { hGap, vGap } = { ...DEFAULT_GRID, ...options };
    const rows = packRows(
        blocks.map((b) => b.width),
        availableWidth,
        hGap,
    );

    const lines: string[] = [];
    rows.forEach((row, r) => {
        const members = row.flatMap((i) => blocks[i] ?? []);
        const height = members.reduce((m, b) => Math.max(m, b.lines.length), 0);

        if (r > 0) for (let g = 0; g < vGap; g++) lines.push("");
        for (let li = 0; li < height; li++) {
            lines.push(
                members
                    .map((b) => padColumns(b.lines[li] ?? "", b.width))
                    .join(" ".repeat(hGap)),
            );
        }
    });

    return {
        width: lines.reduce((m, l) => Math.max(m, displayWidth(l)), 0),
        lines,
    };
}
