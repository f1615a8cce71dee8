import { z } from "zod";
import dataset from "./data/chords.json";

// ══════════════════════════════════════════════════════════════════════════════
//  § 1. MODEL
// ══════════════════════════════════════════════════════════════════════════════

/** Standard re-entrant GCEA tuning, in the order positions are stored. */
export const STRING_NAMES = ["G", "C", "E", "A"] as const;

/** "muted", "open", or the fret number (≥ 1) a string is pressed at. */
export type Fret = "muted" | "open" | number;

export type Positions = readonly [Fret, Fret, Fret, Fret];

export interface Chord {
    readonly name: string;
    readonly positions: Positions;
}

export interface UnknownChord {
    readonly kind: "unknown-chord";
    readonly name: string;
}

export type LookupResult =
    | { readonly ok: true; readonly chord: Chord }
    | { readonly ok: false; readonly error: UnknownChord };

/** The bundled dataset is unusable. Raised once, at startup. */
export class ChordDataError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ChordDataError";
    }
}

// ══════════════════════════════════════════════════════════════════════════════
//  § 2. DATASET PARSING
// ══════════════════════════════════════════════════════════════════════════════

const chordNameSchema = z
    .string()
    .regex(/^[A-G][#b]?\S*$/, "chord names start with A-G and an optional #/b")
    .refine((name) => !name.includes(","), "chord names cannot contain ','");

const datasetSchema = z.record(chordNameSchema, z.array(z.string()).min(1));

export type ChordDataset = z.infer<typeof datasetSchema>;

function parseFret(token: string): Fret | undefined {
    if (token === "X" || token === "x") return "muted";
    if (!/^\d+$/.test(token)) return undefined;
    const n = Number(token);
    return n === 0 ? "open" : n;
}

/** Parses "0 2 3 2" / "X 0 1 3" into four positions. */
export function parsePositions(frets: string): Positions | undefined {
    const parsed = frets.trim().split(/\s+/).map(parseFret);
    const [g, c, e, a] = parsed;
    if (parsed.length !== 4 || g === undefined || c === undefined) return;
    if (e === undefined || a === undefined) return;
    return [g, c, e, a];
}

export function formatPositions(positions: Positions): string {
    return positions
        .map((f) => (f === "muted" ? "X" : f === "open" ? "0" : String(f)))
        .join(" ");
}

// ══════════════════════════════════════════════════════════════════════════════
//  § 3. TABLE
// ══════════════════════════════════════════════════════════════════════════════

const VARIANT_RE = /^(.+):([1-9]\d*)$/;

export class ChordTable {
    private constructor(
        private readonly _entries: ReadonlyMap<string, readonly Chord[]>,
    ) {}

    /** @throws ChordDataError when the dataset shape or any voicing is invalid. */
    static fromDataset(data: unknown): ChordTable {
        const result = datasetSchema.safeParse(data);
        if (!result.success) {
            const issue = result.error.issues[0];
            const where = issue?.path.join(".") || "(root)";
            throw new ChordDataError(
                `invalid chord dataset at ${where}: ${issue?.message ?? "unknown issue"}`,
            );
        }

        const entries = new Map<string, readonly Chord[]>();
        for (const [name, voicings] of Object.entries(result.data)) {
            const chords = voicings.map((frets, i): Chord => {
                const positions = parsePositions(frets);
                if (!positions) {
                    throw new ChordDataError(
                        `chord "${name}" voicing ${i + 1}: expected 4 fret values (X, 0 or a fret number), got "${frets}"`,
                    );
                }
                return Object.freeze({ name, positions });
            });
            entries.set(name, Object.freeze(chords));
        }
        return new ChordTable(entries);
    }

    get size(): number {
        return this._entries.size;
    }

    names(): string[] {
        return [...this._entries.keys()];
    }

    voicings(name: string): readonly Chord[] {
        return this._entries.get(name) ?? [];
    }

    /**
     * Exact, case-sensitive match. `name:n` picks the n-th voicing (1-based)
     * and names the result after the token.
     */
    lookup(name: string): LookupResult {
        const direct = this._entries.get(name)?.[0];
        if (direct) return { ok: true, chord: direct };

        const variant = VARIANT_RE.exec(name);
        if (variant) {
            const [, base = "", index = ""] = variant;
            const chord = this._entries.get(base)?.[Number(index) - 1];
            if (chord) return { ok: true, chord: { name, positions: chord.positions } };
        }
        return { ok: false, error: { kind: "unknown-chord", name } };
    }
}

let defaultTable: ChordTable | undefined;

/** The bundled table, built on first use and shared afterwards. */
export function defaultChordTable(): ChordTable {
    defaultTable ??= ChordTable.fromDataset(dataset);
    return defaultTable;
}
