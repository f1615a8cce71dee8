import stringWidth from "string-width";

/** Terminal columns taken by `text`; wide characters count twice, SGR codes not at all. */
export function displayWidth(text: string): number {
    return stringWidth(text);
}

/** Longest prefix of `text` that fits in `columns`. */
export function sliceColumns(text: string, columns: number): string {
    if (columns <= 0) return "";
    if (stringWidth(text) <= columns) return text;
    let out = "";
    let used = 0;
    for (const ch of text) {
        const w = stringWidth(ch);
        if (used + w > columns) break;
        out += ch;
        used += w;
    }
    return out;
}

/** Pads `text` with spaces to `columns`. */
export function padColumns(text: string, columns: number): string {
    return text + " ".repeat(Math.max(0, columns - stringWidth(text)));
}
