import { displayWidth } from "./text";

export const SPLASH_ART: readonly string[] = [
    "     .-'''''-.",
    "   .'         '.  ___________________________________",
    "  /   .-'''-.   \\|    |    |    |    |    |    |    |=o",
    " |   /       \\   |----+----+----+----+----+----+----|=o",
    " |   \\       /   |----+----+----+----+----+----+----|=o",
    "  \\   '-...-'   /|____|____|____|____|____|____|____|=o",
    "   '.         .'",
    "     '-.....-'",
];

export const SPLASH_PROMPT: readonly string[] = [
    "ukegrid",
    "",
    "Type chords separated by commas, e.g.  C, Am, F, G",
    "Press ? for help",
];

/** Art and prompt, each block centred as a whole within `width`. */
export function splashLines(width: number): string[] {
    const centre = (block: readonly string[]) => {
        const w = block.reduce((m, l) => Math.max(m, displayWidth(l)), 0);
        const left = " ".repeat(Math.max(0, Math.floor((width - w) / 2)));
        return block.map((l) => (l ? left + l : l));
    };
    return [...centre(SPLASH_ART), "", ...SPLASH_PROMPT.map((l) => centre([l])[0] ?? "")];
}
