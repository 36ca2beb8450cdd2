/** ============================
 * View (Terminal Renderer & Audio)
 *
 * State in → side-effectful terminal writes out. All drawing is contained
 * here to keep the rest of the game pure.
 * ============================ */
import { renderables } from "./snapshot";
import { Viewport, type Camera, type Effect, type Hud, type State, type Vec2 } from "./types";
import { single } from "./util";

/** Anything stdout-like */
export type Sink = Readonly<{ write: (chunk: string) => unknown }>;

const CELL_W = Viewport.WORLD_WIDTH / Viewport.COLS;
const CELL_H = Viewport.WORLD_HEIGHT / Viewport.ROWS;

const GLYPH = { player: "@", gem: "*" } as const;

const ESC = "\x1b[";
const RED = `${ESC}91m`;
const RESET = `${ESC}0m`;

/**
 * Terminal cell of a world position, or null when outside the view.
 * World y points up, rows count down from the top.
 */
export const toCell = (
    camera: Camera,
    p: Vec2,
): { col: number; row: number } | null => {
    const col = Math.floor(
        (p.x - (camera.x - Viewport.WORLD_WIDTH / 2)) / CELL_W,
    );
    const row = Math.floor(
        (camera.y + Viewport.WORLD_HEIGHT / 2 - p.y) / CELL_H,
    );
    const inside =
        col >= 0 && col < Viewport.COLS && row >= 0 && row < Viewport.ROWS;
    return inside ? { col, row } : null;
};

/** Scene rows around the camera, one glyph per sprite */
export const drawScene = (s: State): string[] => {
    const camera = single(s.cameras, "camera");
    const cells = renderables(s).reduce<Map<number, string>>((acc, sprite) => {
        const cell = toCell(camera, sprite.position);
        return cell
            ? acc.set(cell.row * Viewport.COLS + cell.col, GLYPH[sprite.kind])
            : acc;
    }, new Map());
    return Array.from({ length: Viewport.ROWS }, (_, row) =>
        Array.from(
            { length: Viewport.COLS },
            (_, col) => cells.get(row * Viewport.COLS + col) ?? " ",
        ).join(""),
    );
};

/** HUD text at fixed anchors above the scene */
export const drawHud = (hud: Hud): string[] => [
    `Score: ${hud.score}`,
    `Health: ${hud.health}`,
    hud.banner,
];

/** Full frame as plain lines (no escape codes) */
export const drawFrame = (s: State): string[] => [
    ...drawHud(s.hud),
    `+${"-".repeat(Viewport.COLS)}+`,
    ...drawScene(s).map(line => `|${line}|`),
    `+${"-".repeat(Viewport.COLS)}+`,
];

export const render = (out: Sink): ((s: State) => void) => {
    return (s: State) => {
        const lines = drawFrame(s).map((line, i) =>
            i === 2 && line !== "" ? `${RED}${line}${RESET}` : line,
        );
        // Home the cursor and overwrite in place; clear each line's tail.
        out.write(`${ESC}H${lines.map(l => `${l}${ESC}K`).join("\n")}`);
    };
};

/** Audio stand-in: ring the terminal bell for each sound request */
export const play = (out: Sink): ((e: Effect) => void) => {
    return (e: Effect) => {
        if (e.kind === "playSound") out.write("\x07");
    };
};

/** Alternate screen on, cursor hidden; returns the matching teardown */
export const enterScreen = (out: Sink): (() => void) => {
    out.write(`${ESC}?1049h${ESC}?25l${ESC}2J`);
    return () => {
        out.write(`${ESC}?25h${ESC}?1049l`);
    };
};
