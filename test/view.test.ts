import { describe, it, expect } from "vitest";
import {
    type Effect,
    type State,
    drawFrame,
    drawScene,
    initialState,
    loadAssets,
    pathAssetServer,
    play,
    render,
    toCell,
} from "../src/main";

const assets = loadAssets(pathAssetServer);

const mkState = (over: Partial<State> = {}): State => ({
    ...initialState(42, assets),
    gems: [],
    ...over,
});

const recorder = () => {
    const chunks: string[] = [];
    return { chunks, sink: { write: (c: string) => chunks.push(c) } };
};

describe("toCell", () => {
    const camera = { x: 0, y: 0 };

    it("maps the camera centre to the middle cell", () => {
        expect(toCell(camera, { x: 0, y: 0 })).toEqual({ col: 32, row: 9 });
    });

    it("maps the top-left corner to the first cell", () => {
        expect(toCell(camera, { x: -640, y: 360 })).toEqual({ col: 0, row: 0 });
    });

    it("drops positions outside the view", () => {
        expect(toCell(camera, { x: 640, y: 0 })).toBeNull();
        expect(toCell(camera, { x: 0, y: -360 })).toBeNull();
    });

    it("follows the camera", () => {
        expect(toCell({ x: 200, y: 0 }, { x: 0, y: 0 })).toEqual({ col: 22, row: 9 });
    });
});

describe("drawScene", () => {
    it("draws the player and live gems", () => {
        const s = mkState({ gems: [{ id: 0, position: { x: 100, y: 40 } }] });
        const rows = drawScene(s);
        expect(rows).toHaveLength(18);
        rows.forEach(r => expect(r).toHaveLength(64));
        expect(rows[9]).toBe(`${" ".repeat(32)}@${" ".repeat(31)}`);
        expect(rows[8]).toBe(`${" ".repeat(37)}*${" ".repeat(26)}`);
    });

    it("paints the player over a gem in the same cell", () => {
        const s = mkState({ gems: [{ id: 0, position: { x: 1, y: -1 } }] });
        expect(drawScene(s)[9][32]).toBe("@");
    });
});

describe("drawFrame", () => {
    it("puts the HUD above a framed scene", () => {
        const lines = drawFrame(mkState());
        expect(lines.slice(0, 4)).toEqual([
            "Score: 0",
            "Health: 3/3",
            "",
            `+${"-".repeat(64)}+`,
        ]);
        expect(lines).toHaveLength(3 + 18 + 2);
        expect(lines[lines.length - 1]).toBe(`+${"-".repeat(64)}+`);
    });

    it("shows the banner once the run is over", () => {
        const s = mkState({
            phase: "GameOver",
            hud: { score: "3", health: "0/3", banner: "YOU DIED" },
        });
        expect(drawFrame(s).slice(0, 3)).toEqual(["Score: 3", "Health: 0/3", "YOU DIED"]);
    });
});

describe("render and play", () => {
    it("homes the cursor and clears each line tail", () => {
        const { chunks, sink } = recorder();
        render(sink)(mkState());
        expect(chunks).toHaveLength(1);
        expect(chunks[0].startsWith("\x1b[HScore: 0\x1b[K\nHealth: 3/3\x1b[K\n\x1b[K\n")).toBe(true);
    });

    it("colours the banner", () => {
        const { chunks, sink } = recorder();
        render(sink)(mkState({ hud: { score: "3", health: "0/3", banner: "YOU DIED" } }));
        expect(chunks[0]).toContain("\n\x1b[91mYOU DIED\x1b[0m\x1b[K\n");
    });

    it("rings the bell for sound requests only", () => {
        const { chunks, sink } = recorder();
        const effects: Effect[] = [
            { kind: "scoreChanged", score: 1 },
            { kind: "playSound", sound: assets.collectSound },
            { kind: "phaseEntered", phase: "GameOver" },
        ];
        effects.forEach(play(sink));
        expect(chunks).toEqual(["\x07"]);
    });
});
