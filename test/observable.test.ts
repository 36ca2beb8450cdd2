import { describe, it, expect } from "vitest";
import { Subject } from "rxjs";
import { TestScheduler } from "rxjs/testing";
import {
    type Effect,
    type Input,
    type Keypress,
    type State,
    effects$,
    frames$,
    game$,
    heldInput$,
    initialState,
    isQuitKey,
    loadAssets,
    pathAssetServer,
    snapshot,
} from "../src/main";

const assets = loadAssets(pathAssetServer);

const mkSources = () => ({
    tick$: new Subject<void>(),
    frame$: new Subject<void>(),
    input$: new Subject<Input>(),
});

describe("game$", () => {
    it("folds ticks with the latest input", () => {
        const src = mkSources();
        const states: State[] = [];
        const sub = game$(initialState(1, assets), src).subscribe(s => states.push(s));

        src.input$.next({ up: true, down: false });
        for (let i = 0; i < 64; i++) src.tick$.next();
        src.input$.next({ up: false, down: false });
        for (let i = 0; i < 64; i++) src.tick$.next();
        sub.unsubscribe();

        expect(states).toHaveLength(128);
        expect(snapshot(states[63]).player).toEqual({ x: 300, y: 300 });
        expect(snapshot(states[127]).player).toEqual({ x: 600, y: 300 });
    });

    it("moves straight right before any input arrives", () => {
        const src = mkSources();
        const states: State[] = [];
        const sub = game$(initialState(1, assets), src).subscribe(s => states.push(s));
        src.tick$.next();
        sub.unsubscribe();
        expect(snapshot(states[0]).player).toEqual({ x: 4.6875, y: 0 });
    });

    it("drains pickup and phase effects in step order", () => {
        const src = mkSources();
        const start: State = {
            ...initialState(1, assets),
            gems: [
                { id: 0, position: { x: 0, y: 0 } },
                { id: 1, position: { x: 5, y: 0 } },
                { id: 2, position: { x: -5, y: 0 } },
            ],
        };
        const state$ = game$(start, src);
        const effects: Effect[] = [];
        const shown: State[] = [];
        const subs = [
            effects$(state$).subscribe(e => effects.push(e)),
            frames$(state$).subscribe(s => shown.push(s)),
        ];

        src.tick$.next();
        src.frame$.next();
        src.tick$.next();
        src.frame$.next();
        subs.forEach(s => s.unsubscribe());

        expect(effects.map(e => e.kind)).toEqual([
            "scoreChanged",
            "healthChanged",
            "playSound",
            "scoreChanged",
            "healthChanged",
            "playSound",
            "scoreChanged",
            "healthChanged",
            "playSound",
            "phaseEntered",
        ]);
        expect(shown.map(s => s.frameCount)).toEqual([1, 2]);
        expect(shown[0].phase).toBe("GameOver");
        expect(shown[0].hud.banner).toBe("YOU DIED");
        // second tick ran gated: no movement after GameOver
        expect(snapshot(shown[1]).player).toEqual({ x: 4.6875, y: 0 });
    });
});

describe("heldInput$", () => {
    it("holds a key for the hold window after its last press", () => {
        const scheduler = new TestScheduler((actual, expected) => {
            expect(actual).toEqual(expected);
        });
        scheduler.run(({ cold, expectObservable }) => {
            const key$ = cold<Keypress>("a", { a: { name: "up" } });
            expectObservable(heldInput$(key$, 180)).toBe("(ab) 176ms c", {
                a: { up: false, down: false },
                b: { up: true, down: false },
                c: { up: false, down: false },
            });
        });
    });

    it("maps w and s like the arrow keys", () => {
        const scheduler = new TestScheduler((actual, expected) => {
            expect(actual).toEqual(expected);
        });
        scheduler.run(({ cold, expectObservable }) => {
            const key$ = cold<Keypress>("a", { a: { name: "s" } });
            expectObservable(heldInput$(key$, 10)).toBe("(ab) 6ms c", {
                a: { up: false, down: false },
                b: { up: false, down: true },
                c: { up: false, down: false },
            });
        });
    });
});

describe("isQuitKey", () => {
    it("accepts q and Ctrl+C only", () => {
        expect(isQuitKey({ name: "q" })).toBe(true);
        expect(isQuitKey({ name: "c", ctrl: true })).toBe(true);
        expect(isQuitKey({ name: "c" })).toBe(false);
        expect(isQuitKey({})).toBe(false);
    });
});
