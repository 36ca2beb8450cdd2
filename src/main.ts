/**
 * Gem Runner: a side-scrolling gem collector played in the terminal.
 *
 * The player scrolls right on its own; hold ↑/↓ (or w/s) to steer, q or
 * Ctrl+C to quit. Each gem is worth a point and costs a life.
 *
 * Run with `npm start`. Set GEM_RUNNER_SEED to replay a gem layout.
 */
import { pathToFileURL } from "node:url";
import { catchError, filter, merge, take, takeUntil, tap } from "rxjs";
import { loadAssets, pathAssetServer } from "./assets";
import {
    effects$,
    frames$,
    game$,
    heldInput$,
    isQuitKey,
    keypress$,
    timeSources,
} from "./observable";
import { snapshot } from "./snapshot";
import { initialState } from "./state";
import type { Snapshot } from "./types";
import { parseSeed } from "./util";
import { enterScreen, play, render } from "./view";

// Re-exports for tests and consumers
export * from "./types";
export * from "./state";
export * from "./schedule";
export * from "./snapshot";
export * from "./assets";
export { SingletonViolationError } from "./errors";
export { rand, randBetween, distance, single, parseSeed } from "./util";
export { game$, effects$, frames$, heldInput$, isQuitKey } from "./observable";
export type { Keypress, Sources } from "./observable";
export { drawFrame, drawHud, drawScene, toCell, render, play } from "./view";
export type { Sink } from "./view";

/** Play one run on the process TTY until the user quits */
export const run = (seed: number): void => {
    const key$ = keypress$(process.stdin);
    const quit$ = key$.pipe(filter(isQuitKey), take(1));
    const state$ = game$(
        initialState(seed, loadAssets(pathAssetServer)),
        timeSources(heldInput$(key$)),
    );

    console.log(`[gem-runner] starting with seed ${seed}`);
    const leaveScreen = enterScreen(process.stdout);
    const draw = render(process.stdout);

    // Last snapshot drawn, reported once the screen is restored.
    let final: Snapshot | undefined;

    const shutdown = () => {
        leaveScreen();
        if (process.stdin.isTTY) process.stdin.setRawMode(false);
        process.stdin.pause();
        if (final) {
            console.log(
                `[gem-runner] ${final.phase}: score ${final.score}, health ${final.health.current}/${final.health.max}`,
            );
        }
    };

    merge(
        frames$(state$).pipe(
            tap(s => {
                draw(s);
                final = snapshot(s);
            }),
        ),
        effects$(state$).pipe(tap(play(process.stdout))),
    )
        .pipe(
            takeUntil(quit$),
            catchError((err: unknown) => {
                shutdown();
                console.error("[gem-runner] simulation failed:", err);
                throw err;
            }),
        )
        .subscribe({
            complete: shutdown,
            error: () => {
                process.exitCode = 1;
            },
        });
};

// Only start the game when executed directly, not when imported by tests.
const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
    run(parseSeed(process.env.GEM_RUNNER_SEED, Date.now()));
}
