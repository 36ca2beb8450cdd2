/** ============================
 * Observable Wiring (game$)
 *
 * Stream composition only: maps ticks, frames and input to pure reducers
 * folded by scan into the immutable State stream. No terminal output here.
 * ============================ */
import { emitKeypressEvents } from "node:readline";
import {
    Observable,
    combineLatest,
    concat,
    distinctUntilChanged,
    filter,
    fromEvent,
    interval,
    map,
    merge,
    mergeMap,
    of,
    scan,
    share,
    shareReplay,
    startWith,
    switchMap,
    timer,
    withLatestFrom,
} from "rxjs";
import { fixedTick, frame } from "./state";
import { Constants, type Effect, type Input, type State } from "./types";

/** Key event as emitted by readline's keypress support */
export type Keypress = Readonly<{
    name?: string;
    ctrl?: boolean;
}>;

export type Sources = Readonly<{
    /** fixed simulation tick */
    tick$: Observable<unknown>;
    /** presentation frame */
    frame$: Observable<unknown>;
    input$: Observable<Input>;
}>;

const idle: Input = { up: false, down: false };

const UP_KEYS = ["up", "w"];
const DOWN_KEYS = ["down", "s"];

/** Create the State stream from tick, frame and input sources */
export const game$ = (initial: State, sources: Sources): Observable<State> => {
    // Each tick samples the latest input, so input is read once per tick.
    const tickReducers$ = sources.tick$.pipe(
        withLatestFrom(sources.input$.pipe(startWith(idle))),
        map(
            ([, input]) =>
                (s: State) =>
                    fixedTick(s, input),
        ),
    );
    const frameReducers$ = sources.frame$.pipe(map(() => frame));

    // Single fold: every emitted State sits between whole reducer steps.
    return merge(tickReducers$, frameReducers$).pipe(
        scan((s: State, reducer: (s: State) => State) => reducer(s), initial),
        shareReplay({ bufferSize: 1, refCount: true }),
    );
};

/** Effects of every step, in the order the steps ran */
export const effects$ = (state$: Observable<State>): Observable<Effect> =>
    state$.pipe(mergeMap(s => s.effects));

/** One State per presentation frame, taken after that frame's systems */
export const frames$ = (state$: Observable<State>): Observable<State> =>
    state$.pipe(
        filter(s => s.frameCount > 0),
        distinctUntilChanged((a, b) => a.frameCount === b.frameCount),
    );

/**
 * Terminals report presses but never releases: a key counts as held for
 * `holdMs` after its latest press (auto-repeat keeps it held).
 */
export const heldInput$ = (
    key$: Observable<Keypress>,
    holdMs: number = Constants.INPUT_HOLD_MS,
): Observable<Input> => {
    const held$ = (names: readonly string[]) =>
        key$.pipe(
            filter(k => k.name !== undefined && names.includes(k.name)),
            switchMap(() => concat(of(true), timer(holdMs).pipe(map(() => false)))),
            startWith(false),
        );
    return combineLatest([held$(UP_KEYS), held$(DOWN_KEYS)]).pipe(
        map(([up, down]) => ({ up, down })),
    );
};

export const isQuitKey = (k: Keypress): boolean =>
    k.name === "q" || (k.ctrl === true && k.name === "c");

/** Keypresses from a TTY stream in raw mode */
export const keypress$ = (stdin: NodeJS.ReadStream): Observable<Keypress> => {
    emitKeypressEvents(stdin);
    if (stdin.isTTY) stdin.setRawMode(true);
    return fromEvent(
        stdin,
        "keypress",
        (_str: string | undefined, key: Keypress | undefined): Keypress => key ?? {},
    ).pipe(share());
};

/** Production timebase: 64 Hz ticks, 60 Hz frames */
export const timeSources = (
    input$: Observable<Input>,
): Sources => ({
    tick$: interval(Constants.TICK_RATE_MS),
    frame$: interval(Constants.FRAME_RATE_MS),
    input$,
});
