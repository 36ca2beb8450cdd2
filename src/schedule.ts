/** ============================
 * Gated System Dispatch
 *
 * A schedule is an ordered list of systems, each with an optional run
 * condition read from the current State. Systems run in list order and
 * each sees the State its predecessor returned.
 * ============================ */
import type { Phase, State } from "./types";

export type System<C> = (s: State, ctx: C) => State;

export type ScheduledSystem<C> = Readonly<{
    id: string;
    /** skip the system when this returns false; absent means always run */
    runIf?: (s: State) => boolean;
    run: System<C>;
}>;

export type Schedule<C> = readonly ScheduledSystem<C>[];

/** Run condition: the state machine is in `phase` */
export const inPhase =
    (phase: Phase) =>
    (s: State): boolean =>
        s.phase === phase;

/** Gate every system of a chain on the same condition */
export const gated = <C>(
    runIf: (s: State) => boolean,
    systems: Schedule<C>,
): Schedule<C> => systems.map(sys => ({ ...sys, runIf }));

export const isDue = <C>(sys: ScheduledSystem<C>, s: State): boolean =>
    sys.runIf === undefined || sys.runIf(s);

/** Run a schedule once, in order */
export const runSchedule = <C>(schedule: Schedule<C>, s: State, ctx: C): State =>
    schedule.reduce((acc, sys) => (isDue(sys, acc) ? sys.run(acc, ctx) : acc), s);
