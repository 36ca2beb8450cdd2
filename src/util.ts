/** ============================
 * Pure helpers (RNG, geometry, queries)
 * ============================ */
import { SingletonViolationError } from "./errors";
import type { Vec2 } from "./types";

/**
 * A random number generator which provides two pure functions
 * `hash` and `scale`. Call `hash` repeatedly to generate the
 * sequence of hashes.
 */
abstract class RNG {
    private static m = 0x80000000; // 2^31
    private static a = 1103515245;
    private static c = 12345;

    public static hash = (seed: number): number =>
        (RNG.a * seed + RNG.c) % RNG.m;
    public static scale = (hash: number): number => hash / RNG.m; // [0,1)
}

export const rand = (seed: number) => {
    const next = RNG.hash(seed);
    return { value: RNG.scale(next), seed: next };
};

/** Uniform value in [min, max) plus the advanced seed */
export const randBetween = (seed: number, min: number, max: number) => {
    const r = rand(seed);
    return { v: min + (max - min) * r.value, seed: r.seed };
};

/** Planar distance; the depth layer is ignored */
export const distance = (a: Vec2, b: Vec2): number =>
    Math.hypot(a.x - b.x, a.y - b.y);

/**
 * The only entry of a query that must hold exactly one entity.
 * @param label entity name used in the error
 */
export const single = <T>(query: readonly T[], label: string): T => {
    const [only] = query;
    if (query.length !== 1 || only === undefined) {
        throw new SingletonViolationError(label, query.length);
    }
    return only;
};

/** Replace the single entity of a query */
export const updateSingle = <T>(
    query: readonly T[],
    label: string,
    f: (t: T) => T,
): readonly T[] => [f(single(query, label))];

/**
 * Parse an integer seed, e.g. from the environment.
 * Undefined or empty input falls back to `fallback`.
 */
export const parseSeed = (raw: string | undefined, fallback: number): number => {
    if (raw === undefined || raw.trim() === "") return fallback;
    const seed = Number(raw);
    if (!Number.isSafeInteger(seed) || seed < 0) {
        throw new Error(`Invalid seed "${raw}": expected a non-negative integer`);
    }
    return seed;
};
