/** ============================
 * Pure State (Systems & Setup)
 *
 * Holds only pure, deterministic functions that transform the immutable
 * State. No terminal, IO, or time APIs: tick duration and input arrive as
 * arguments, randomness comes from the seed carried in State.
 *
 * Score, health and phase are written here and nowhere else: pickup owns
 * score/health, the death check owns phase.
 * ============================ */
import { gated, inPhase, runSchedule, type Schedule } from "./schedule";
import {
    Constants,
    Motion,
    Track,
    type AssetHandles,
    type Effect,
    type Gem,
    type Input,
    type Player,
    type State,
} from "./types";
import { distance, randBetween, single, updateSingle } from "./util";

/** ============================
 * Setup
 * ============================ */

/**
 * Lay gems out along the scroll axis with a seeded vertical scatter.
 * Returns the gems in creation order and the advanced seed.
 */
export const spawnGems = (
    seed: number,
    count: number = Track.GEM_COUNT,
): { gems: Gem[]; seed: number } =>
    Array.from({ length: count }, (_, i) => i).reduce<{
        gems: Gem[];
        seed: number;
    }>(
        (acc, i) => {
            const r = randBetween(acc.seed, -Track.SCATTER, Track.SCATTER);
            const gem: Gem = {
                id: i,
                position: { x: i * Track.GEM_SPACING + Track.GEM_OFFSET, y: r.v },
            };
            return { gems: [...acc.gems, gem], seed: r.seed };
        },
        { gems: [], seed },
    );

/** Fresh world: one player at the origin, one camera, a full gem track */
export const initialState = (seed: number, assets: AssetHandles): State => {
    const spawned = spawnGems(seed);
    const player: Player = {
        position: { x: 0, y: 0 },
        health: { current: Track.MAX_HEALTH, max: Track.MAX_HEALTH },
    };
    return {
        players: [player],
        cameras: [{ x: 0, y: 0 }],
        gems: spawned.gems,
        score: 0,
        phase: "Playing",
        hud: {
            score: "0",
            health: `${Track.MAX_HEALTH}/${Track.MAX_HEALTH}`,
            banner: "",
        },
        assets,
        rngSeed: spawned.seed,
        tickCount: 0,
        frameCount: 0,
        effects: [],
    };
};

/** ============================
 * Fixed-tick systems
 * ============================ */

/** Up adds +1, down adds -1; both held cancel out */
export const verticalIntent = (input: Input): -1 | 0 | 1 => {
    const v = (input.up ? 1 : 0) + (input.down ? -1 : 0);
    return v > 0 ? 1 : v < 0 ? -1 : 0;
};

/**
 * Constant scroll right plus steered vertical motion. No vertical clamp.
 * @param dt tick duration in seconds
 */
export const movePlayer = (s: State, input: Input, dt: number): State => ({
    ...s,
    players: updateSingle(s.players, "player", p => ({
        ...p,
        position: {
            x: p.position.x + Motion.HORIZONTAL_SPEED * dt,
            y: p.position.y + verticalIntent(input) * Motion.VERTICAL_SPEED * dt,
        },
    })),
});

/** Horizontal look-ahead only; camera y is left alone */
export const followPlayer = (s: State): State => {
    const player = single(s.players, "player");
    return {
        ...s,
        cameras: updateSingle(s.cameras, "camera", c => ({
            ...c,
            x: player.position.x + Motion.LOOK_AHEAD,
        })),
    };
};

/** Remove one gem and book its score, health and sound */
const pickUp = (s: State, gem: Gem): State => {
    const player = single(s.players, "player");
    const current = Math.max(0, player.health.current - 1);
    const score = s.score + 1;
    const effects: Effect[] = [
        { kind: "scoreChanged", score },
        { kind: "healthChanged", current, max: player.health.max },
        { kind: "playSound", sound: s.assets.collectSound },
    ];
    return {
        ...s,
        gems: s.gems.filter(g => g.id !== gem.id),
        score,
        players: [{ ...player, health: { ...player.health, current } }],
        effects: [...s.effects, ...effects],
    };
};

/** Collect a gem by id; no-op when it is no longer alive */
export const collectGem = (s: State, id: number): State => {
    const gem = s.gems.find(g => g.id === id);
    return gem ? pickUp(s, gem) : s;
};

/**
 * Collect every live gem strictly inside the collection radius, in
 * creation order, all within this tick.
 */
export const collectGems = (s: State): State => {
    const { position } = single(s.players, "player");
    return s.gems
        .filter(g => distance(position, g.position) < Motion.COLLECTION_RADIUS)
        .reduce(pickUp, s);
};

/** ============================
 * Per-frame systems (death check & UI sync)
 * ============================ */

export const updateScoreboard = (s: State): State => ({
    ...s,
    hud: { ...s.hud, score: `${s.score}` },
});

export const updateHealthUi = (s: State): State => {
    const { health } = single(s.players, "player");
    return { ...s, hud: { ...s.hud, health: `${health.current}/${health.max}` } };
};

export const showGameOver = (s: State): State => ({
    ...s,
    hud: { ...s.hud, banner: s.phase === "GameOver" ? "YOU DIED" : "" },
});

/**
 * Runs once on entering GameOver: the final HUD values of the run, then
 * the banner. Scoreboard and health sync are gated off from here on.
 */
const onEnterGameOver: Schedule<void> = [
    { id: "updateScoreboard", run: updateScoreboard },
    { id: "updateHealthUi", run: updateHealthUi },
    { id: "showGameOver", run: showGameOver },
];

/**
 * Level-triggered latch: Playing with health at or below 0 becomes
 * GameOver. Calling it again in GameOver changes nothing.
 */
export const checkPlayerDeath = (s: State): State => {
    if (s.phase !== "Playing") return s;
    const { health } = single(s.players, "player");
    if (health.current > 0) return s;
    const entered: State = {
        ...s,
        phase: "GameOver",
        effects: [...s.effects, { kind: "phaseEntered", phase: "GameOver" }],
    };
    return runSchedule(onEnterGameOver, entered, undefined);
};

/** ============================
 * Schedules
 * ============================ */
export type TickContext = Readonly<{ input: Input; dt: number }>;

/** Motion → Camera → Pickup, chained, only while playing */
export const tickSchedule: Schedule<TickContext> = gated<TickContext>(inPhase("Playing"), [
    { id: "movePlayer", run: (s, { input, dt }) => movePlayer(s, input, dt) },
    { id: "followPlayer", run: followPlayer },
    { id: "collectGems", run: collectGems },
]);

export const frameSchedule: Schedule<void> = [
    { id: "checkPlayerDeath", run: checkPlayerDeath },
    ...gated<void>(inPhase("Playing"), [
        { id: "updateScoreboard", run: updateScoreboard },
        { id: "updateHealthUi", run: updateHealthUi },
    ]),
    { id: "showGameOver", run: showGameOver },
];

/** One fixed simulation step; effects start empty for every step */
export const fixedTick = (
    s: State,
    input: Input,
    dt: number = Constants.TICK_RATE_MS / 1000,
): State =>
    runSchedule(
        tickSchedule,
        { ...s, tickCount: s.tickCount + 1, effects: [] },
        { input, dt },
    );

/** One presentation frame */
export const frame = (s: State): State =>
    runSchedule(
        frameSchedule,
        { ...s, frameCount: s.frameCount + 1, effects: [] },
        undefined,
    );
