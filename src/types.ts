/** ============================
 * Constants
 * ============================ */
export const Viewport = {
    /** world units visible around the camera */
    WORLD_WIDTH: 1280,
    WORLD_HEIGHT: 720,
    /** terminal cells used to draw that area */
    COLS: 64,
    ROWS: 18,
} as const;

export const Sizes = {
    PLAYER: 100,
    GEM: 25,
} as const;

export const Constants = {
    TICK_RATE_MS: 1000 / 64, // 64 Hz fixed simulation
    FRAME_RATE_MS: 1000 / 60,
    INPUT_HOLD_MS: 180,
} as const;

export const Motion = {
    HORIZONTAL_SPEED: 300,
    VERTICAL_SPEED: 300,
    LOOK_AHEAD: 200,
    COLLECTION_RADIUS: 30,
} as const;

export const Track = {
    GEM_COUNT: 100,
    GEM_SPACING: 300,
    GEM_OFFSET: 600,
    SCATTER: 200, // y in [-SCATTER, SCATTER)
    MAX_HEALTH: 3,
} as const;

export const Assets = {
    PLAYER_SPRITE: "sprites/rug.png",
    GEM_SPRITE: "sprites/gem.png",
    COLLECT_SOUND: "sounds/gem_collection.ogg",
} as const;

/** ============================
 * Core Game Types
 * ============================ */
export type Vec2 = Readonly<{ x: number; y: number }>;

export type Health = Readonly<{
    current: number;
    max: number;
}>;

export type Player = Readonly<{
    position: Vec2;
    health: Health;
}>;

/** Gem: alive while present in State.gems; id is its creation index */
export type Gem = Readonly<{
    id: number;
    position: Vec2;
}>;

export type Camera = Vec2;

export type Phase = "Playing" | "GameOver";

/** Opaque handle to an asset owned by the rendering/audio host */
export type Handle<K extends "image" | "audio"> = Readonly<{
    kind: K;
    path: string;
}>;

export type AssetHandles = Readonly<{
    playerSprite: Handle<"image">;
    gemSprite: Handle<"image">;
    collectSound: Handle<"audio">;
}>;

/** Per-tick vertical steering signals */
export type Input = Readonly<{ up: boolean; down: boolean }>;

/** Effects a reducer step hands to collaborators (audio, UI) */
export type Effect =
    | Readonly<{ kind: "scoreChanged"; score: number }>
    | Readonly<{ kind: "healthChanged"; current: number; max: number }>
    | Readonly<{ kind: "playSound"; sound: Handle<"audio"> }>
    | Readonly<{ kind: "phaseEntered"; phase: Phase }>;

/** HUD text nodes written by the UI sync systems */
export type Hud = Readonly<{
    score: string;
    health: string;
    banner: string;
}>;

/** State: immutable world */
export type State = Readonly<{
    /** entity queries; exactly one entry each while playing */
    players: readonly Player[];
    cameras: readonly Camera[];
    gems: readonly Gem[];
    score: number;
    phase: Phase;
    hud: Hud;
    assets: AssetHandles;
    rngSeed: number;
    tickCount: number;
    frameCount: number;
    /** effects produced by the reducer that built this state */
    effects: readonly Effect[];
}>;

/** Read-only view handed to UI collaborators */
export type Snapshot = Readonly<{
    score: number;
    health: Health;
    phase: Phase;
    player: Vec2;
    camera: Camera;
    gemsLeft: number;
}>;

/** Rendering boundary: one drawable per entity */
export type Sprite = Readonly<{
    kind: "player" | "gem";
    position: Vec2;
    size: number;
    image: Handle<"image">;
}>;
