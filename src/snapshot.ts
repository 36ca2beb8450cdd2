/** ============================
 * Read-only boundary for UI and rendering collaborators
 *
 * Everything here copies out of State; nothing writes back.
 * ============================ */
import { Sizes, type Health, type Phase, type Snapshot, type Sprite, type State } from "./types";
import { single } from "./util";

export const readScore = (s: State): number => s.score;

export const readHealth = (s: State): Health => {
    const { health } = single(s.players, "player");
    return { current: health.current, max: health.max };
};

export const readPhase = (s: State): Phase => s.phase;

export const snapshot = (s: State): Snapshot => {
    const player = single(s.players, "player");
    const camera = single(s.cameras, "camera");
    return {
        score: readScore(s),
        health: readHealth(s),
        phase: readPhase(s),
        player: { ...player.position },
        camera: { ...camera },
        gemsLeft: s.gems.length,
    };
};

/** Drawables in paint order: gems first, player on top */
export const renderables = (s: State): Sprite[] => {
    const player = single(s.players, "player");
    return [
        ...s.gems.map(
            (g): Sprite => ({
                kind: "gem",
                position: g.position,
                size: Sizes.GEM,
                image: s.assets.gemSprite,
            }),
        ),
        {
            kind: "player",
            position: player.position,
            size: Sizes.PLAYER,
            image: s.assets.playerSprite,
        },
    ];
};
