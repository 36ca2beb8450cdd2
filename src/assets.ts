/** ============================
 * Asset boundary
 *
 * The simulation never reads asset bytes. It asks the host for handles by
 * logical path once at start-up and passes them back in sprites and sound
 * effects.
 * ============================ */
import { Assets, type AssetHandles, type Handle } from "./types";

export interface AssetServer {
    load<K extends "image" | "audio">(kind: K, path: string): Handle<K>;
}

/** Host that keeps the logical path as the handle */
export const pathAssetServer: AssetServer = {
    load: (kind, path) => ({ kind, path }),
};

export const loadAssets = (server: AssetServer): AssetHandles => ({
    playerSprite: server.load("image", Assets.PLAYER_SPRITE),
    gemSprite: server.load("image", Assets.GEM_SPRITE),
    collectSound: server.load("audio", Assets.COLLECT_SOUND),
});
