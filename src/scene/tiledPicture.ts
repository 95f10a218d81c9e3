import * as PIXI from "pixi.js";
import { DEBUG_LOGGING } from "../config/flags";
import type { Rect } from "../types/geometry";
import type { PictureSource } from "./picture";
import { planTiles, tilesInView } from "./tiles";

// Tiles within this many picture pixels of the window are kept alive.
const PRELOAD_MARGIN = 256;

/**
 * A picture shown as a grid of sprites. Only tiles near the visible window
 * hold a texture; the rest are created on demand and released when they
 * scroll away.
 */
export class TiledPicture {
  readonly container = new PIXI.Container();
  private readonly tiles: Rect[];
  private live = new Map<number, PIXI.Sprite>();

  constructor(
    private readonly source: PictureSource,
    private readonly scale: number,
    tileSize: number,
  ) {
    this.tiles = planTiles({ w: source.width, h: source.height }, tileSize);
  }

  get tileCount() {
    return this.tiles.length;
  }

  /** `visible` is in display pixels, as reported by the scroll viewport. */
  sync(visible: Rect) {
    const wanted = new Set(tilesInView(this.tiles, visible, this.scale, PRELOAD_MARGIN));
    for (const [i, sprite] of this.live) {
      if (wanted.has(i)) continue;
      this.release(sprite);
      this.live.delete(i);
    }
    for (const i of wanted) {
      if (!this.live.has(i)) this.live.set(i, this.createTile(this.tiles[i]));
    }
  }

  destroy() {
    for (const sprite of this.live.values()) this.release(sprite);
    this.live.clear();
    this.container.destroy({ children: true });
  }

  private createTile(rect: Rect): PIXI.Sprite {
    const texture = PIXI.Texture.from(this.source.tileCanvas(rect), true);
    // Cells must stay crisp squares when magnified
    texture.source.scaleMode = "nearest";
    const sprite = new PIXI.Sprite(texture);
    sprite.position.set(rect.x * this.scale, rect.y * this.scale);
    sprite.scale.set(this.scale);
    sprite.roundPixels = true;
    this.container.addChild(sprite);
    if (DEBUG_LOGGING) console.log("[viewer] tile +", rect);
    return sprite;
  }

  private release(sprite: PIXI.Sprite) {
    sprite.destroy({ texture: true, textureSource: true });
  }
}
