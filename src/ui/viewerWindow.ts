import * as PIXI from "pixi.js";
import { DEBUG_LOGGING } from "../config/flags";
import { createPicture } from "../scene/picture";
import { TiledPicture } from "../scene/tiledPicture";
import { MIN_GUARANTEED_TEXTURE_SIZE, tileSizeFor } from "../scene/tiles";
import { ScrollViewport, scrollbarThumbs } from "../scene/viewport";
import { ExportError, savePng, type ExportEnv } from "../services/pngExport";
import type { PreparedVisualization } from "../services/visualizationService";
import type { IAppState, ViewerHandle } from "../state/appState";
import { disposeOnThrow } from "../utils/dispose";
import type { BusyIndicator } from "./busyIndicator";
import { getEffectiveDpr, watchDpr } from "./dpr";
import { createButton } from "./inputs";
import { showWarning } from "./messageBox";
import { Colors, createPanel } from "./theme";

export interface ViewerContext {
  state: IAppState;
  busy: BusyIndicator;
  exportEnv?: ExportEnv;
}

const ARROW_STEP = 40;
const CASCADE_STEP = 28;
let topZ = 100;

export const SAVE_FAILED_TITLE = "Save failed";

function maxTextureSize(renderer: PIXI.Renderer): number {
  if (renderer instanceof PIXI.WebGLRenderer) {
    const gl = renderer.gl;
    return Number(gl.getParameter(gl.MAX_TEXTURE_SIZE));
  }
  return MIN_GUARANTEED_TEXTURE_SIZE;
}

function bringToFront(el: HTMLElement) {
  el.style.zIndex = String(++topZ);
}

function makeDraggable(el: HTMLElement, handle: HTMLElement) {
  let startX = 0;
  let startY = 0;
  let originX = 0;
  let originY = 0;
  handle.addEventListener("pointerdown", (e) => {
    if (e.button !== 0 || e.target instanceof HTMLButtonElement) return;
    startX = e.clientX;
    startY = e.clientY;
    originX = el.offsetLeft;
    originY = el.offsetTop;
    handle.setPointerCapture(e.pointerId);
  });
  handle.addEventListener("pointermove", (e) => {
    if (!handle.hasPointerCapture(e.pointerId)) return;
    el.style.left = `${Math.max(0, originX + e.clientX - startX)}px`;
    el.style.top = `${Math.max(0, originY + e.clientY - startY)}px`;
  });
  const release = (e: PointerEvent) => {
    if (handle.hasPointerCapture(e.pointerId)) handle.releasePointerCapture(e.pointerId);
  };
  handle.addEventListener("pointerup", release);
  handle.addEventListener("pointercancel", release);
}

/**
 * Opens a floating window showing one visualization. The returned handle is
 * registered with the app state and is what Save and Close act on.
 */
export async function openViewer(
  v: PreparedVisualization,
  ctx: ViewerContext,
): Promise<ViewerHandle> {
  const { state, busy } = ctx;
  const id = state.nextViewerId();
  const picture = createPicture(v);
  const view = { w: v.fit.viewWidth, h: v.fit.viewHeight };
  const extent = {
    w: picture.width * v.displayScale,
    h: picture.height * v.displayScale,
  };

  const el = createPanel({ pointer: true });
  el.classList.add("viewer-window");
  el.tabIndex = 0;
  el.style.minWidth = "0";
  el.style.left = `${CASCADE_STEP * ((id - 1) % 8)}px`;
  el.style.top = `${CASCADE_STEP * ((id - 1) % 8)}px`;
  bringToFront(el);

  const bar = document.createElement("div");
  bar.className = "viewer-titlebar";
  const titleEl = document.createElement("span");
  titleEl.className = "viewer-title";
  titleEl.textContent = v.title;
  titleEl.title = v.title;
  const stage = document.createElement("div");
  stage.className = "viewer-stage";

  const app = new PIXI.Application();
  await app.init({
    width: view.w,
    height: view.h,
    background: Colors.viewerBg(),
    antialias: false,
    resolution: getEffectiveDpr(),
    autoDensity: true,
    preference: "webgl",
  });
  const build = () => {
    stage.appendChild(app.canvas);

    const tileSize = tileSizeFor(maxTextureSize(app.renderer));
    const tiled = new TiledPicture(picture, v.displayScale, tileSize);
    const content = tiled.container;
    const bars = new PIXI.Graphics();
    app.stage.addChild(content, bars);

    const vp = new ScrollViewport({ content, view, extent });
    const drawBars = () => {
      tiled.sync(vp.visibleRect());
      const t = scrollbarThumbs(vp);
      bars.clear();
      for (const r of [t.horizontal, t.vertical]) {
        if (r) bars.rect(r.x, r.y, r.w, r.h).fill({ color: Colors.scrollbarThumb(), alpha: 0.7 });
      }
    };
    const offScroll = vp.on(drawBars);
    drawBars();
    app.ticker.add((ticker) => vp.update(ticker.deltaMS));

    // Drag to scroll
    app.stage.eventMode = "static";
    app.stage.hitArea = app.screen;
    let dragging = false;
    let lastX = 0;
    let lastY = 0;
    app.stage.on("pointerdown", (e) => {
      vp.stopMomentum();
      if (e.button !== 0 || !vp.scrollable) return;
      dragging = true;
      lastX = e.global.x;
      lastY = e.global.y;
      stage.style.cursor = "grabbing";
      vp.startPan();
    });
    app.stage.on("pointermove", (e) => {
      if (!dragging || !(e.buttons & 1)) return;
      vp.panBy(e.global.x - lastX, e.global.y - lastY);
      lastX = e.global.x;
      lastY = e.global.y;
    });
    const endDrag = () => {
      if (!dragging) return;
      dragging = false;
      stage.style.cursor = vp.scrollable ? "grab" : "default";
      vp.endPan();
    };
    app.stage.on("pointerup", endDrag);
    app.stage.on("pointerupoutside", endDrag);
    stage.style.cursor = vp.scrollable ? "grab" : "default";

    app.canvas.addEventListener(
      "wheel",
      (e) => {
        if (!vp.scrollable) return;
        e.preventDefault();
        vp.stopMomentum();
        if (e.shiftKey) vp.scrollBy(e.deltaY, 0);
        else vp.scrollBy(e.deltaX, e.deltaY);
      },
      { passive: false },
    );

    const offDpr = watchDpr(() => {
      app.renderer.resize(view.w, view.h, getEffectiveDpr());
    });

    let closed = false;
    const close = () => {
      if (closed) return;
      closed = true;
      offDpr();
      offScroll();
      tiled.destroy();
      app.destroy(true, { children: true, texture: true, textureSource: true });
      el.remove();
      state.unregisterViewer(id);
      if (DEBUG_LOGGING) console.log("[viewer] closed", id);
    };

    const save = async () => {
      try {
        const outcome = await busy.track(savePng(picture, v.title, ctx.exportEnv));
        console.log("[viewer] save", outcome, v.title);
      } catch (e) {
        console.error("[viewer] save failed", e);
        const msg =
          e instanceof ExportError
            ? `Could not save the picture: ${e.message}`
            : `Could not save the picture: ${e instanceof Error ? e.message : String(e)}`;
        await showWarning(SAVE_FAILED_TITLE, msg);
      }
    };

    const handle: ViewerHandle = {
      id,
      title: v.title,
      save,
      close,
      focus: () => el.focus(),
    };

    el.addEventListener("focus", () => state.setFocusedViewer(id));
    el.addEventListener("pointerdown", () => {
      bringToFront(el);
      if (document.activeElement !== el) el.focus({ preventScroll: true });
    });
    el.addEventListener("keydown", (e) => {
      const page = { x: view.w * 0.9, y: view.h * 0.9 };
      let handled = true;
      if ((e.ctrlKey || e.metaKey) && e.key.toLowerCase() === "s") void save();
      else if (e.key === "Escape") close();
      else if (e.key === "ArrowLeft") vp.scrollBy(-ARROW_STEP, 0);
      else if (e.key === "ArrowRight") vp.scrollBy(ARROW_STEP, 0);
      else if (e.key === "ArrowUp") vp.scrollBy(0, -ARROW_STEP);
      else if (e.key === "ArrowDown") vp.scrollBy(0, ARROW_STEP);
      else if (e.key === "PageUp") vp.scrollBy(0, -page.y);
      else if (e.key === "PageDown") vp.scrollBy(0, page.y);
      else if (e.key === "Home") vp.scrollTo(0, 0);
      else if (e.key === "End") vp.scrollTo(vp.maxScrollX, vp.maxScrollY);
      else handled = false;
      if (handled) {
        e.preventDefault();
        e.stopPropagation();
      }
    });

    bar.append(
      titleEl,
      createButton("Save", () => void save()),
      createButton("Close", close),
    );
    el.append(bar, stage);
    makeDraggable(el, bar);
    document.body.appendChild(el);
    state.registerViewer(handle);
    el.focus();
    if (DEBUG_LOGGING)
      console.log("[viewer] opened", id, v.title, {
        picture: { w: picture.width, h: picture.height },
        view,
        tiles: tiled.tileCount,
        tileSize,
        overflow: v.fit.overflow,
      });
    return handle;
  };
  // Nothing was shown if setup fails; release the renderer and its GL context
  return disposeOnThrow(build, () => {
    console.error("[viewer] failed to open", v.title);
    app.destroy(true, { children: true, texture: true, textureSource: true });
    el.remove();
    state.unregisterViewer(id);
  });
}
