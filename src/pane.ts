import { Pane } from "tweakpane";
import type { PreviewLoop, PreviewState } from "./previewLoop";

/**
 * Builds a Tweakpane panel with playback controls and live monitors.
 *
 * The monitors read `loop.stats`, which the render loop mutates in place,
 * so they refresh on Tweakpane's own polling with no extra wiring.
 *
 * @param loop   The preview loop the controls act on.
 * @param title  Panel title (defaults to "Preview").
 */
export function buildPane(loop: PreviewLoop, title = "Preview"): Pane {
  const pane = new Pane({ title });

  const playback = pane.addButton({ title: "Pause" });
  playback.on("click", () => loop.togglePause());

  pane.addButton({ title: "Reset time" }).on("click", () => loop.resetTime());

  const fixed = (digits: number) => (v: number) => v.toFixed(digits);

  pane.addBinding(loop.stats, "fps", { readonly: true, format: fixed(1) });
  pane.addBinding(loop.stats, "smoothedFps", {
    readonly: true,
    label: "fps (avg)",
    format: fixed(1),
  });
  pane.addBinding(loop.stats, "frames", { readonly: true, format: fixed(0) });
  pane.addBinding(loop.stats, "time", { readonly: true, format: fixed(2) });
  const gpu = pane.addBinding(loop.stats, "frametimeMs", {
    readonly: true,
    label: "gpu ms",
    format: (v: number) => (v < 0 ? "n/a" : v.toFixed(3)),
  });

  const sync = (state: PreviewState) => {
    playback.title = state.paused ? "Play" : "Pause";
    gpu.hidden = !state.frametimeSupported;
  };
  sync(loop.state);
  loop.onStateChange(sync);

  return pane;
}
