import { ScriptContentSource } from "./contentSource";
import { readOptionsFromQuery, resolvePreviewOptions } from "./options";
import { buildPane } from "./pane";
import { PreviewLoop } from "./previewLoop";
import { DomPreviewView } from "./previewView";

function el<T extends Element>(query: string, type: new () => T): T {
  const element = document.querySelector(query);
  if (!(element instanceof type)) {
    throw new Error(`Element for query "${query}" not found`);
  }
  return element;
}

const options = resolvePreviewOptions(readOptionsFromQuery(location.search));

const view = new DomPreviewView(
  {
    canvas: el("#canvas", HTMLCanvasElement),
    diagnostics: el("#compiler-messages", HTMLElement),
    fileName: el("#file-name", HTMLElement),
    lastModified: el("#last-modified", HTMLElement),
  },
  options.maxDpr,
);

const loop = new PreviewLoop(
  { view, source: new ScriptContentSource(options.contentScriptUrl) },
  options,
);

view.onPointerMove((x, y) => loop.setMouse(x, y));
buildPane(loop);

await loop.start();
