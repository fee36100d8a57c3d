export type Size = { width: number; height: number };

export type Unsub = () => void;

/** The page surface the preview loop draws into and reports to. */
export type PreviewView = {
  readonly canvas: HTMLCanvasElement;
  /** True while the page is not visible; frames are skipped then. */
  readonly hidden: boolean;
  /** Sizes the drawing buffer for the next frame and returns its pixel size. */
  resize(): Size;
  setCanvasVisible(visible: boolean): void;
  /** Writes compiler output; an empty string clears it. */
  showDiagnostics(text: string): void;
  showFileInfo(fileName: string, lastModified: string): void;
};

export type DomPreviewElements = {
  canvas: HTMLCanvasElement;
  diagnostics: HTMLElement;
  fileName?: HTMLElement;
  lastModified?: HTMLElement;
};

export class DomPreviewView implements PreviewView {
  readonly canvas: HTMLCanvasElement;
  private readonly elements: DomPreviewElements;

  constructor(
    elements: DomPreviewElements,
    private readonly maxDpr = 3,
  ) {
    this.elements = elements;
    this.canvas = elements.canvas;
  }

  get hidden(): boolean {
    return document.hidden;
  }

  resize(): Size {
    const canvas = this.canvas;
    const dpr = Math.max(1, Math.min(this.maxDpr, window.devicePixelRatio || 1));
    const cssW = Math.max(1, Math.floor(canvas.clientWidth || window.innerWidth));
    const cssH = Math.max(1, Math.floor(canvas.clientHeight || window.innerHeight));
    const width = Math.max(1, Math.floor(cssW * dpr));
    const height = Math.max(1, Math.floor(cssH * dpr));

    // Assigning the same size still clears the drawing buffer.
    if (canvas.width !== width) canvas.width = width;
    if (canvas.height !== height) canvas.height = height;

    return { width, height };
  }

  setCanvasVisible(visible: boolean): void {
    this.canvas.style.display = visible ? "" : "none";
  }

  showDiagnostics(text: string): void {
    this.elements.diagnostics.innerText = text;
  }

  showFileInfo(fileName: string, lastModified: string): void {
    if (this.elements.fileName) this.elements.fileName.textContent = fileName;
    if (this.elements.lastModified) this.elements.lastModified.textContent = lastModified;
  }

  /** Reports the pointer position normalized to the canvas, origin top-left. */
  onPointerMove(listener: (x: number, y: number) => void): Unsub {
    const canvas = this.canvas;
    const handler = (e: PointerEvent) => {
      const w = canvas.clientWidth || 1;
      const h = canvas.clientHeight || 1;
      listener(e.offsetX / w, e.offsetY / h);
    };
    canvas.addEventListener("pointermove", handler, { passive: true });
    return () => canvas.removeEventListener("pointermove", handler);
  }
}
