/**
 * The four functions the editor-generated script defines. The content text
 * arrives already unescaped, since the script embeds it as a string literal.
 */
export type ContentProbes = {
  getFileName(): string;
  getFileType(): string;
  getLastModified(): string;
  getContent(): string;
};

/** Any probe may be missing while the editor has not written the script yet. */
export type ContentSnapshot = Partial<ContentProbes>;

export type ContentSource = {
  refresh(): Promise<ContentSnapshot>;
};

const PROBE_NAMES: readonly (keyof ContentProbes)[] = [
  "getFileName",
  "getFileType",
  "getLastModified",
  "getContent",
];

/** Collects the probes defined as functions on `scope`. */
export function readProbes(scope: object): ContentSnapshot {
  const snapshot: ContentSnapshot = {};
  for (const name of PROBE_NAMES) {
    const probe: unknown = Reflect.get(scope, name);
    if (typeof probe === "function") {
      snapshot[name] = () => {
        const value: unknown = Reflect.apply(probe, scope, []);
        return String(value);
      };
    }
  }
  return snapshot;
}

/**
 * Reloads the editor-generated script through a fresh `<script>` element
 * and reads the global probes it defines.
 */
export class ScriptContentSource implements ContentSource {
  constructor(
    private readonly url = "js/content.js",
    private readonly removeDelayMs = 160,
  ) {}

  refresh(): Promise<ContentSnapshot> {
    return new Promise((resolve, reject) => {
      const script = document.createElement("script");
      script.src = `${this.url}?t=${Date.now()}`;
      script.addEventListener("load", () => {
        resolve(readProbes(window));
        window.setTimeout(() => script.remove(), this.removeDelayMs);
      });
      script.addEventListener("error", () => {
        script.remove();
        reject(new Error(`Failed to load ${script.src}`));
      });
      document.head.appendChild(script);
    });
  }
}
