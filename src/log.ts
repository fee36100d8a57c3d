export type LogLevel = "info" | "error";

/** Receives the outcome of every shader rebuild. */
export type BuildLog = (level: LogLevel, message: string, elapsedMs: number) => void;

export const consoleBuildLog: BuildLog = (level, message, elapsedMs) => {
  const line = `[preview] ${message} (${elapsedMs.toFixed(1)} ms)`;
  if (level === "error") {
    console.error(line);
  } else {
    console.info(line);
  }
};
