/**
 * packages/core/src/debug/warn.ts — Development-mode warnings.
 *
 * Warnings go to `console.warn` when the host provides one and NODE_ENV is
 * not "production". The core stays runtime-agnostic: both are reached
 * through `globalThis`.
 */

type WarnSink = (message: string) => void;

function readNodeEnv(): string {
  return (
    (globalThis as { process?: { env?: { NODE_ENV?: string } } }).process?.env?.NODE_ENV ??
    "development"
  );
}

export function isDevMode(): boolean {
  return readNodeEnv() !== "production";
}

let sinkOverride: WarnSink | null = null;

/** Redirect warnings (tests); pass null to restore `console.warn`. */
export function setWarnSink(sink: WarnSink | null): void {
  sinkOverride = sink;
}

export function warnDev(message: string): void {
  if (!isDevMode()) return;
  const text = `[tessel] ${message}`;
  if (sinkOverride !== null) {
    sinkOverride(text);
    return;
  }
  const c = (globalThis as { console?: { warn?: (msg: string) => void } }).console;
  c?.warn?.(text);
}
