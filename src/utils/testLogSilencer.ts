// Test-only log silencing. Engine and detector tests push hundreds of frames
// through code that logs per frame; keep the runner output readable.
//
// Only the Vitest setup file imports this module.

/* eslint-disable no-console */

type ConsoleMethod = (...args: unknown[]) => void;

export type SilencerOptions = {
  silenceConsoleLog?: boolean;
  silenceConsoleInfo?: boolean;
  silenceConsoleDebug?: boolean;
  // Tagged warnings are expected in tests that feed bad frames on purpose
  silenceTaggedWarnings?: boolean;
  // When set, allow matching messages through even if silenced.
  allow?: RegExp[];
  // Always suppress these messages.
  deny?: RegExp[];
};

export const DEFAULT_DENY: RegExp[] = [
  /^\[DETECTOR\]/,
  /^\[ENGINE\]/,
  /^\[TRACKER\]/,
  /^\[FRAME\]/,
  /^\[SETTINGS\]/,
  /^\[LOADER\]/,
];

export function shouldSuppress(args: unknown[], allow: RegExp[], deny: RegExp[]): boolean {
  const msg = String(args[0] ?? "");
  if (allow.some((re) => re.test(msg))) return false;
  return deny.some((re) => re.test(msg));
}

export function installTestLogSilencer(opts: SilencerOptions = {}) {
  if (typeof process === "undefined" || process.env.NODE_ENV !== "test") return;

  const {
    silenceConsoleLog = true,
    silenceConsoleInfo = true,
    silenceConsoleDebug = true,
    silenceTaggedWarnings = true,
    allow = [],
    deny = DEFAULT_DENY,
  } = opts;

  const original = {
    log: console.log.bind(console),
    info: console.info.bind(console),
    debug: console.debug.bind(console),
    warn: console.warn.bind(console),
    error: console.error.bind(console),
  };

  const wrap = (fn: ConsoleMethod): ConsoleMethod => {
    return (...args: unknown[]) => {
      if (shouldSuppress(args, allow, deny)) return;
      fn(...args);
    };
  };

  if (silenceConsoleLog) console.log = wrap(original.log);
  if (silenceConsoleInfo) console.info = wrap(original.info);
  if (silenceConsoleDebug) console.debug = wrap(original.debug);

  if (silenceTaggedWarnings) {
    console.warn = wrap(original.warn);
    console.error = wrap(original.error);
  }
}
