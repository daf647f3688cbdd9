// Debug logging is off unless SCORER_DEBUG is set or we run in development.
const { SCORER_DEBUG, NODE_ENV } = process.env;
export const isDev: boolean =
  SCORER_DEBUG === "1" || SCORER_DEBUG === "true" || NODE_ENV === "development";

export function dlog(...args: unknown[]) {
  if (isDev) console.debug(...args);
}
export function dinfo(...args: unknown[]) {
  if (isDev) console.info(...args);
}
// Warnings and errors always reach the console; they flag frames or settings
// the engine had to skip.
export function dwarn(...args: unknown[]) {
  console.warn(...args);
}
export function derror(...args: unknown[]) {
  console.error(...args);
}
