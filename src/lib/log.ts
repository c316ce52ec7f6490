export type Out = (line: string) => void;

export const consoleOut: Out = (line) => console.log(line);

let debugEnabled = false;

export function setDebugLogging(enabled: boolean) {
  debugEnabled = enabled;
}

export function debugLog(tag: string, event: string, fields?: Record<string, unknown>) {
  if (!debugEnabled) return;
  if (fields) console.log(`[${tag}] ${event}`, fields);
  else console.log(`[${tag}] ${event}`);
}
