let debugEnabled = process.env.LEMMA_DEBUG === '1';

export function setDebugLogging(enabled: boolean): void {
  debugEnabled = enabled;
}

export function logDebug(...args: unknown[]): void {
  if (!debugEnabled) return;
  console.debug(...args);
}
