import { config } from '../config';

// One-time guidance warnings, emitted only when `config.warnings` is on.
const seen = new Set<string>();

export function onceWarn(key: string, message: string) {
  if (!config.warnings || seen.has(key)) return;
  // eslint-disable-next-line no-console
  console.warn(message);
  seen.add(key);
}

/** Forget which warnings were already emitted (tests toggle `config.warnings`). */
export function resetWarnings() {
  seen.clear();
}
