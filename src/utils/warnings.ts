const runtimeWarnings: string[] = [];

/**
 * Reset process-level warning state at the beginning of each CLI invocation.
 */
export function resetWarnings(): void {
  runtimeWarnings.length = 0;
}

/**
 * Register a non-fatal warning. It is echoed to stderr right away and attached
 * to the next structured response.
 */
export function addWarning(message: string): void {
  const normalized = message.trim();
  if (normalized.length === 0) return;
  if (runtimeWarnings.includes(normalized)) return;
  runtimeWarnings.push(normalized);
  process.stderr.write(`Warning: ${normalized}\n`);
}

/**
 * Read and clear all currently captured warnings.
 */
export function consumeWarnings(): string[] {
  if (runtimeWarnings.length === 0) return [];
  const current = [...runtimeWarnings];
  runtimeWarnings.length = 0;
  return current;
}
