const DEBUG_NAMESPACE = 'culturegrid';

export function isDebugEnabled(): boolean {
  return Boolean(process.env.DEBUG?.includes(DEBUG_NAMESPACE));
}

/**
 * Writes a diagnostic line to stderr when `DEBUG` contains "culturegrid".
 */
export function debugLog(scope: string, message: string): void {
  if (!isDebugEnabled()) {
    return;
  }
  console.error(`[${DEBUG_NAMESPACE}:${scope}] ${message}`);
}
