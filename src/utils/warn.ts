const warned = new Set<string>();

/** console.warn the first time `key` is seen in this process; later calls are no-ops. */
export function warnOnce(key: string, message: string): void {
  if (warned.has(key)) return;
  warned.add(key);
  console.warn(message);
}
