/**
 * Keep stdout for protocol output only.
 *
 * Anything a dependency prints through console.log/info/debug is sent to
 * stderr instead, where the rest of our diagnostics go.
 */

function toStderr(...args: unknown[]): void {
  console.error(...args);
}

for (const method of ['log', 'info', 'debug'] as const) {
  if (console[method] !== toStderr) console[method] = toStderr;
}
