const debugEnabled = process.env.LOG_LEVEL === 'debug';

export function log(message: string): void {
  const ts = new Date().toISOString().replace('T', ' ').replace(/\.\d+Z/, '');
  console.log(`[${ts}] ${message}`);
}

/** Verbose line, only written when LOG_LEVEL=debug. */
export function debug(message: string): void {
  if (debugEnabled) log(message);
}
