/**
 * Console helpers shared by the CLI commands
 */

const CORE_TAGS = ['[Receiver]', '[Collector]', '[Sessions]', '[Decompress]'];

/**
 * Progress logger: stderr, or a no-op when quiet
 */
export function progressLog(quiet: boolean | undefined): (...args: unknown[]) => void {
  return quiet ? () => {} : console.error.bind(console);
}

/**
 * Suppress the tagged debug logs of the core while `fn` runs
 */
export function withCoreLogsMuted<T>(mute: boolean | undefined, fn: () => T): T {
  if (!mute) return fn();

  const originalLog = console.log;
  const originalWarn = console.warn;
  const filter = (original: (...args: unknown[]) => void) => (...args: unknown[]) => {
    const msg = args[0];
    if (typeof msg === 'string' && CORE_TAGS.some(tag => msg.startsWith(tag))) {
      return;
    }
    original.apply(console, args);
  };

  console.log = filter(originalLog);
  console.warn = filter(originalWarn);
  try {
    return fn();
  } finally {
    console.log = originalLog;
    console.warn = originalWarn;
  }
}
