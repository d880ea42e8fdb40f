type StdStream = typeof process.stdout | typeof process.stderr;

function forceIsTty(stream: StdStream, value: boolean | undefined): void {
  Object.defineProperty(stream, 'isTTY', { value, configurable: true, writable: true });
}

/**
 * Marks stdout and stderr as non-terminals so rendered lines carry no colour
 * codes. Returns the function restoring the previous state.
 */
export function disableTty(): () => void {
  const stdout = process.stdout.isTTY;
  const stderr = process.stderr.isTTY;
  forceIsTty(process.stdout, false);
  forceIsTty(process.stderr, false);
  return () => {
    forceIsTty(process.stdout, stdout);
    forceIsTty(process.stderr, stderr);
  };
}
