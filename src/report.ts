/**
 * Progress and diagnostics go to stderr so stdout carries only results.
 */
export type Reporter = {
  info(message: string): void;
  warn(message: string): void;
};

export type ReporterOptions = {
  quiet?: boolean;
  write?: (line: string) => void;
};

export function createReporter(opts: ReporterOptions = {}): Reporter {
  const write = opts.write ?? ((line: string) => console.error(line));
  return {
    info(message) {
      if (!opts.quiet) write(message);
    },
    warn(message) {
      write(message);
    },
  };
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  const units = ["KB", "MB", "GB", "TB"];
  let value = bytes / 1024;
  let unitIndex = 0;
  while (value >= 1024 && unitIndex < units.length - 1) {
    value /= 1024;
    unitIndex += 1;
  }
  return `${value.toFixed(1)} ${units[unitIndex]}`;
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)} ms`;
  return `${(ms / 1000).toFixed(2)} s`;
}

/** Runs `fn` and reports `label` with the elapsed time once it settles. */
export async function timed<T>(
  reporter: Reporter,
  label: string,
  fn: () => T | Promise<T>,
): Promise<T> {
  const start = performance.now();
  const result = await fn();
  reporter.info(`${label} in ${formatDuration(performance.now() - start)}`);
  return result;
}
