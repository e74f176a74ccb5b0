import pc from 'picocolors';

export type ComposeStats = {
  kept: number;
  dropped: number;
};

/**
 * Log a composed source map that was written to disk.
 */
export function logComposed(scope: string, outputPath: string, stats: ComposeStats): void {
  const scopeLabel = pc.cyan(`[${scope}]`);
  const message = pc.green('✓') + ` Composed ${pc.bold(outputPath)}`;
  const detail = pc.dim(`${stats.kept} mapped, ${stats.dropped} dropped`);
  console.log(`${scopeLabel} ${message} ${detail}`);
}

/**
 * Log a source map that was not processed.
 */
export function logSkipped(scope: string, message: string): void {
  const scopeLabel = pc.yellow(`[${scope}]`);
  console.warn(`${scopeLabel} ${pc.yellow('-')} ${message}`);
}

/**
 * Log an error.
 */
export function logError(scope: string, message: string, error?: unknown): void {
  const scopeLabel = pc.red(`[${scope}]`);
  console.error(`${scopeLabel} ${pc.red('✗')} ${message}`);
  if (error instanceof Error) {
    console.error(pc.dim(error.stack ?? error.message));
  } else if (error !== undefined) {
    console.error(pc.dim(String(error)));
  }
}
