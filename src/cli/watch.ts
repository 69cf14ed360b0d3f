import { watch, type FSWatcher } from 'chokidar';

export interface WatchOptions {
  /** Quiet period before a burst of changes triggers one re-run */
  debounceMs?: number;
}

/**
 * Watch one source file and re-run the analysis when it changes.
 *
 * Re-runs are debounced: rapid saves are batched into a single pass, and
 * changes that arrive while a pass is running queue exactly one more.
 */
export function startWatcher(
  filePath: string,
  rerun: () => Promise<void>,
  options: WatchOptions = {}
): FSWatcher {
  const debounceMs = options.debounceMs ?? 500;

  const watcher = watch(filePath, {
    ignoreInitial: true,
    awaitWriteFinish: {
      stabilityThreshold: 300,
      pollInterval: 100,
    },
  });

  let debounceTimer: NodeJS.Timeout | null = null;
  let analyzing = false;
  let pending = false;

  const runPass = async (): Promise<void> => {
    analyzing = true;
    pending = false;
    const start = Date.now();
    try {
      await rerun();
      console.log(`[watch] Analysis complete in ${Date.now() - start}ms`);
    } catch (err) {
      console.error('[watch] Analysis failed:', err instanceof Error ? err.message : String(err));
    } finally {
      analyzing = false;

      // If the file changed again while analyzing, trigger again
      if (pending) {
        triggerAnalysis('queued');
      }
    }
  };

  const triggerAnalysis = (event: string) => {
    pending = true;
    if (analyzing) return;

    if (debounceTimer) {
      clearTimeout(debounceTimer);
    }

    debounceTimer = setTimeout(() => {
      debounceTimer = null;
      console.log(`[watch] ${event}: ${filePath}, re-analyzing...`);
      void runPass();
    }, debounceMs);
  };

  watcher.on('change', () => triggerAnalysis('changed'));
  watcher.on('add', () => triggerAnalysis('added'));
  watcher.on('unlink', () => {
    console.log(`[watch] removed: ${filePath}, waiting for it to come back`);
  });

  console.log(`[watch] Watching ${filePath} for changes...`);
  return watcher;
}
