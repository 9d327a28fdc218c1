import { mkdir, open, readFile, rename } from 'node:fs/promises';
import { dirname, isAbsolute, join } from 'node:path';
import { errorMessage, StateError, StateWriteError } from '../errors/custom-errors.js';
import { NotificationLevel } from '../notifications/notification-level.js';
import type { Notifier } from '../notifications/notifier.js';
import { createEmptyState, type EpisodeRecord, type State, StateSchema } from '../types/state.types.js';

/**
 * Optional fields of a completed episode record
 */
export type EpisodeDetails = Omit<EpisodeRecord, 'sourceUrl' | 'resolvedFilename' | 'completedAt'>;

/**
 * Durable record of completed episodes
 *
 * The state file is read once by `load()`. Completion marks are upserts:
 * each one rewrites the whole file through `<stateFile>.tmp` and a rename,
 * serialized by a per-file lock, and only touches the in-memory state once
 * the write has landed.
 *
 * Usage:
 *   const stateManager = new StateManager('./podsed-state.json', notifier);
 *   await stateManager.load();
 *   stateManager.isComplete(podcastId, sourceUrl);
 *   await stateManager.markComplete(podcastId, sourceUrl, resolvedFilename);
 */
export class StateManager {
  private static locks = new Map<string, Promise<void>>();

  private readonly statePath: string;
  private state: State = createEmptyState();

  constructor(
    statePath: string,
    private readonly notifier?: Notifier,
  ) {
    this.statePath = this.resolvePath(statePath);
  }

  getStatePath(): string {
    return this.statePath;
  }

  /**
   * Load state from file; a missing file is an empty state
   *
   * @throws StateError when the file is unreadable, not JSON or not a state file
   */
  async load(): Promise<void> {
    let content: string;
    try {
      content = await readFile(this.statePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.state = createEmptyState();
        this.notifier?.notify(NotificationLevel.DEBUG, `No state file at ${this.statePath}, starting empty`);
        return;
      }
      throw new StateError(`Failed to read state from ${this.statePath}: ${errorMessage(error)}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new StateError(`State file ${this.statePath} is not valid JSON: ${errorMessage(error)}`);
    }

    const parsed = StateSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw new StateError(`State file ${this.statePath} is invalid: ${issues.join('; ')}`);
    }

    this.state = parsed.data;
    this.notifier?.notify(
      NotificationLevel.DEBUG,
      `Loaded ${this.getDownloadedCount()} completed episode(s) from ${this.statePath}`,
    );
  }

  /**
   * Source URLs of the completed episodes of a podcast
   */
  completedKeys(podcastId: string): Set<string> {
    return new Set(Object.keys(this.state.podcasts[podcastId]?.episodes ?? {}));
  }

  isComplete(podcastId: string, sourceUrl: string): boolean {
    return this.getRecord(podcastId, sourceUrl) !== undefined;
  }

  getRecord(podcastId: string, sourceUrl: string): EpisodeRecord | undefined {
    return this.state.podcasts[podcastId]?.episodes[sourceUrl];
  }

  /**
   * Total completed episodes across all podcasts
   */
  getDownloadedCount(): number {
    return Object.values(this.state.podcasts).reduce(
      (total, podcast) => total + Object.keys(podcast.episodes).length,
      0,
    );
  }

  /**
   * Record an episode as completed and persist it
   *
   * @throws StateWriteError when the state file cannot be written; the
   * episode then stays unmarked
   */
  async markComplete(
    podcastId: string,
    sourceUrl: string,
    resolvedFilename: string,
    details: EpisodeDetails = {},
  ): Promise<void> {
    return this.withLock(async () => {
      const now = new Date().toISOString();
      const podcast = this.state.podcasts[podcastId];
      const record: EpisodeRecord = { ...details, sourceUrl, resolvedFilename, completedAt: now };

      const next: State = {
        ...this.state,
        podcasts: {
          ...this.state.podcasts,
          [podcastId]: { episodes: { ...podcast?.episodes, [sourceUrl]: record } },
        },
        lastUpdated: now,
      };

      await this.saveState(next);
      this.state = next;
    });
  }

  /**
   * Run `fn` after every earlier write to the same state file has settled
   */
  private async withLock<T>(fn: () => Promise<T>): Promise<T> {
    const previous = StateManager.locks.get(this.statePath) ?? Promise.resolve();
    const current = previous.then(fn);

    StateManager.locks.set(
      this.statePath,
      Promise.allSettled([current]).then(() => undefined),
    );

    return current;
  }

  /**
   * Write the full state to `<stateFile>.tmp`, flush it and rename it into place
   */
  private async saveState(state: State): Promise<void> {
    const tempPath = `${this.statePath}.tmp`;

    try {
      await mkdir(dirname(this.statePath), { recursive: true });

      const handle = await open(tempPath, 'w');
      try {
        await handle.writeFile(`${JSON.stringify(state, null, 2)}\n`, 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }

      await rename(tempPath, this.statePath);
    } catch (error) {
      throw new StateWriteError(`Failed to save state to ${this.statePath}: ${errorMessage(error)}`, this.statePath);
    }
  }

  /**
   * Resolve state path to absolute path
   */
  private resolvePath(statePath: string): string {
    if (isAbsolute(statePath)) {
      return statePath;
    }
    return join(process.cwd(), statePath);
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
