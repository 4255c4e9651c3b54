/**
 * Task: Profile Autosave
 * Saves a profile once its save interval has elapsed
 */

export interface AutosaveTarget {
  readonly ownerId: string;
  /** Time of the last successful save (ms) */
  readonly lastSave: number;
  readonly isPersistent: boolean;
  save(): Promise<boolean>;
}

export interface AutosaveConfig {
  saveIntervalMs: number;
  now?: () => number;
}

/**
 * Create the periodic handler for one profile
 */
export function createAutosaveTask(target: AutosaveTarget, config: AutosaveConfig) {
  const now = config.now ?? Date.now;

  return async (): Promise<void> => {
    if (!target.isPersistent) {
      return;
    }
    if (now() - target.lastSave < config.saveIntervalMs) {
      return;
    }

    const saved = await target.save();
    if (!saved) {
      throw new Error(`Autosave failed for ${target.ownerId}`);
    }
  };
}
