import type { Preferences, RunState } from '../shared/types.js';
import { loadRunState, saveRunState, type LoadedRunState } from './state-file.js';

export interface RunStatePersistence {
  load(): Promise<LoadedRunState>;
  save(state: RunState): Promise<void>;
}

/** Config preferences seed a fresh state and overwrite the stored ones on load. */
export function createFileStatePersistence(filePath: string, preferences: Preferences): RunStatePersistence {
  return {
    async load() {
      const loaded = await loadRunState(filePath, preferences);
      loaded.state.preferences = { ...preferences };
      return loaded;
    },
    save: (state) => saveRunState(filePath, state),
  };
}
