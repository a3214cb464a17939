import { KeyedMutex } from "./keyed-mutex";
import type { ProjectPersistence, ProjectState } from "./project-state";

/**
 * Single entry point for every write to a project document.
 *
 * `withProjectLock` loads the latest persisted state under a per-project lock,
 * lets `fn` mutate it, then saves it. If `fn` throws nothing is saved; if the
 * save throws the lock is still released and the error reaches the caller.
 * Other callers always re-load, so an unsaved mutation is never observed.
 */
export class ProjectStateStore {
  private readonly locks = new KeyedMutex();

  constructor(private readonly persistence: ProjectPersistence) {}

  /** Unguarded read for display. Never base a later write on it. */
  read(projectId: string): Promise<ProjectState> {
    return this.persistence.load(projectId);
  }

  withProjectLock<T>(projectId: string, fn: (state: ProjectState) => T | Promise<T>): Promise<T> {
    return this.locks.runExclusive(projectId, async () => {
      const state = await this.persistence.load(projectId);
      const result = await fn(state);
      await this.persistence.save(projectId, state);
      return result;
    });
  }

  isLocked(projectId: string): boolean {
    return this.locks.isLocked(projectId);
  }
}
