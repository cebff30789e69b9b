/**
 * TaskRegistry - persistent agent → task mapping
 *
 * The registry lives for the whole process (singleton in the container) and is
 * emptied only by a restart. Mutation happens exclusively inside `withLock()`:
 * entries obtained there are views that stop working once the lock is released,
 * and trying to take the lock twice is a programming error.
 *
 * @module core
 */

import { injectable } from "inversify";
import { EntryState } from "../../../shared/constants/TaskEnums";
import type { TaskHandle } from "../../../shared/types/simulation/tasks";
import type { AgentId } from "../../../shared/types/simulation/world";

export interface OccupiedEntry {
  readonly state: EntryState.OCCUPIED;
  readonly agentId: AgentId;
  readonly task: TaskHandle;
  /** Evicts the task and returns it. */
  remove(): TaskHandle;
}

export interface VacantEntry {
  readonly state: EntryState.VACANT;
  readonly agentId: AgentId;
  insert(task: TaskHandle): TaskHandle;
}

export type RegistryEntry = OccupiedEntry | VacantEntry;

/**
 * Mutable view of the registry handed to the `withLock` callback.
 */
export interface LockedTaskRegistry {
  entry(agentId: AgentId): RegistryEntry;
  /** Snapshot of the ids currently holding a task. */
  agentIds(): AgentId[];
  /** Drops the entries of agents `isAlive` rejects; returns their ids. */
  prune(isAlive: (agentId: AgentId) => boolean): AgentId[];
  readonly size: number;
}

@injectable()
export class TaskRegistry {
  private readonly tasks = new Map<AgentId, TaskHandle>();
  private lockDepth = 0;
  private lockGeneration = 0;

  /**
   * Runs `fn` with exclusive access to the registry entries.
   *
   * @throws Error when the lock is already held
   */
  public withLock<T>(fn: (registry: LockedTaskRegistry) => T): T {
    if (this.lockDepth > 0) {
      throw new Error("TaskRegistry lock is already held");
    }

    this.lockDepth++;
    const generation = ++this.lockGeneration;
    try {
      return fn(this.createLockedView(generation));
    } finally {
      this.lockDepth--;
    }
  }

  public isLocked(): boolean {
    return this.lockDepth > 0;
  }

  /** Read-only lookup, usable outside the lock. */
  public get(agentId: AgentId): TaskHandle | undefined {
    return this.tasks.get(agentId);
  }

  public get size(): number {
    return this.tasks.size;
  }

  /** Copy of the current mapping, for reports and tests. */
  public snapshot(): Map<AgentId, TaskHandle> {
    return new Map(this.tasks);
  }

  /**
   * Empties the registry. Only a process restart does this in production.
   *
   * @throws Error when called while the lock is held
   */
  public clear(): void {
    if (this.isLocked()) {
      throw new Error("TaskRegistry cannot be cleared while locked");
    }
    this.tasks.clear();
  }

  private createLockedView(generation: number): LockedTaskRegistry {
    const tasks = this.tasks;
    const assertHeld = (): void => {
      if (this.lockDepth === 0 || this.lockGeneration !== generation) {
        throw new Error("TaskRegistry entry used outside of its lock");
      }
    };

    return {
      entry: (agentId) => {
        assertHeld();
        return this.createEntry(agentId, assertHeld);
      },
      agentIds: () => {
        assertHeld();
        return Array.from(tasks.keys());
      },
      prune: (isAlive) => {
        assertHeld();
        const removed: AgentId[] = [];
        for (const agentId of Array.from(this.tasks.keys())) {
          if (!isAlive(agentId)) {
            this.tasks.delete(agentId);
            removed.push(agentId);
          }
        }
        return removed;
      },
      get size() {
        assertHeld();
        return tasks.size;
      },
    };
  }

  private createEntry(agentId: AgentId, assertHeld: () => void): RegistryEntry {
    const task = this.tasks.get(agentId);

    if (task !== undefined) {
      return {
        state: EntryState.OCCUPIED,
        agentId,
        task,
        remove: () => {
          assertHeld();
          if (this.tasks.get(agentId) !== task) {
            throw new Error(`TaskRegistry entry for ${agentId} is stale`);
          }
          this.tasks.delete(agentId);
          return task;
        },
      };
    }

    return {
      state: EntryState.VACANT,
      agentId,
      insert: (newTask) => {
        assertHeld();
        if (this.tasks.has(agentId)) {
          throw new Error(`TaskRegistry entry for ${agentId} is already occupied`);
        }
        this.tasks.set(agentId, newTask);
        return newTask;
      },
    };
  }
}
