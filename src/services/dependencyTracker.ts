/**
 * Dependency Tracker
 * Reverse index from a prerequisite task id to the tasks parked on it.
 * A parked task becomes ready once every prerequisite it was parked on has
 * been resolved.
 */

export class DependencyTracker {
  /** prerequisite id -> tasks waiting on it */
  private readonly dependents = new Map<string, Set<string>>();
  /** task id -> prerequisites it still lacks, in declaration order */
  private readonly missing = new Map<string, Set<string>>();

  /**
   * Park `taskId` on the prerequisites `isSatisfied` rejects. Returns the
   * prerequisites still missing; an empty list means nothing was parked.
   */
  park(
    taskId: string,
    dependsOn: string[],
    isSatisfied: (dependencyId: string) => boolean = () => false,
  ): string[] {
    this.remove(taskId);

    const missing = dependsOn.filter((id) => !isSatisfied(id));
    if (missing.length === 0) {
      return [];
    }

    this.missing.set(taskId, new Set(missing));
    for (const dependencyId of missing) {
      let waiting = this.dependents.get(dependencyId);
      if (!waiting) {
        waiting = new Set();
        this.dependents.set(dependencyId, waiting);
      }
      waiting.add(taskId);
    }
    return missing;
  }

  /**
   * Mark `dependencyId` as available; returns the tasks it made ready
   */
  resolve(dependencyId: string): string[] {
    const waiting = this.dependents.get(dependencyId);
    if (!waiting) {
      return [];
    }
    this.dependents.delete(dependencyId);

    const ready: string[] = [];
    for (const taskId of waiting) {
      const missing = this.missing.get(taskId);
      if (!missing) continue;
      missing.delete(dependencyId);
      if (missing.size === 0) {
        this.missing.delete(taskId);
        ready.push(taskId);
      }
    }
    return ready;
  }

  remove(taskId: string): void {
    const missing = this.missing.get(taskId);
    if (!missing) {
      return;
    }
    this.missing.delete(taskId);
    for (const dependencyId of missing) {
      const waiting = this.dependents.get(dependencyId);
      if (!waiting) continue;
      waiting.delete(taskId);
      if (waiting.size === 0) {
        this.dependents.delete(dependencyId);
      }
    }
  }

  isParked(taskId: string): boolean {
    return this.missing.has(taskId);
  }

  missingFor(taskId: string): string[] {
    return Array.from(this.missing.get(taskId) ?? []);
  }

  dependentsOf(dependencyId: string): string[] {
    return Array.from(this.dependents.get(dependencyId) ?? []);
  }

  get size(): number {
    return this.missing.size;
  }
}
