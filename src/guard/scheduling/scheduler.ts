/**
 * Recurring task scheduling
 *
 * The engine asks a scheduler for a recurring tick instead of touching
 * platform timers directly, so hosts and tests can drive it however they like.
 */

export interface ScheduledTask {
  cancel(): void;
}

export interface Scheduler {
  schedule(intervalMs: number, task: () => void): ScheduledTask;
}

/** Default scheduler backed by `setInterval` */
export class IntervalScheduler implements Scheduler {
  schedule(intervalMs: number, task: () => void): ScheduledTask {
    let handle: NodeJS.Timeout | undefined = setInterval(task, intervalMs);
    return {
      cancel: () => {
        if (handle) {
          clearInterval(handle);
          handle = undefined;
        }
      },
    };
  }
}

/**
 * Scheduler that only runs its task when told to. Handy for hosts that
 * already own a loop.
 */
export class ManualScheduler implements Scheduler {
  private tasks = new Set<() => void>();

  schedule(_intervalMs: number, task: () => void): ScheduledTask {
    this.tasks.add(task);
    return {
      cancel: () => {
        this.tasks.delete(task);
      },
    };
  }

  /** Runs every scheduled task once */
  runOnce(): void {
    for (const task of [...this.tasks]) {
      task();
    }
  }

  pendingTasks(): number {
    return this.tasks.size;
  }
}
