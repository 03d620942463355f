/**
 * Task status bookkeeping for one run.
 *
 *   pending → running → succeeded | failed | skipped
 *   pending → skipped
 *
 * Terminal results are frozen. Any other move is a programming error and
 * throws InvalidTaskTransitionError.
 */

import { InvalidTaskTransitionError, type TaskError } from '../errors.js';
import type { ILogProvider, TaskLogEvent } from '../providers/ILogProvider.js';

export type TaskStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'skipped';

export const TERMINAL_STATUSES: readonly TaskStatus[] = ['succeeded', 'failed', 'skipped'];

export interface TaskResult {
  readonly name: string;
  readonly status: TaskStatus;
  readonly payload?: unknown;
  readonly error?: TaskError;
  /** Why a skipped task never ran. */
  readonly skipReason?: string;
  readonly durationMs: number;
  readonly startedAt?: string;
  readonly finishedAt?: string;
}

export type TaskUpdateListener = (result: TaskResult) => void;

const ALLOWED: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ['running', 'skipped'],
  running: ['succeeded', 'failed', 'skipped'],
  succeeded: [],
  failed: [],
  skipped: [],
};

export function isTerminal(status: TaskStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export class TaskLedger {
  private readonly results = new Map<string, TaskResult>();
  private readonly startTimes = new Map<string, number>();

  constructor(
    private readonly logger: ILogProvider,
    private readonly opts?: { onTaskUpdate?: TaskUpdateListener; now?: () => number }
  ) {}

  register(name: string): TaskResult {
    if (this.results.has(name)) {
      throw new InvalidTaskTransitionError(name, this.status(name), 'pending');
    }
    return this.record({ name, status: 'pending', durationMs: 0 });
  }

  start(name: string): TaskResult {
    const current = this.transition(name, 'running');
    const now = this.now();
    this.startTimes.set(name, now);
    return this.record({ ...current, status: 'running', startedAt: new Date(now).toISOString() });
  }

  succeed(name: string, payload?: unknown): TaskResult {
    const current = this.transition(name, 'succeeded');
    return this.finish({ ...current, status: 'succeeded', ...(payload !== undefined && { payload }) });
  }

  fail(name: string, error: TaskError): TaskResult {
    const current = this.transition(name, 'failed');
    return this.finish({ ...current, status: 'failed', error });
  }

  skip(name: string, reason: string): TaskResult {
    const current = this.transition(name, 'skipped');
    return this.finish({ ...current, status: 'skipped', skipReason: reason });
  }

  get(name: string): TaskResult | undefined {
    return this.results.get(name);
  }

  status(name: string): TaskStatus {
    const result = this.results.get(name);
    if (!result) throw new Error(`Unknown task "${name}"`);
    return result.status;
  }

  /** Every task not yet terminal, in registration order. */
  open(): string[] {
    return [...this.results.values()].filter((r) => !isTerminal(r.status)).map((r) => r.name);
  }

  snapshot(): Record<string, TaskResult> {
    return Object.fromEntries(this.results);
  }

  private transition(name: string, to: TaskStatus): TaskResult {
    const current = this.results.get(name);
    if (!current) throw new Error(`Unknown task "${name}"`);
    if (!ALLOWED[current.status].includes(to)) {
      throw new InvalidTaskTransitionError(name, current.status, to);
    }
    return current;
  }

  private finish(result: TaskResult): TaskResult {
    const now = this.now();
    const started = this.startTimes.get(result.name);
    return this.record(
      Object.freeze({
        ...result,
        durationMs: started === undefined ? 0 : now - started,
        finishedAt: new Date(now).toISOString(),
      })
    );
  }

  private record(result: TaskResult): TaskResult {
    this.results.set(result.name, result);

    const event: TaskLogEvent = {
      level: result.status === 'failed' ? 'error' : result.status === 'skipped' ? 'warn' : 'info',
      message: `Task ${result.name} ${result.status}`,
      task: result.name,
      status: result.status,
      ...(isTerminal(result.status) && { durationMs: result.durationMs }),
      fields: {
        ...(result.error && { code: result.error.code, error: result.error.message }),
        ...(result.skipReason !== undefined && { reason: result.skipReason }),
      },
    };
    this.logger.log(event);
    this.notify(result);
    return result;
  }

  /** A failing listener is logged; it never changes a task's outcome. */
  private notify(result: TaskResult): void {
    const listener = this.opts?.onTaskUpdate;
    if (!listener) return;
    try {
      listener(result);
    } catch (err) {
      this.logger.error('Task update listener failed', {
        task: result.name,
        status: result.status,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private now(): number {
    return this.opts?.now?.() ?? Date.now();
  }
}
