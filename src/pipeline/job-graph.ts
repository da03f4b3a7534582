/**
 * Job Graph: runs jobs in dependency order with bounded fan-out.
 *
 * A job starts once every job it needs has finished. When any of those did
 * not succeed the job is skipped without running. An error thrown by a job
 * fails that job only.
 */

import { JobGraphError, errorMessage } from './errors.js';

// ─── Types ───────────────────────────────────────────────

export type JobStatus = 'success' | 'failed' | 'skipped';

export interface JobVerdict {
  status: JobStatus;
  reason?: string;
}

export interface Job {
  id: string;
  /** Ids of jobs that must succeed first */
  needs: readonly string[];
  run(): Promise<JobVerdict>;
}

export interface JobOutcome {
  id: string;
  status: JobStatus;
  reason?: string;
  /** Set when the job threw */
  error?: Error;
  durationMs: number;
}

export interface RunJobGraphOptions {
  /** Max jobs running at once; unbounded when omitted or not positive */
  concurrency?: number;
  onJobStart?: (id: string) => void;
  onJobComplete?: (outcome: JobOutcome) => void;
}

// ─── Planning ────────────────────────────────────────────

/**
 * Validate the graph and return a topological order (Kahn's algorithm).
 * Jobs with no ordering between them keep their input order.
 */
export function planJobGraph(jobs: readonly Job[]): string[] {
  const inDegree = new Map<string, number>();
  const dependents = new Map<string, string[]>();

  for (const job of jobs) {
    if (inDegree.has(job.id)) {
      throw new JobGraphError(`Duplicate job id: ${job.id}`);
    }
    inDegree.set(job.id, 0);
    dependents.set(job.id, []);
  }

  for (const job of jobs) {
    for (const dep of job.needs) {
      const next = dependents.get(dep);
      if (!next) {
        throw new JobGraphError(`Job ${job.id} needs unknown job ${dep}`);
      }
      next.push(job.id);
      inDegree.set(job.id, (inDegree.get(job.id) ?? 0) + 1);
    }
  }

  const queue: string[] = [];
  for (const [id, degree] of inDegree) {
    if (degree === 0) queue.push(id);
  }

  const order: string[] = [];
  for (let current = queue.shift(); current !== undefined; current = queue.shift()) {
    order.push(current);
    for (const dependent of dependents.get(current) ?? []) {
      const degree = (inDegree.get(dependent) ?? 0) - 1;
      inDegree.set(dependent, degree);
      if (degree === 0) queue.push(dependent);
    }
  }

  if (order.length !== jobs.length) {
    const cyclic = jobs.filter((j) => !order.includes(j.id)).map((j) => j.id);
    throw new JobGraphError(`Dependency cycle among jobs: ${cyclic.join(', ')}`);
  }

  return order;
}

// ─── Execution ───────────────────────────────────────────

async function executeJob(job: Job, options: RunJobGraphOptions): Promise<JobOutcome> {
  const startTime = Date.now();
  options.onJobStart?.(job.id);

  try {
    const verdict = await job.run();
    return {
      id: job.id,
      status: verdict.status,
      reason: verdict.reason,
      durationMs: Date.now() - startTime,
    };
  } catch (error) {
    return {
      id: job.id,
      status: 'failed',
      reason: errorMessage(error),
      error: error instanceof Error ? error : new Error(String(error)),
      durationMs: Date.now() - startTime,
    };
  }
}

/**
 * Run every job once. Resolves when all jobs are terminal with one outcome
 * per job, in completion order. Rejects only for a malformed graph.
 */
export async function runJobGraph(
  jobs: readonly Job[],
  options: RunJobGraphOptions = {},
): Promise<Map<string, JobOutcome>> {
  const order = planJobGraph(jobs);
  const byId = new Map(jobs.map((j) => [j.id, j]));
  const limit = options.concurrency && options.concurrency > 0 ? options.concurrency : Infinity;

  const pending = new Set(order);
  const running = new Set<Promise<void>>();
  const outcomes = new Map<string, JobOutcome>();

  const settle = (outcome: JobOutcome): void => {
    outcomes.set(outcome.id, outcome);
    options.onJobComplete?.(outcome);
  };

  // Skip or start whatever is ready; true when anything changed
  const schedule = (): boolean => {
    let changed = false;
    for (const id of [...pending]) {
      const job = byId.get(id);
      if (!job) continue;
      if (!job.needs.every((dep) => outcomes.has(dep))) continue;

      const blocked = job.needs.filter((dep) => outcomes.get(dep)?.status !== 'success');
      if (blocked.length > 0) {
        pending.delete(id);
        settle({ id, status: 'skipped', reason: `Dependency did not succeed: ${blocked.join(', ')}`, durationMs: 0 });
        changed = true;
        continue;
      }

      if (running.size >= limit) continue;
      pending.delete(id);
      const task: Promise<void> = executeJob(job, options)
        .then(settle)
        .finally(() => running.delete(task));
      running.add(task);
      changed = true;
    }
    return changed;
  };

  while (pending.size > 0) {
    if (schedule()) continue;
    if (running.size === 0) {
      // unreachable for a planned graph
      throw new JobGraphError(`Jobs can never start: ${[...pending].join(', ')}`);
    }
    await Promise.race(running);
  }
  await Promise.all(running);

  return outcomes;
}
