import { QueueFullError } from "./errors.js";

interface QueueEntry {
  run: () => void;
}

export interface QueueStats {
  active: number;
  queued: number;
}

const waiting: QueueEntry[] = [];
let active = 0;
let maxConcurrent = 2;
let maxQueued = 20;

export function initializeQueue(limits: { maxConcurrent: number; maxQueued: number }): void {
  maxConcurrent = limits.maxConcurrent;
  maxQueued = limits.maxQueued;
  console.log(`[pdf-unlocker] Job queue initialized: ${maxConcurrent} concurrent, ${maxQueued} queued.`);
}

export function getQueueStats(): QueueStats {
  return { active, queued: waiting.length };
}

function startNext(): void {
  while (active < maxConcurrent && waiting.length > 0) {
    const entry = waiting.shift();
    if (entry === undefined) {
      return;
    }
    entry.run();
  }
}

// Each PDF job spawns external tools, so only a few run at once; the rest wait
// in FIFO order and are refused once the queue is full.
export function enqueueJob<T>(task: () => Promise<T>): Promise<T> {
  if (active >= maxConcurrent && waiting.length >= maxQueued) {
    return Promise.reject(new QueueFullError(waiting.length));
  }

  return new Promise<T>((resolve, reject) => {
    const entry: QueueEntry = {
      run: () => {
        active++;
        void Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(() => {
            active--;
            startNext();
          });
      },
    };

    if (active < maxConcurrent) {
      entry.run();
    } else {
      waiting.push(entry);
    }
  });
}
