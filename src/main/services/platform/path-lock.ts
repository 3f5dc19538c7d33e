import { resolve } from 'path'
import PQueue from 'p-queue'

const queues = new Map<string, PQueue>()

function queueFor(filePath: string): PQueue {
  const key = resolve(filePath)
  let queue = queues.get(key)
  if (!queue) {
    queue = new PQueue({ concurrency: 1 })
    queues.set(key, queue)
  }
  return queue
}

/**
 * Runs `task` once every earlier task for the same path has settled.
 *
 * All callers in the process share one queue per resolved path, so two
 * store instances pointed at the same file still take turns. Tasks are
 * never aborted once queued.
 */
export function withPathLock<T>(filePath: string, task: () => Promise<T>): Promise<T> {
  return queueFor(filePath).add<T>(task, { throwOnTimeout: true })
}

/** Number of tasks queued or running for `filePath`. */
export function pendingFor(filePath: string): number {
  const queue = queues.get(resolve(filePath))
  return queue ? queue.size + queue.pending : 0
}
