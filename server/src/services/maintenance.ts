import type { TaskService } from './taskService'
import { getLogger } from '../lib/logger'

const log = getLogger('worker')

/**
 * Prune terminal tasks past retention: once at start, then every `intervalMs`.
 * Returns a stop function.
 */
export function startTaskCleanup(tasks: TaskService, retentionMs: number, intervalMs: number): () => void {
  let running = false
  const cleanup = () => {
    if (running) return
    running = true
    tasks
      .pruneExpired(retentionMs)
      .then((removed) => {
        if (removed > 0) log.info({ msg: 'Task cleanup: pruned expired tasks', removed })
      })
      .catch((err) => log.error({ msg: 'Task cleanup failed', err }))
      .finally(() => {
        running = false
      })
  }

  cleanup()
  const timer = setInterval(cleanup, intervalMs)
  timer.unref()
  return () => clearInterval(timer)
}
