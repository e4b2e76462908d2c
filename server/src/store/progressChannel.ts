import type { ProgressReporter } from '../models/Provider'
import type { TaskStore } from './TaskStore'
import { getLogger } from '../lib/logger'

const log = getLogger('worker')

interface Stream {
  seq: number
  tail: Promise<void>
  closed: boolean
}

/**
 * Ordered progress path from provider bindings to the Task Store. Each report is stamped with the next
 * sequence number for its task and applied after the previous one, so writes land in report order;
 * the store drops anything stale or lower than what it already holds.
 */
export class ProgressChannel {
  private readonly streams = new Map<string, Stream>()

  constructor(private readonly store: TaskStore) {}

  /**
   * Reporter for one attempt. `lastSeq` is the task's persisted progressSeq. The reporter goes dead
   * once the attempt is closed, so a binding that keeps reporting after a timeout cannot touch a later attempt.
   */
  open(taskId: string, lastSeq: number): ProgressReporter {
    const previous = this.streams.get(taskId)
    if (previous) previous.closed = true
    const stream: Stream = { seq: Math.max(lastSeq, previous?.seq ?? 0), tail: previous?.tail ?? Promise.resolve(), closed: false }
    this.streams.set(taskId, stream)

    return (progress: number) => {
      if (stream.closed || !Number.isFinite(progress)) return
      stream.seq += 1
      const seq = stream.seq
      stream.tail = stream.tail.then(async () => {
        try {
          await this.store.applyProgress(taskId, progress, seq)
        } catch (err) {
          log.warn({ msg: 'Progress write failed', taskId, seq, err })
        }
      })
    }
  }

  /** Stop accepting reports for the task's current attempt and wait for queued ones to land. */
  async close(taskId: string): Promise<void> {
    const stream = this.streams.get(taskId)
    if (!stream) return
    stream.closed = true
    await stream.tail
    if (this.streams.get(taskId) === stream) this.streams.delete(taskId)
  }
}
