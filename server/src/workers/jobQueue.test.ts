import { describe, it, expect } from 'vitest'
import { InProcessJobQueue } from './jobQueue'
import type { JobPayload } from './jobQueue'
import type { JobSnapshot } from '../models/Job'

function doneSnapshot(jobId: string): JobSnapshot {
  return {
    jobId,
    locator: 'l',
    profiles: ['MP3 128kbps'],
    outputDirectory: '/tmp',
    status: 'completed',
    totalSteps: 2,
    completedSteps: 2,
    progress: 100,
    phase: 'Conversion completed!',
    log: [],
    completed: true,
    outputs: [],
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
  }
}

describe('InProcessJobQueue', () => {
  it('holds jobs until a handler starts, then runs them in order, one at a time', async () => {
    const queue = new InProcessJobQueue()
    const events: string[] = []
    await queue.enqueue({ jobId: 'a' })
    await queue.enqueue({ jobId: 'b' })
    expect(await queue.depth()).toBe(2)

    queue.start(async ({ jobId }: JobPayload) => {
      events.push(`start ${jobId}`)
      await new Promise((r) => setTimeout(r, 5))
      events.push(`end ${jobId}`)
      return doneSnapshot(jobId)
    })
    await queue.enqueue({ jobId: 'c' })
    await queue.idle()

    expect(events).toEqual(['start a', 'end a', 'start b', 'end b', 'start c', 'end c'])
    expect(await queue.depth()).toBe(0)
  })

  it('keeps going after a handler throws', async () => {
    const queue = new InProcessJobQueue()
    const ran: string[] = []
    queue.start(async ({ jobId }) => {
      ran.push(jobId)
      if (jobId === 'bad') throw new Error('crash')
      return doneSnapshot(jobId)
    })
    await queue.enqueue({ jobId: 'bad' })
    await queue.enqueue({ jobId: 'good' })
    await queue.idle()
    expect(ran).toEqual(['bad', 'good'])
  })

  it('refuses work once closed', async () => {
    const queue = new InProcessJobQueue()
    await queue.close()
    await expect(queue.enqueue({ jobId: 'x' })).rejects.toThrow('Queue is closed')
  })
})
