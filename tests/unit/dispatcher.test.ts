/**
 * Unit tests for the delivery dispatcher
 *
 * @module tests/unit/dispatcher
 */

import { describe, it, expect, vi } from 'vitest'
import { fileURLToPath } from 'node:url'
import { createDispatcher, shouldPush, type DeliveryOutcome } from '../../lib/delivery/dispatcher.js'
import { createCommandRecorder } from '../helpers/command-recorder.js'
import type { GitDeliveryConfig } from '../../types/domain.js'

const git = (overrides: Partial<GitDeliveryConfig> = {}): GitDeliveryConfig => ({
  kind: 'git',
  repoDir: '/srv/repo',
  remote: 'origin',
  branch: 'main',
  push: true,
  pushEvery: 1,
  ...overrides,
})

describe('shouldPush', () => {
  it('pushes every capture when pushEvery is 1', () => {
    expect([1, 2, 3].map((n) => shouldPush(n, 1))).toEqual([true, true, true])
  })

  it('pushes on captures 1, N+1, 2N+1', () => {
    expect([1, 2, 3, 4, 5, 6, 7].map((n) => shouldPush(n, 3))).toEqual([
      true,
      false,
      false,
      true,
      false,
      false,
      true,
    ])
  })
})

describe('createDispatcher', () => {
  it('returns nothing when delivery is off', () => {
    expect(createDispatcher({ kind: 'none' })).toBeUndefined()
  })

  it('batches git pushes', async () => {
    const { run, calls } = createCommandRecorder({ diff: { exitCode: 1 } })
    const dispatcher = createDispatcher(git({ pushEvery: 2 }), { runCommand: run })

    const outcomes: Array<DeliveryOutcome | undefined> = []
    for (const sequence of [1, 2, 3, 4]) {
      outcomes.push(await dispatcher?.deliver({ filePath: `/srv/repo/${sequence}.png`, sequence, message: 'm' }))
    }

    expect(dispatcher?.mode).toBe('git')
    expect(outcomes).toEqual(['pushed', 'committed', 'pushed', 'committed'])
    expect(calls.filter((call) => call.args[0] === 'push')).toHaveLength(2)
  })

  it('never pushes when push is disabled', async () => {
    const { run, calls } = createCommandRecorder({ diff: { exitCode: 1 } })
    const dispatcher = createDispatcher(git({ push: false }), { runCommand: run })

    await dispatcher?.deliver({ filePath: '/srv/repo/1.png', sequence: 1, message: 'm' })

    expect(calls.map((call) => call.args[0])).toEqual(['rev-parse', 'add', 'diff', 'commit'])
  })

  it('reports http uploads', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => new Response('ok'))
    const dispatcher = createDispatcher(
      { kind: 'http', url: 'http://upload.test/in', headers: [], method: 'POST', fieldName: 'file' },
      { fetch: fetchMock }
    )

    const outcome = await dispatcher?.deliver({
      filePath: fileURLToPath(import.meta.url),
      sequence: 1,
      message: 'm',
    })

    expect(dispatcher?.mode).toBe('http')
    expect(outcome).toBe('uploaded')
    expect(fetchMock).toHaveBeenCalledTimes(1)
  })
})
