import { setTimeout as sleep } from 'timers/promises'
import { ConflictError, TransientStoreError } from '../src/common/errors'
import { initialTrainingState } from '../src/adaptation/strike-rules'
import { InMemoryTrainingStore } from '../src/training-store/in-memory-training-store'
import type { WorkoutQuery } from '../src/training-store/training-store.types'
import { makePlan, makeUser, makeWorkout, readPlanWorkouts, seedPlan } from './helpers/engine.fixture'

const OPTS = { timeoutMs: 1000 }

describe('InMemoryTrainingStore', () => {
  let store: InMemoryTrainingStore

  beforeEach(async () => {
    store = new InMemoryTrainingStore()
    await seedPlan(store, makePlan(), [makeWorkout({ id: 'w1', scheduledDate: '2026-10-20' })])
  })

  it('discards every write of a failed transaction', async () => {
    await expect(
      store.withUserTransaction(
        'athlete-1',
        async (tx) => {
          await tx.saveUser(makeUser({ gender: 'other' }))
          await tx.deleteWorkout('w1')
          throw new Error('boom')
        },
        OPTS,
      ),
    ).rejects.toThrow('boom')

    const user = await store.withUserTransaction('athlete-1', (tx) => tx.getUser('athlete-1'), OPTS)
    expect(user?.gender).toBeNull()
    expect((await readPlanWorkouts(store, 'athlete-1', 'plan-1')).map((w) => w.id)).toEqual(['w1'])
  })

  it('returns copies that callers cannot mutate into the store', async () => {
    const row = await store.withUserTransaction('athlete-1', (tx) => tx.getWorkout('w1'), OPTS)
    if (row) row.status = 'completed'
    const again = await store.withUserTransaction('athlete-1', (tx) => tx.getWorkout('w1'), OPTS)
    expect(again?.status).toBe('planned')
  })

  it('rejects stale workout versions', async () => {
    const updated = await store.withUserTransaction(
      'athlete-1',
      async (tx) => {
        const w = await tx.getWorkout('w1')
        if (!w) throw new Error('missing')
        return tx.updateWorkout({ ...w, status: 'completed' })
      },
      OPTS,
    )
    expect(updated.version).toBe(1)

    await expect(
      store.withUserTransaction(
        'athlete-1',
        (tx) => tx.updateWorkout(makeWorkout({ id: 'w1', scheduledDate: '2026-10-20', version: 0 })),
        OPTS,
      ),
    ).rejects.toBeInstanceOf(ConflictError)
  })

  it('versions training state from zero', async () => {
    const state = initialTrainingState('athlete-1', '2026-10-21T09:00:00.000Z')
    const saved = await store.withUserTransaction('athlete-1', (tx) => tx.saveTrainingState(state), OPTS)
    expect(saved.version).toBe(1)
    await expect(
      store.withUserTransaction('athlete-1', (tx) => tx.saveTrainingState(state), OPTS),
    ).rejects.toBeInstanceOf(ConflictError)
  })

  it('runs one transaction per user at a time', async () => {
    const events: string[] = []
    const slow = store.withUserTransaction(
      'athlete-1',
      async () => {
        events.push('first:start')
        await sleep(20)
        events.push('first:end')
      },
      OPTS,
    )
    const fast = store.withUserTransaction(
      'athlete-1',
      async () => {
        events.push('second')
      },
      OPTS,
    )
    await Promise.all([slow, fast])
    expect(events).toEqual(['first:start', 'first:end', 'second'])
  })

  it('lets other users proceed in parallel', async () => {
    const events: string[] = []
    const slow = store.withUserTransaction(
      'athlete-1',
      async () => {
        await sleep(20)
        events.push('athlete-1')
      },
      OPTS,
    )
    const other = store.withUserTransaction(
      'athlete-2',
      async () => {
        events.push('athlete-2')
      },
      OPTS,
    )
    await Promise.all([slow, other])
    expect(events).toEqual(['athlete-2', 'athlete-1'])
  })

  it('times out without committing', async () => {
    await expect(
      store.withUserTransaction(
        'athlete-1',
        async (tx) => {
          await sleep(50)
          await tx.deleteWorkout('w1')
        },
        { timeoutMs: 10 },
      ),
    ).rejects.toBeInstanceOf(TransientStoreError)

    await sleep(60)
    expect((await readPlanWorkouts(store, 'athlete-1', 'plan-1')).map((w) => w.id)).toEqual(['w1'])
  })

  it('filters workouts by status and date window', async () => {
    await store.withUserTransaction(
      'athlete-1',
      (tx) =>
        tx.insertWorkouts([
          makeWorkout({ id: 'w2', scheduledDate: '2026-10-21', priorityLevel: 1 }),
          makeWorkout({ id: 'w3', scheduledDate: '2026-10-21', priorityLevel: 2, status: 'missed' }),
          makeWorkout({ id: 'w4', scheduledDate: '2026-10-23' }),
        ]),
      OPTS,
    )

    const ids = (rows: { id: string }[]) => rows.map((r) => r.id)
    const list = (q: WorkoutQuery) =>
      store.withUserTransaction('athlete-1', (tx) => tx.listWorkouts('plan-1', q), OPTS)

    expect(ids(await list({}))).toEqual(['w1', 'w2', 'w3', 'w4'])
    expect(ids(await list({ statuses: ['planned'], onDate: '2026-10-21' }))).toEqual(['w2'])
    expect(ids(await list({ fromDate: '2026-10-21', beforeDate: '2026-10-23' }))).toEqual(['w2', 'w3'])
    expect(ids(await list({ statuses: ['planned'], beforeDate: '2026-10-21' }))).toEqual(['w1'])
  })
})
