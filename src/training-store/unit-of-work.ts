import { Inject, Injectable, Logger } from '@nestjs/common'
import { setTimeout as sleep } from 'timers/promises'
import { TransientStoreError } from '../common/errors'
import { ENGINE_CONFIG, type EngineConfig } from '../config/engine.config'
import { TRAINING_STORE, type TrainingStore, type TrainingStoreTx } from './training-store.types'

/**
 * One synchronous operation = one call to `run`: the user's lock, a single
 * transaction, a bounded timeout, and one retry after a transient failure.
 */
@Injectable()
export class UnitOfWork {
  private readonly logger = new Logger(UnitOfWork.name)

  constructor(
    @Inject(TRAINING_STORE) private readonly store: TrainingStore,
    @Inject(ENGINE_CONFIG) private readonly config: EngineConfig,
  ) {}

  async run<T>(userId: string, work: (tx: TrainingStoreTx) => Promise<T>): Promise<T> {
    const options = { timeoutMs: this.config.storeTimeoutMs }
    try {
      return await this.store.withUserTransaction(userId, work, options)
    } catch (err) {
      if (!(err instanceof TransientStoreError)) throw err
      this.logger.warn(`Transient store error for user ${userId}, retrying once: ${err.message}`)
      await sleep(this.config.storeRetryBackoffMs)
      return this.store.withUserTransaction(userId, work, options)
    }
  }
}
