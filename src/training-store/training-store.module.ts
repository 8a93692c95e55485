import { Global, Inject, Module, type OnApplicationShutdown } from '@nestjs/common'
import { ENGINE_CONFIG, type EngineConfig } from '../config/engine.config'
import { InMemoryTrainingStore } from './in-memory-training-store'
import { PostgresTrainingStore } from './postgres-training-store'
import { TRAINING_STORE, type TrainingStore } from './training-store.types'
import { UnitOfWork } from './unit-of-work'

export function createTrainingStore(config: EngineConfig): TrainingStore {
  return config.store.kind === 'postgres'
    ? PostgresTrainingStore.fromUrl(config.store.databaseUrl)
    : new InMemoryTrainingStore()
}

@Global()
@Module({
  providers: [
    {
      provide: TRAINING_STORE,
      useFactory: createTrainingStore,
      inject: [ENGINE_CONFIG],
    },
    UnitOfWork,
  ],
  exports: [TRAINING_STORE, UnitOfWork],
})
export class TrainingStoreModule implements OnApplicationShutdown {
  constructor(@Inject(TRAINING_STORE) private readonly store: TrainingStore) {}

  async onApplicationShutdown(): Promise<void> {
    await this.store.close()
  }
}
