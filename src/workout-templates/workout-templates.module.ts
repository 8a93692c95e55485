import { Module } from '@nestjs/common'
import { ENGINE_CONFIG, type EngineConfig } from '../config/engine.config'
import { TemplateLibrary } from './workout-templates.service'

@Module({
  providers: [
    {
      provide: TemplateLibrary,
      useFactory: (config: EngineConfig) => TemplateLibrary.fromFile(config.templateLibraryPath),
      inject: [ENGINE_CONFIG],
    },
  ],
  exports: [TemplateLibrary],
})
export class WorkoutTemplatesModule {}
