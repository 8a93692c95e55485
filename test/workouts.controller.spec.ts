import 'reflect-metadata'
import { BadRequestException, UnauthorizedException, ValidationPipe, type PipeTransform } from '@nestjs/common'
import { GUARDS_METADATA, PIPES_METADATA } from '@nestjs/common/constants'
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host'
import { UserContextGuard } from '../src/auth/user-context.guard'
import { SkipWorkoutDto } from '../src/workouts/dto/skip-workout.dto'
import { WorkoutsController } from '../src/workouts/workouts.controller'

function validationPipeOf(target: object): ValidationPipe {
  const pipes: unknown = Reflect.getMetadata(PIPES_METADATA, target)
  const pipe = Array.isArray(pipes)
    ? pipes.find((p: PipeTransform): p is ValidationPipe => p instanceof ValidationPipe)
    : undefined
  if (!pipe) throw new Error('no ValidationPipe registered')
  return pipe
}

describe('WorkoutsController', () => {
  it('sits behind the user context guard', () => {
    expect(Reflect.getMetadata(GUARDS_METADATA, WorkoutsController)).toEqual([UserContextGuard])

    const guard = new UserContextGuard()
    const anonymous = new ExecutionContextHost([{ header: () => undefined }])
    expect(() => guard.canActivate(anonymous)).toThrow(new UnauthorizedException('MISSING_USER_CONTEXT'))
  })

  it('rejects request bodies that fail validation', async () => {
    const pipe = validationPipeOf(WorkoutsController)
    const meta = { type: 'body' as const, metatype: SkipWorkoutDto }

    await expect(pipe.transform({ reason: 'bored' }, meta)).rejects.toBeInstanceOf(BadRequestException)
    await expect(pipe.transform({ reason: 'sick', note: 'flu' }, meta)).rejects.toBeInstanceOf(BadRequestException)
    await expect(pipe.transform({ reason: 'sick' }, meta)).resolves.toBeInstanceOf(SkipWorkoutDto)
  })

})
