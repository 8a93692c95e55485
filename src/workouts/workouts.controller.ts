import {
  Body,
  Controller,
  Get,
  HttpCode,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
  Req,
  UseGuards,
  UsePipes,
  ValidationPipe,
} from '@nestjs/common'
import { type AuthedRequest, UserContextGuard, getUserId } from '../auth/user-context.guard'
import { CompleteWorkoutDto } from './dto/complete-workout.dto'
import { ListWorkoutsQuery } from './dto/list-workouts.query'
import { SkipWorkoutDto } from './dto/skip-workout.dto'
import { WorkoutsService } from './workouts.service'

@UseGuards(UserContextGuard)
@Controller('workouts')
@UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true, transform: true }))
export class WorkoutsController {
  constructor(private readonly workoutsService: WorkoutsService) {}

  @Get()
  list(@Req() req: AuthedRequest, @Query() query: ListWorkoutsQuery) {
    return this.workoutsService.listWorkouts(getUserId(req), query)
  }

  @Get(':id')
  getOne(@Req() req: AuthedRequest, @Param('id', ParseUUIDPipe) id: string) {
    return this.workoutsService.getWorkout(getUserId(req), id)
  }

  @Post(':id/complete')
  @HttpCode(200)
  complete(@Req() req: AuthedRequest, @Param('id', ParseUUIDPipe) id: string, @Body() body: CompleteWorkoutDto) {
    return this.workoutsService.completeWorkout(getUserId(req), id, body.activity, body.feedback)
  }

  @Post(':id/skip')
  @HttpCode(200)
  skip(@Req() req: AuthedRequest, @Param('id', ParseUUIDPipe) id: string, @Body() body: SkipWorkoutDto) {
    return this.workoutsService.skipWorkout(getUserId(req), id, body.reason)
  }
}
