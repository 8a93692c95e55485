import { Body, Controller, Get, Post, Req, UseGuards, UsePipes, ValidationPipe } from '@nestjs/common'
import { type AuthedRequest, UserContextGuard, getUserId } from '../auth/user-context.guard'
import { CreatePlanDto } from './dto/create-plan.dto'
import { TrainingPlanService } from './training-plan.service'

@UseGuards(UserContextGuard)
@Controller('training-plan')
export class TrainingPlanController {
  constructor(private readonly trainingPlanService: TrainingPlanService) {}

  @Post()
  @UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true, transform: true }))
  create(@Req() req: AuthedRequest, @Body() body: CreatePlanDto) {
    return this.trainingPlanService.createPlan(getUserId(req), body)
  }

  @Post('maintenance')
  startMaintenance(@Req() req: AuthedRequest) {
    return this.trainingPlanService.startMaintenancePlan(getUserId(req))
  }

  @Get('active')
  getActive(@Req() req: AuthedRequest) {
    return this.trainingPlanService.getActivePlan(getUserId(req))
  }
}
