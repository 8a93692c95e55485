import { Controller, Get, Req, UseGuards } from '@nestjs/common'
import { type AuthedRequest, UserContextGuard, getUserId } from '../auth/user-context.guard'
import { AdaptationService } from './adaptation.service'

@UseGuards(UserContextGuard)
@Controller('fatigue')
export class AdaptationController {
  constructor(private readonly adaptationService: AdaptationService) {}

  @Get()
  status(@Req() req: AuthedRequest) {
    return this.adaptationService.getFatigueStatus(getUserId(req))
  }
}
