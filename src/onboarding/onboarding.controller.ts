import { Body, Controller, HttpCode, Post, Req, UseGuards, UsePipes, ValidationPipe } from '@nestjs/common'
import { type AuthedRequest, UserContextGuard, getUserId } from '../auth/user-context.guard'
import { CompleteOnboardingDto } from './dto/complete-onboarding.dto'
import { OnboardingService } from './onboarding.service'

@UseGuards(UserContextGuard)
@Controller('onboarding')
export class OnboardingController {
  constructor(private readonly onboardingService: OnboardingService) {}

  @Post('complete')
  @HttpCode(200)
  @UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true, transform: true }))
  complete(@Req() req: AuthedRequest, @Body() body: CompleteOnboardingDto) {
    return this.onboardingService.completeOnboarding(getUserId(req), body)
  }
}
