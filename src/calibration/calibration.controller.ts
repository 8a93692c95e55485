import { Body, Controller, HttpCode, Post, Req, UseGuards, UsePipes, ValidationPipe } from '@nestjs/common'
import { type AuthedRequest, UserContextGuard, getUserId } from '../auth/user-context.guard'
import { CalibrationService } from './calibration.service'
import { SubmitCalibrationResultDto } from './dto/submit-calibration-result.dto'

@UseGuards(UserContextGuard)
@Controller('calibration')
export class CalibrationController {
  constructor(private readonly calibrationService: CalibrationService) {}

  @Post('results')
  @HttpCode(200)
  @UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true, transform: true }))
  submit(@Req() req: AuthedRequest, @Body() body: SubmitCalibrationResultDto) {
    return this.calibrationService.submitResult(getUserId(req), body.testType, body.rawValue)
  }
}
