import { Body, Controller, Get, Put, Req, UseGuards, UsePipes, ValidationPipe } from '@nestjs/common'
import { type AuthedRequest, UserContextGuard, getUserId } from '../auth/user-context.guard'
import { BiometricsService } from './biometrics.service'
import { UpdateBiometricsDto } from './dto/update-biometrics.dto'

@UseGuards(UserContextGuard)
@Controller('biometrics')
export class BiometricsController {
  constructor(private readonly biometricsService: BiometricsService) {}

  @Get()
  get(@Req() req: AuthedRequest) {
    return this.biometricsService.getBiometrics(getUserId(req))
  }

  @Put()
  @UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true, transform: true }))
  update(@Req() req: AuthedRequest, @Body() body: UpdateBiometricsDto) {
    return this.biometricsService.updateBiometrics(getUserId(req), body)
  }

  @Get('heart-rate-zones')
  heartRateZones(@Req() req: AuthedRequest) {
    return this.biometricsService.getHeartRateZones(getUserId(req))
  }
}
