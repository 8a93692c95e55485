import { Controller, Get } from '@nestjs/common'

@Controller()
export class AppController {
  @Get()
  getRoot() {
    return { status: 'ok', service: 'tri-plan-engine' }
  }

  @Get('health')
  health() {
    return { status: 'ok' }
  }
}
