import { Controller, Get } from '@nestjs/common';
import { AppService, type HealthReport, type ServiceInfo } from './app.service';

/** Unauthenticated service and health endpoints under the API prefix. */
@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get()
  root(): ServiceInfo {
    return this.appService.root();
  }

  @Get('health')
  health(): Promise<HealthReport> {
    return this.appService.health();
  }
}
