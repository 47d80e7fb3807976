import { Controller, Get, HttpException, HttpStatus } from '@nestjs/common';
import { HealthService } from './health.service';

@Controller('health')
export class HealthController {
  constructor(private readonly svc: HealthService) {}

  @Get()
  async getHealth() {
    const report = await this.svc.check();
    const timestamp = new Date().toISOString();

    if (report.status === 'ok') {
      return { status: 'ok', timestamp };
    }

    // base injoignable : détails + 503
    throw new HttpException(
      { ...report, timestamp },
      HttpStatus.SERVICE_UNAVAILABLE,
    );
  }
}
