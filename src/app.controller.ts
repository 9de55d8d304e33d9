import { Public } from '@/common/decorators/public.decorator';
import { Controller, Get, VERSION_NEUTRAL } from '@nestjs/common';

@Public()
@Controller({ version: VERSION_NEUTRAL })
export class AppController {
  /** GET /health (outside the /api/v1 prefix) */
  @Get('health')
  health(): string {
    return 'ok';
  }
}
