import { Controller, Get, Redirect } from '@nestjs/common';

@Controller()
export class AppController {
  @Get()
  @Redirect('/static/index.html', 307)
  root() {}

  @Get('health')
  health() {
    return { ok: true, at: new Date().toISOString() };
  }
}
