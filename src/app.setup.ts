import { NestExpressApplication } from '@nestjs/platform-express';
import { HttpExceptionFilter } from './common/http-exception.filter';
import { STATIC_DIR } from './config';

// shared by main.ts and the e2e specs
export function configureApp(app: NestExpressApplication, staticDir = STATIC_DIR) {
  app.enableCors({
    origin: true,
    credentials: true,
  });
  app.useGlobalFilters(new HttpExceptionFilter());
  app.useStaticAssets(staticDir, { prefix: '/static/' });
  return app;
}
