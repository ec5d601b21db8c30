import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { ActivitiesModule } from './activities/activities.module';

@Module({
  imports: [ActivitiesModule],
  controllers: [AppController],
})
export class AppModule {}
