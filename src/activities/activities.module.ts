import { Module } from '@nestjs/common';
import { ActivitiesController } from './activities.controller';
import { ActivitiesService } from './activities.service';
import { ACTIVITY_SEED, loadActivitySeed } from './activity-seed';
import { ACTIVITIES_SEED_FILE } from '../config';

@Module({
  controllers: [ActivitiesController],
  providers: [
    { provide: ACTIVITY_SEED, useFactory: () => loadActivitySeed(ACTIVITIES_SEED_FILE) },
    ActivitiesService,
  ],
  exports: [ActivitiesService],
})
export class ActivitiesModule {}
