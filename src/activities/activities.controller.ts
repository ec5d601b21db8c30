import { BadRequestException, Controller, Get, HttpCode, Param, Post, Query } from '@nestjs/common';
import { ActivitiesService } from './activities.service';
import { ParticipantQueryDto } from './activities.dto';

@Controller('activities')
export class ActivitiesController {
  constructor(private readonly svc: ActivitiesService) {}

  @Get()
  list() {
    return this.svc.list();
  }

  @Post(':name/signup')
  @HttpCode(200)
  async signup(@Param('name') name: string, @Query() query: ParticipantQueryDto) {
    return this.svc.enroll(name, this.requireEmail(query));
  }

  @Post(':name/unregister')
  @HttpCode(200)
  async unregister(@Param('name') name: string, @Query() query: ParticipantQueryDto) {
    return this.svc.withdraw(name, this.requireEmail(query));
  }

  private requireEmail(query: ParticipantQueryDto): string {
    const email = query?.email;
    if (typeof email !== 'string' || !email) {
      throw new BadRequestException('email query parameter is required');
    }
    return email;
  }
}
