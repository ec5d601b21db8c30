import { BadRequestException, NotFoundException } from '@nestjs/common';

export class ActivityNotFoundException extends NotFoundException {
  constructor() {
    super('Activity not found');
  }
}

export class AlreadyRegisteredException extends BadRequestException {
  constructor(activityName: string, email: string) {
    super(`${email} is already signed up for ${activityName}`);
  }
}

export class CapacityExceededException extends BadRequestException {
  constructor() {
    super('Activity is full');
  }
}

export class NotRegisteredException extends BadRequestException {
  constructor(activityName: string, email: string) {
    super(`${email} is not signed up for ${activityName}`);
  }
}
