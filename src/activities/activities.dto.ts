export class ParticipantQueryDto {
  // express turns ?email=a&email=b into an array
  email?: string | string[]
}
