export interface Activity {
  description: string;
  schedule: string;
  max_participants: number;
  participants: string[];
}

/** activity name → record, in seed order */
export type ActivityMap = Record<string, Activity>;

export interface ParticipantResult {
  message: string;
}
