export interface SeasonRecord {
  seasonId: string;
  name: string;
  startsAt: Date;
  endsAt: Date;
  isActive: boolean;
  roomCapacity: number;
  winThreshold: number;
  createdAt: Date;
}

export interface SeasonCreateInput {
  name: string;
  startsAt: Date;
  endsAt: Date;
  roomCapacity: number;
  winThreshold: number;
  createdAt: Date;
}

export interface EnrollmentRecord {
  seasonId: string;
  participantId: string;
  joinedAt: Date;
}

export interface SeasonRepository {
  create(input: SeasonCreateInput): Promise<SeasonRecord>;
  get(seasonId: string): Promise<SeasonRecord | null>;
  getByName(name: string): Promise<SeasonRecord | null>;
  findActive(): Promise<SeasonRecord | null>;
  deactivateAll(): Promise<void>;
  /** Returns false when the participant was already enrolled. */
  enroll(record: EnrollmentRecord): Promise<boolean>;
  isEnrolled(seasonId: string, participantId: string): Promise<boolean>;
}
