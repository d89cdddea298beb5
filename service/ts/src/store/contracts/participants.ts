export interface ParticipantRecord {
  participantId: string;
  displayName: string;
  experience: number;
  priority: number;
  createdAt: Date;
}

export interface ParticipantCreateInput {
  displayName: string;
  experience: number;
  createdAt: Date;
}

export interface ParticipantRepository {
  create(input: ParticipantCreateInput): Promise<ParticipantRecord>;
  get(participantId: string): Promise<ParticipantRecord | null>;
  getMany(participantIds: string[]): Promise<Map<string, ParticipantRecord>>;
  setPriority(participantId: string, priority: number): Promise<void>;
  /** Atomic +1; returns the new priority. */
  incrementPriority(participantId: string): Promise<number>;
}
