export type PoolStatus = 'open' | 'closed' | 'canceled';
export type ApplicationStatus = 'confirmed' | 'canceled';

export interface EntryPoolRecord {
  poolId: string;
  seasonId: string;
  week: number;
  status: PoolStatus;
  createdAt: Date;
  closedAt: Date | null;
}

export interface EntryPoolCreateInput {
  seasonId: string;
  week: number;
  createdAt: Date;
}

export interface EntryApplicationRecord {
  poolId: string;
  participantId: string;
  status: ApplicationStatus;
  submittedAt: Date;
  updatedAt: Date;
}

export interface PoolRepository {
  create(input: EntryPoolCreateInput): Promise<EntryPoolRecord>;
  get(poolId: string): Promise<EntryPoolRecord | null>;
  find(seasonId: string, week: number): Promise<EntryPoolRecord | null>;
  setStatus(poolId: string, status: PoolStatus, at: Date): Promise<EntryPoolRecord>;
  getApplication(poolId: string, participantId: string): Promise<EntryApplicationRecord | null>;
  saveApplication(record: EntryApplicationRecord): Promise<void>;
  /** Ordered by submission time, then participant id. */
  listApplications(poolId: string): Promise<EntryApplicationRecord[]>;
}
