export interface SeasonStandingRecord {
  seasonId: string;
  participantId: string;
  seedRating: number;
  rating: number;
  winPoints: number;
  entryPoints: number;
  updatedAt: Date;
}

export interface SettlementEntryRecord {
  seasonId: string;
  sessionId: string;
  participantId: string;
  winDelta: number;
  rateDelta: number;
  calculatedAt: Date;
}

export interface SettlementEntryQuery {
  seasonId: string;
  sessionId?: string;
  participantIds?: string[];
}

/** Season ratings and points. Only the settlement ledger holds this repository. */
export interface StandingRepository {
  get(seasonId: string, participantId: string): Promise<SeasonStandingRecord | null>;
  listBySeason(seasonId: string): Promise<SeasonStandingRecord[]>;
  save(record: SeasonStandingRecord): Promise<void>;
  listEntries(query: SettlementEntryQuery): Promise<SettlementEntryRecord[]>;
  insertEntries(records: SettlementEntryRecord[]): Promise<void>;
  /** Returns the number of rows removed. */
  deleteEntries(query: Pick<SettlementEntryQuery, 'seasonId' | 'sessionId'>): Promise<number>;
}
