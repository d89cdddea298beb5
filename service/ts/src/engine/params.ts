export const P = {
  /** Rating sensitivity per settled session. */
  K: 20,
  /** Rating gap that shifts the expected result by a full point. */
  ratingScale: 400,
  defaultExperience: 2000,
  seed: {
    offset: 1000,
    floor: 1000,
    ceiling: 2500,
  },
  defaults: {
    roomCapacity: 8,
    winThreshold: 10,
  },
  /** Largest party the exhaustive balancer will enumerate (C(16, 8) = 12870 subsets). */
  maxBalanceParty: 16,
  entryPoints: 0.5,
} as const;
