/**
 * Championship points systems
 *
 * Maximum points a single driver can take from one grand prix (win plus any
 * fastest-lap bonus) and from one sprint, by season.
 */

export interface PointsSystem {
  first_year: number;
  last_year: number | null;
  grand_prix_max: number;
  sprint_max: number;
}

export const POINTS_SYSTEMS: readonly PointsSystem[] = [
  { first_year: 1950, last_year: 1959, grand_prix_max: 9, sprint_max: 0 },
  { first_year: 1960, last_year: 1960, grand_prix_max: 8, sprint_max: 0 },
  { first_year: 1961, last_year: 1990, grand_prix_max: 9, sprint_max: 0 },
  { first_year: 1991, last_year: 2009, grand_prix_max: 10, sprint_max: 0 },
  { first_year: 2010, last_year: 2018, grand_prix_max: 25, sprint_max: 0 },
  { first_year: 2019, last_year: 2020, grand_prix_max: 26, sprint_max: 0 },
  { first_year: 2021, last_year: 2021, grand_prix_max: 26, sprint_max: 3 },
  { first_year: 2022, last_year: 2024, grand_prix_max: 26, sprint_max: 8 },
  // fastest-lap point dropped
  { first_year: 2025, last_year: null, grand_prix_max: 25, sprint_max: 8 }
];

export function getPointsSystem(year: number): PointsSystem {
  const system = POINTS_SYSTEMS.find(
    s => year >= s.first_year && (s.last_year === null || year <= s.last_year)
  );
  if (!system) {
    throw new Error(`FAIL_CLOSED: No points system defined for season ${year}`);
  }
  return system;
}

/**
 * Max points one driver can score at a round
 */
export function getMaxPointsForRound(year: number, hasSprint: boolean): number {
  const system = getPointsSystem(year);
  return system.grand_prix_max + (hasSprint ? system.sprint_max : 0);
}
