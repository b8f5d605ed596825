import { TABLES, TeamDriverRankRow } from '../../db/schema';
import { compareValues } from '../../db/store';
import { DataIntegrityError } from '../errors';
import { DerivationStage, emit, groupBy, pairKey } from '../pipeline/stage';

export interface TeamMember {
  driver_id: number;
  driver_ref: string;
  eoy_position: number | null;
}

/**
 * Dense rank by end-of-season position; unranked drivers follow in driver_ref order
 */
export function rankTeamDrivers(members: readonly TeamMember[]): Map<number, number> {
  const ranked = members.filter(m => m.eoy_position !== null);
  const unranked = members
    .filter(m => m.eoy_position === null)
    .sort((a, b) => compareValues(a.driver_ref, b.driver_ref));

  const distinctPositions = [...new Set(ranked.map(m => m.eoy_position))].sort(compareValues);
  const ranks = new Map<number, number>();
  for (const member of ranked) {
    ranks.set(member.driver_id, distinctPositions.indexOf(member.eoy_position) + 1);
  }

  let next = distinctPositions.length;
  for (const member of unranked) {
    ranks.set(member.driver_id, ++next);
  }
  return ranks;
}

export const teamDriverRanksStage: DerivationStage = {
  name: 'team_driver_ranks',
  description: 'Driver rank within each constructor-season, with manual overrides',
  inputs: [TABLES.results, TABLES.races, TABLES.driverStandings, TABLES.drivers, TABLES.constructors, TABLES.tdrOverrides],
  outputs: [TABLES.teamDriverRanks],

  async run(ctx) {
    const races = await ctx.read(TABLES.races);
    const results = await ctx.read(TABLES.results);
    const standings = await ctx.read(TABLES.driverStandings);
    const drivers = new Map((await ctx.read(TABLES.drivers)).map(d => [d.driver_id, d]));
    const constructors = new Map((await ctx.read(TABLES.constructors)).map(c => [c.constructor_id, c]));
    const overrides = new Map(
      (await ctx.read(TABLES.tdrOverrides)).map(o => [`${o.year}:${o.constructor_ref}:${o.driver_ref}`, o.team_driver_rank])
    );
    const raceById = new Map(races.map(r => [r.race_id, r]));

    // the driver's standing at the latest round they have one for
    const eoy = new Map<string, { round: number; position: number | null }>();
    for (const standing of standings) {
      const race = raceById.get(standing.race_id);
      if (!race) {
        continue;
      }
      const key = pairKey(race.year, standing.driver_id);
      const current = eoy.get(key);
      if (!current || race.round > current.round) {
        eoy.set(key, { round: race.round, position: standing.position });
      }
    }

    const seats = new Map<string, { year: number; constructor_id: number; driver_id: number }>();
    for (const result of results) {
      const race = raceById.get(result.race_id);
      if (!race) {
        continue;
      }
      seats.set(`${race.year}:${result.constructor_id}:${result.driver_id}`, {
        year: race.year,
        constructor_id: result.constructor_id,
        driver_id: result.driver_id
      });
    }

    const rows: TeamDriverRankRow[] = [];
    for (const team of groupBy([...seats.values()], s => pairKey(s.year, s.constructor_id)).values()) {
      const { year, constructor_id } = team[0];
      const constructor = constructors.get(constructor_id);
      if (!constructor) {
        ctx.issues.flagIntegrity(
          new DataIntegrityError('missing_reference', `Unknown constructor ${constructor_id}`, {
            stage: ctx.stage,
            year
          })
        );
        continue;
      }

      const members: TeamMember[] = [];
      for (const seat of team) {
        const driver = drivers.get(seat.driver_id);
        if (!driver) {
          ctx.issues.flagIntegrity(
            new DataIntegrityError('missing_reference', `Unknown driver ${seat.driver_id}`, {
              stage: ctx.stage,
              year,
              driver_id: seat.driver_id
            })
          );
          continue;
        }
        members.push({
          driver_id: driver.driver_id,
          driver_ref: driver.driver_ref,
          eoy_position: eoy.get(pairKey(year, driver.driver_id))?.position ?? null
        });
      }

      const ranks = rankTeamDrivers(members);
      for (const member of members) {
        const override = overrides.get(`${year}:${constructor.constructor_ref}:${member.driver_ref}`);
        rows.push({
          year,
          constructor_id,
          constructor_ref: constructor.constructor_ref,
          driver_id: member.driver_id,
          driver_ref: member.driver_ref,
          eoy_position: member.eoy_position,
          team_driver_rank: override ?? ranks.get(member.driver_id) ?? members.length,
          is_override: override !== undefined
        });
      }
    }

    return [emit(TABLES.teamDriverRanks, rows)];
  }
};
