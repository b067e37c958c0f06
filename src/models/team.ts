/**
 * Team Models
 * 
 * Type definitions for teams and their public views.
 * A team owns zero or more heroes through hero.team_id.
 */

import { Hero, HeroRow, mapHeroRow } from './hero';

/**
 * Team entity (public view)
 */
export interface Team {
  id: number;                    // Serial primary key
  name: string;                  // Team name (indexed)
  headquarters: string;          // Where the team is based
}

/**
 * Team with the heroes that belong to it
 */
export interface TeamWithHeroes extends Team {
  heroes: Hero[];
}

/**
 * Team database row (matches PostgreSQL schema)
 */
export interface TeamRow {
  id: number;
  name: string;
  headquarters: string;
}

/**
 * Team row joined with its heroes aggregated by json_agg
 */
export interface TeamWithHeroesRow extends TeamRow {
  heroes: HeroRow[];
}

/**
 * Body accepted by POST /teams
 */
export interface CreateTeamInput {
  name: string;
  headquarters: string;
}

/**
 * Body accepted by PATCH /teams/{id}; absent fields are left untouched
 */
export interface UpdateTeamInput {
  name?: string;
  headquarters?: string;
}

/**
 * Convert database row to Team model
 */
export function mapTeamRow(row: TeamRow): Team {
  return {
    id: row.id,
    name: row.name,
    headquarters: row.headquarters,
  };
}

/**
 * Convert joined row to TeamWithHeroes model
 */
export function mapTeamWithHeroesRow(row: TeamWithHeroesRow): TeamWithHeroes {
  return {
    ...mapTeamRow(row),
    heroes: (row.heroes || []).map(mapHeroRow),
  };
}
