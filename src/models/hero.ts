/**
 * Hero Models
 * 
 * Type definitions for heroes and their public views.
 * secret_name and hashed_password are stored but never exposed.
 */

import { Team } from './team';

/**
 * Hero entity (public view)
 */
export interface Hero {
  id: number;                    // Serial primary key
  name: string;                  // Hero name (indexed)
  age: number | null;            // Optional age
  team_id: number | null;        // Owning team, null when unassigned
}

/**
 * Hero with its team embedded
 */
export interface HeroWithTeam extends Hero {
  team: Team | null;
}

/**
 * Public hero columns as selected or aggregated from the heroes table
 */
export interface HeroRow {
  id: number;
  name: string;
  age: number | null;
  team_id: number | null;
}

/**
 * Hero row joined with its team (team_* columns are null without a team)
 */
export interface HeroWithTeamRow extends HeroRow {
  team_name: string | null;
  team_headquarters: string | null;
}

/**
 * Body accepted by POST /heroes
 */
export interface CreateHeroInput {
  name: string;
  secret_name: string;
  password: string;
  age?: number | null;
  team_id?: number | null;
}

/**
 * Body accepted by PATCH /heroes/{id}; absent fields are left untouched
 */
export interface UpdateHeroInput {
  name?: string;
  secret_name?: string;
  password?: string;
  age?: number | null;
  team_id?: number | null;
}

/**
 * Values written to the heroes table on insert
 */
export interface NewHeroRecord {
  name: string;
  secret_name: string;
  hashed_password: string;
  age: number | null;
  team_id: number | null;
}

/**
 * Columns that may change on update
 */
export interface HeroChanges {
  name?: string;
  secret_name?: string;
  hashed_password?: string;
  age?: number | null;
  team_id?: number | null;
}

/**
 * Convert database row to Hero model
 */
export function mapHeroRow(row: HeroRow): Hero {
  return {
    id: row.id,
    name: row.name,
    age: row.age ?? null,
    team_id: row.team_id ?? null,
  };
}

/**
 * Convert joined row to HeroWithTeam model
 */
export function mapHeroWithTeamRow(row: HeroWithTeamRow): HeroWithTeam {
  const team: Team | null =
    row.team_id !== null && row.team_name !== null && row.team_headquarters !== null
      ? { id: row.team_id, name: row.team_name, headquarters: row.team_headquarters }
      : null;

  return {
    ...mapHeroRow(row),
    team,
  };
}
