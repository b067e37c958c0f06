/**
 * Team Repository
 *
 * Data access layer for teams. Every method is a single parameterized
 * statement; heroes are aggregated into each team with json_agg.
 */

import { query } from '../config/database';
import {
  Team,
  TeamRow,
  TeamWithHeroes,
  TeamWithHeroesRow,
  UpdateTeamInput,
  CreateTeamInput,
  mapTeamRow,
  mapTeamWithHeroesRow,
} from '../models/team';
import { buildSetClause } from '../utils/sql';

const UPDATABLE_COLUMNS = ['name', 'headquarters'] as const;

const TEAM_WITH_HEROES_SELECT = `
  SELECT
    t.id,
    t.name,
    t.headquarters,
    COALESCE(
      json_agg(
        json_build_object('id', h.id, 'name', h.name, 'age', h.age, 'team_id', h.team_id)
        ORDER BY h.id
      ) FILTER (WHERE h.id IS NOT NULL),
      '[]'::json
    ) AS heroes
  FROM teams t
  LEFT JOIN heroes h ON h.team_id = t.id
`;

/**
 * Team Repository
 * Provides data access methods for teams
 */
export class TeamRepository {
  /**
   * Find all teams with their heroes, ordered by id
   */
  async findAll(): Promise<TeamWithHeroes[]> {
    const result = await query<TeamWithHeroesRow>(
      `${TEAM_WITH_HEROES_SELECT} GROUP BY t.id ORDER BY t.id ASC`
    );

    return result.rows.map(mapTeamWithHeroesRow);
  }

  /**
   * Find a team by ID
   *
   * @returns Team with heroes if found, null otherwise
   */
  async findById(teamId: number): Promise<TeamWithHeroes | null> {
    const result = await query<TeamWithHeroesRow>(
      `${TEAM_WITH_HEROES_SELECT} WHERE t.id = $1 GROUP BY t.id`,
      [teamId]
    );

    const row = result.rows[0];
    return row ? mapTeamWithHeroesRow(row) : null;
  }

  /**
   * Insert a team. A new team has no heroes yet.
   */
  async create(input: CreateTeamInput): Promise<TeamWithHeroes> {
    const result = await query<TeamRow>(
      `INSERT INTO teams (name, headquarters)
       VALUES ($1, $2)
       RETURNING id, name, headquarters`,
      [input.name, input.headquarters]
    );

    return { ...mapTeamRow(result.rows[0]), heroes: [] };
  }

  /**
   * Apply the provided fields to a team
   *
   * @returns Updated team, or null if no team has this id
   */
  async update(teamId: number, changes: UpdateTeamInput): Promise<TeamWithHeroes | null> {
    const { clause, values } = buildSetClause(changes, UPDATABLE_COLUMNS);

    if (clause) {
      const result = await query(
        `UPDATE teams SET ${clause} WHERE id = $${values.length + 1}`,
        [...values, teamId]
      );
      if (result.rowCount === 0) {
        return null;
      }
    }

    return this.findById(teamId);
  }

  /**
   * Delete a team. Heroes of the team keep existing with team_id NULL
   * (ON DELETE SET NULL).
   *
   * @returns The deleted team, or null if no team has this id
   */
  async delete(teamId: number): Promise<Team | null> {
    const result = await query<TeamRow>(
      'DELETE FROM teams WHERE id = $1 RETURNING id, name, headquarters',
      [teamId]
    );

    const row = result.rows[0];
    return row ? mapTeamRow(row) : null;
  }

  /**
   * Delete every team
   *
   * @returns Number of deleted teams
   */
  async deleteAll(): Promise<number> {
    const result = await query('DELETE FROM teams');
    return result.rowCount ?? 0;
  }
}
