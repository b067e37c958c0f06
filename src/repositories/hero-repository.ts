/**
 * Hero Repository
 *
 * Data access layer for heroes. Reads join the owning team so every hero
 * is returned with its public team view.
 */

import { query } from '../config/database';
import {
  Hero,
  HeroRow,
  HeroWithTeam,
  HeroWithTeamRow,
  HeroChanges,
  NewHeroRecord,
  mapHeroRow,
  mapHeroWithTeamRow,
} from '../models/hero';
import { buildSetClause } from '../utils/sql';

const UPDATABLE_COLUMNS = ['name', 'secret_name', 'hashed_password', 'age', 'team_id'] as const;

const HERO_WITH_TEAM_SELECT = `
  SELECT
    h.id,
    h.name,
    h.age,
    h.team_id,
    t.name AS team_name,
    t.headquarters AS team_headquarters
  FROM heroes h
  LEFT JOIN teams t ON t.id = h.team_id
`;

/**
 * Hero Repository
 * Provides data access methods for heroes
 */
export class HeroRepository {
  /**
   * Find all heroes with their team, ordered by id
   */
  async findAll(): Promise<HeroWithTeam[]> {
    const result = await query<HeroWithTeamRow>(
      `${HERO_WITH_TEAM_SELECT} ORDER BY h.id ASC`
    );

    return result.rows.map(mapHeroWithTeamRow);
  }

  /**
   * Find a hero by ID
   *
   * @returns Hero with team if found, null otherwise
   */
  async findById(heroId: number): Promise<HeroWithTeam | null> {
    const result = await query<HeroWithTeamRow>(
      `${HERO_WITH_TEAM_SELECT} WHERE h.id = $1`,
      [heroId]
    );

    const row = result.rows[0];
    return row ? mapHeroWithTeamRow(row) : null;
  }

  /**
   * Find the id of the hero holding a password hash
   *
   * @returns Hero id, or null when the hash is unused
   */
  async findIdByHashedPassword(hashedPassword: string): Promise<number | null> {
    const result = await query<{ id: number }>(
      'SELECT id FROM heroes WHERE hashed_password = $1',
      [hashedPassword]
    );

    const row = result.rows[0];
    return row ? row.id : null;
  }

  /**
   * Insert a hero
   *
   * @returns Created hero, or null when another hero already holds the
   * password hash
   */
  async create(record: NewHeroRecord): Promise<HeroWithTeam | null> {
    const result = await query<{ id: number }>(
      `INSERT INTO heroes (name, secret_name, hashed_password, age, team_id)
       VALUES ($1, $2, $3, $4, $5)
       ON CONFLICT (hashed_password) DO NOTHING
       RETURNING id`,
      [record.name, record.secret_name, record.hashed_password, record.age, record.team_id]
    );

    const row = result.rows[0];
    return row ? this.findById(row.id) : null;
  }

  /**
   * Apply the provided columns to a hero
   *
   * @returns Updated hero, or null if no hero has this id
   */
  async update(heroId: number, changes: HeroChanges): Promise<HeroWithTeam | null> {
    const { clause, values } = buildSetClause(changes, UPDATABLE_COLUMNS);

    if (clause) {
      const result = await query(
        `UPDATE heroes SET ${clause} WHERE id = $${values.length + 1}`,
        [...values, heroId]
      );
      if (result.rowCount === 0) {
        return null;
      }
    }

    return this.findById(heroId);
  }

  /**
   * Delete a hero
   *
   * @returns The deleted hero, or null if no hero has this id
   */
  async delete(heroId: number): Promise<Hero | null> {
    const result = await query<HeroRow>(
      'DELETE FROM heroes WHERE id = $1 RETURNING id, name, age, team_id',
      [heroId]
    );

    const row = result.rows[0];
    return row ? mapHeroRow(row) : null;
  }

  /**
   * Delete every hero
   *
   * @returns Number of deleted heroes
   */
  async deleteAll(): Promise<number> {
    const result = await query('DELETE FROM heroes');
    return result.rowCount ?? 0;
  }
}
