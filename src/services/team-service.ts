/**
 * Team Service
 *
 * Business logic layer for team operations.
 * Turns missing records into NotFoundError.
 */

import { TeamRepository } from '../repositories/team-repository';
import { CreateTeamInput, TeamWithHeroes, UpdateTeamInput } from '../models/team';
import { NotFoundError } from '../models/errors';

export function teamNotFound(teamId: number): NotFoundError {
  return new NotFoundError(`team with id ${teamId} not found`);
}

/**
 * Team Service
 * Provides business logic for team operations
 */
export class TeamService {
  constructor(private teamRepository: TeamRepository) {}

  /**
   * Get all teams with their heroes
   */
  async getTeams(): Promise<TeamWithHeroes[]> {
    return this.teamRepository.findAll();
  }

  /**
   * Get a team by ID with 404 handling
   *
   * @throws NotFoundError if team doesn't exist
   */
  async getTeamById(teamId: number): Promise<TeamWithHeroes> {
    const team = await this.teamRepository.findById(teamId);

    if (!team) {
      throw teamNotFound(teamId);
    }

    return team;
  }

  async createTeam(input: CreateTeamInput): Promise<TeamWithHeroes> {
    return this.teamRepository.create(input);
  }

  /**
   * Apply a partial update
   *
   * @throws NotFoundError if team doesn't exist
   */
  async updateTeam(teamId: number, input: UpdateTeamInput): Promise<TeamWithHeroes> {
    const team = await this.teamRepository.update(teamId, input);

    if (!team) {
      throw teamNotFound(teamId);
    }

    return team;
  }

  /**
   * Delete a team and return a confirmation message
   *
   * @throws NotFoundError if team doesn't exist
   */
  async deleteTeam(teamId: number): Promise<string> {
    const team = await this.teamRepository.delete(teamId);

    if (!team) {
      throw teamNotFound(teamId);
    }

    return `team ${team.name} deleted successfully`;
  }

  async deleteAllTeams(): Promise<string> {
    const count = await this.teamRepository.deleteAll();
    return `deleted ${count} teams`;
  }
}
