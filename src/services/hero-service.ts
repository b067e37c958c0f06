/**
 * Hero Service
 *
 * Business logic layer for hero operations: team references must exist
 * and no two heroes may share a password.
 */

import { HeroRepository } from '../repositories/hero-repository';
import { TeamRepository } from '../repositories/team-repository';
import { CreateHeroInput, HeroChanges, HeroWithTeam, UpdateHeroInput } from '../models/hero';
import { ConflictError, NotFoundError } from '../models/errors';
import { hashHeroPassword } from '../utils/password';
import { teamNotFound } from './team-service';

const PASSWORD_TAKEN = 'password already taken';

function heroNotFound(heroId: number): NotFoundError {
  return new NotFoundError(`hero with id ${heroId} not found`);
}

/**
 * Hero Service
 * Provides business logic for hero operations
 */
export class HeroService {
  constructor(
    private heroRepository: HeroRepository,
    private teamRepository: TeamRepository
  ) {}

  /**
   * Get all heroes with their team
   */
  async getHeroes(): Promise<HeroWithTeam[]> {
    return this.heroRepository.findAll();
  }

  /**
   * Get a hero by ID with 404 handling
   *
   * @throws NotFoundError if hero doesn't exist
   */
  async getHeroById(heroId: number): Promise<HeroWithTeam> {
    const hero = await this.heroRepository.findById(heroId);

    if (!hero) {
      throw heroNotFound(heroId);
    }

    return hero;
  }

  /**
   * Create a hero
   *
   * @throws NotFoundError if team_id references a missing team
   * @throws ConflictError if another hero already uses the password
   */
  async createHero(input: CreateHeroInput): Promise<HeroWithTeam> {
    const teamId = input.team_id ?? null;
    await this.assertTeamExists(teamId);

    const hashedPassword = hashHeroPassword(input.password);
    if ((await this.heroRepository.findIdByHashedPassword(hashedPassword)) !== null) {
      throw new ConflictError(PASSWORD_TAKEN);
    }

    const hero = await this.heroRepository.create({
      name: input.name,
      secret_name: input.secret_name,
      hashed_password: hashedPassword,
      age: input.age ?? null,
      team_id: teamId,
    });

    // Lost a race against a concurrent insert of the same password
    if (!hero) {
      throw new ConflictError(PASSWORD_TAKEN);
    }

    return hero;
  }

  /**
   * Apply a partial update. A password in the body replaces the hero's
   * password unless another hero already uses it.
   *
   * @throws NotFoundError if the hero or the referenced team doesn't exist
   * @throws ConflictError if the new password belongs to another hero
   */
  async updateHero(heroId: number, input: UpdateHeroInput): Promise<HeroWithTeam> {
    await this.getHeroById(heroId);

    if (input.team_id !== undefined) {
      await this.assertTeamExists(input.team_id);
    }

    const changes: HeroChanges = {
      name: input.name,
      secret_name: input.secret_name,
      age: input.age,
      team_id: input.team_id,
    };

    if (input.password !== undefined) {
      const hashedPassword = hashHeroPassword(input.password);
      const holderId = await this.heroRepository.findIdByHashedPassword(hashedPassword);
      if (holderId !== null && holderId !== heroId) {
        throw new ConflictError(PASSWORD_TAKEN);
      }
      changes.hashed_password = hashedPassword;
    }

    const hero = await this.heroRepository.update(heroId, changes);

    if (!hero) {
      throw heroNotFound(heroId);
    }

    return hero;
  }

  /**
   * Delete a hero and return a confirmation message
   *
   * @throws NotFoundError if hero doesn't exist
   */
  async deleteHero(heroId: number): Promise<string> {
    const hero = await this.heroRepository.delete(heroId);

    if (!hero) {
      throw heroNotFound(heroId);
    }

    return `hero ${hero.name} deleted`;
  }

  async deleteAllHeroes(): Promise<string> {
    const count = await this.heroRepository.deleteAll();
    return `deleted ${count} heroes`;
  }

  private async assertTeamExists(teamId: number | null): Promise<void> {
    if (teamId === null) {
      return;
    }
    if (!(await this.teamRepository.findById(teamId))) {
      throw teamNotFound(teamId);
    }
  }
}
