/**
 * Hero Service Tests
 *
 * Password uniqueness, team references and partial updates over
 * in-memory repositories.
 */

import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { HeroService } from '../../src/services/hero-service';
import { TeamService } from '../../src/services/team-service';
import { ConflictError, NotFoundError } from '../../src/models/errors';
import { hashHeroPassword } from '../../src/utils/password';
import {
  InMemoryStore,
  InMemoryTeamRepository,
  InMemoryHeroRepository,
} from '../helpers/in-memory-repositories';

describe('HeroService', () => {
  let store: InMemoryStore;
  let heroRepository: InMemoryHeroRepository;
  let teamService: TeamService;
  let service: HeroService;

  beforeEach(() => {
    store = new InMemoryStore();
    const teamRepository = new InMemoryTeamRepository(store);
    heroRepository = new InMemoryHeroRepository(store);
    teamService = new TeamService(teamRepository);
    service = new HeroService(heroRepository, teamRepository);
  });

  const deadpond = {
    name: 'Deadpond',
    secret_name: 'Dive Wilson',
    password: 'shared-password',
  };

  describe('createHero', () => {
    it('should store the hashed password and default optional fields', async () => {
      const hero = await service.createHero(deadpond);

      expect(hero).toEqual({ id: 1, name: 'Deadpond', age: null, team_id: null, team: null });
      expect(store.heroes.get(1)?.hashed_password).toBe(hashHeroPassword('shared-password'));
    });

    it('should embed the referenced team', async () => {
      const team = await teamService.createTeam({ name: 'Preventers', headquarters: 'Sharp Tower' });

      const hero = await service.createHero({ ...deadpond, age: 30, team_id: team.id });

      expect(hero.team).toEqual({ id: team.id, name: 'Preventers', headquarters: 'Sharp Tower' });
    });

    it('should reject a missing team with NotFoundError', async () => {
      await expect(service.createHero({ ...deadpond, team_id: 9 })).rejects.toThrow(
        new NotFoundError('team with id 9 not found')
      );
      expect(store.heroes.size).toBe(0);
    });

    it('should reject a second hero with the same password', async () => {
      await service.createHero(deadpond);

      await expect(
        service.createHero({ name: 'Spider-Boy', secret_name: 'Pedro Parqueador', password: 'shared-password' })
      ).rejects.toThrow(new ConflictError('password already taken'));
      expect(store.heroes.size).toBe(1);
    });

    it('should report a conflict when the insert loses a race', async () => {
      jest.spyOn(heroRepository, 'findIdByHashedPassword').mockResolvedValueOnce(null);
      jest.spyOn(heroRepository, 'create').mockResolvedValueOnce(null);

      await expect(service.createHero(deadpond)).rejects.toBeInstanceOf(ConflictError);
    });
  });

  describe('getHeroById', () => {
    it('should throw NotFoundError for a missing hero', async () => {
      await expect(service.getHeroById(3)).rejects.toThrow('hero with id 3 not found');
    });
  });

  describe('updateHero', () => {
    it('should update only provided fields', async () => {
      const hero = await service.createHero({ ...deadpond, age: 30 });

      const updated = await service.updateHero(hero.id, { name: 'Deadpool' });

      expect(updated).toMatchObject({ name: 'Deadpool', age: 30 });
      expect(store.heroes.get(hero.id)?.secret_name).toBe('Dive Wilson');
    });

    it('should clear age and team with null', async () => {
      const team = await teamService.createTeam({ name: 'Preventers', headquarters: 'Sharp Tower' });
      const hero = await service.createHero({ ...deadpond, age: 30, team_id: team.id });

      const updated = await service.updateHero(hero.id, { age: null, team_id: null });

      expect(updated).toMatchObject({ age: null, team_id: null, team: null });
    });

    it('should change the password', async () => {
      const hero = await service.createHero(deadpond);

      await service.updateHero(hero.id, { password: 'other-password' });

      expect(store.heroes.get(hero.id)?.hashed_password).toBe(hashHeroPassword('other-password'));
    });

    it('should accept resubmitting the current password', async () => {
      const hero = await service.createHero(deadpond);

      await expect(service.updateHero(hero.id, { password: 'shared-password' })).resolves.toMatchObject({
        id: hero.id,
      });
    });

    it('should reject a password held by another hero', async () => {
      await service.createHero(deadpond);
      const other = await service.createHero({ name: 'Rusty-Man', secret_name: 'Tommy Sharp', password: 'other-password' });

      await expect(service.updateHero(other.id, { password: 'shared-password' })).rejects.toThrow(
        'password already taken'
      );
    });

    it('should throw NotFoundError for a missing hero', async () => {
      await expect(service.updateHero(404, { name: 'Nobody' })).rejects.toThrow(
        new NotFoundError('hero with id 404 not found')
      );
    });

    it('should throw NotFoundError for a missing team', async () => {
      const hero = await service.createHero(deadpond);

      await expect(service.updateHero(hero.id, { team_id: 12 })).rejects.toThrow('team with id 12 not found');
    });
  });

  describe('deletion', () => {
    it('should confirm a deletion by name', async () => {
      const hero = await service.createHero(deadpond);

      await expect(service.deleteHero(hero.id)).resolves.toBe('hero Deadpond deleted');
    });

    it('should throw NotFoundError when deleting a missing hero', async () => {
      await expect(service.deleteHero(1)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should count heroes deleted in bulk', async () => {
      await service.createHero(deadpond);
      await service.createHero({ ...deadpond, password: 'other-password' });

      await expect(service.deleteAllHeroes()).resolves.toBe('deleted 2 heroes');
    });

    it('should keep heroes with a null team after their team is deleted', async () => {
      const team = await teamService.createTeam({ name: 'Preventers', headquarters: 'Sharp Tower' });
      const hero = await service.createHero({ ...deadpond, team_id: team.id });

      await teamService.deleteTeam(team.id);

      await expect(service.getHeroById(hero.id)).resolves.toMatchObject({ team_id: null, team: null });
    });
  });
});
