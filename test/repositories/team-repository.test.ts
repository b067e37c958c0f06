/**
 * Team Repository Tests
 */

import { TeamRepository } from '../../src/repositories/team-repository';
import { query } from '../../src/config/database';
import { queryResult } from '../helpers/query-result';

jest.mock('../../src/config/database', () => ({
  query: jest.fn(),
}));

const mockQuery = jest.mocked(query);

const preventersRow = {
  id: 1,
  name: 'Preventers',
  headquarters: 'Sharp Tower',
  heroes: [{ id: 2, name: 'Rusty-Man', age: 48, team_id: 1 }],
};

describe('TeamRepository', () => {
  let repository: TeamRepository;

  beforeEach(() => {
    mockQuery.mockReset();
    repository = new TeamRepository();
  });

  describe('findAll', () => {
    it('should return every team with its heroes ordered by id', async () => {
      mockQuery.mockResolvedValueOnce(
        queryResult([
          preventersRow,
          { id: 2, name: 'Z-Force', headquarters: 'Sister Margaret\'s Bar', heroes: [] },
        ])
      );

      const teams = await repository.findAll();

      expect(teams).toEqual([
        {
          id: 1,
          name: 'Preventers',
          headquarters: 'Sharp Tower',
          heroes: [{ id: 2, name: 'Rusty-Man', age: 48, team_id: 1 }],
        },
        { id: 2, name: 'Z-Force', headquarters: 'Sister Margaret\'s Bar', heroes: [] },
      ]);
      const [sql] = mockQuery.mock.calls[0];
      expect(sql).toContain('LEFT JOIN heroes h ON h.team_id = t.id');
      expect(sql).toContain('GROUP BY t.id ORDER BY t.id ASC');
    });

    it('should return an empty list when there are no teams', async () => {
      mockQuery.mockResolvedValueOnce(queryResult([]));

      await expect(repository.findAll()).resolves.toEqual([]);
    });
  });

  describe('findById', () => {
    it('should look the team up by key', async () => {
      mockQuery.mockResolvedValueOnce(queryResult([preventersRow]));

      const team = await repository.findById(1);

      expect(team?.name).toBe('Preventers');
      const [sql, params] = mockQuery.mock.calls[0];
      expect(sql).toContain('WHERE t.id = $1 GROUP BY t.id');
      expect(params).toEqual([1]);
    });

    it('should return null when the team does not exist', async () => {
      mockQuery.mockResolvedValueOnce(queryResult([]));

      await expect(repository.findById(99)).resolves.toBeNull();
    });
  });

  describe('create', () => {
    it('should insert the team and return it without heroes', async () => {
      mockQuery.mockResolvedValueOnce(
        queryResult([{ id: 3, name: 'Preventers', headquarters: 'Sharp Tower' }])
      );

      const team = await repository.create({ name: 'Preventers', headquarters: 'Sharp Tower' });

      expect(team).toEqual({ id: 3, name: 'Preventers', headquarters: 'Sharp Tower', heroes: [] });
      const [sql, params] = mockQuery.mock.calls[0];
      expect(sql).toContain('INSERT INTO teams (name, headquarters)');
      expect(params).toEqual(['Preventers', 'Sharp Tower']);
    });
  });

  describe('update', () => {
    it('should update only the provided fields and re-read the team', async () => {
      mockQuery
        .mockResolvedValueOnce(queryResult([], 1))
        .mockResolvedValueOnce(queryResult([{ ...preventersRow, name: 'New Preventers' }]));

      const team = await repository.update(1, { name: 'New Preventers' });

      expect(mockQuery.mock.calls[0]).toEqual([
        'UPDATE teams SET name = $1 WHERE id = $2',
        ['New Preventers', 1],
      ]);
      expect(team?.name).toBe('New Preventers');
      expect(mockQuery).toHaveBeenCalledTimes(2);
    });

    it('should return null when no row was updated', async () => {
      mockQuery.mockResolvedValueOnce(queryResult([], 0));

      await expect(repository.update(42, { headquarters: 'Nowhere' })).resolves.toBeNull();
      expect(mockQuery).toHaveBeenCalledTimes(1);
    });

    it('should skip the UPDATE for an empty change set', async () => {
      mockQuery.mockResolvedValueOnce(queryResult([preventersRow]));

      const team = await repository.update(1, {});

      expect(team?.id).toBe(1);
      expect(mockQuery).toHaveBeenCalledTimes(1);
      expect(mockQuery.mock.calls[0][0]).toContain('WHERE t.id = $1');
    });
  });

  describe('delete', () => {
    it('should return the deleted team', async () => {
      mockQuery.mockResolvedValueOnce(
        queryResult([{ id: 1, name: 'Preventers', headquarters: 'Sharp Tower' }])
      );

      await expect(repository.delete(1)).resolves.toEqual({
        id: 1,
        name: 'Preventers',
        headquarters: 'Sharp Tower',
      });
      expect(mockQuery.mock.calls[0]).toEqual([
        'DELETE FROM teams WHERE id = $1 RETURNING id, name, headquarters',
        [1],
      ]);
    });

    it('should return null when the team does not exist', async () => {
      mockQuery.mockResolvedValueOnce(queryResult([]));

      await expect(repository.delete(1)).resolves.toBeNull();
    });
  });

  describe('deleteAll', () => {
    it('should return the number of deleted rows', async () => {
      mockQuery.mockResolvedValueOnce(queryResult([], 3));

      await expect(repository.deleteAll()).resolves.toBe(3);
      expect(mockQuery).toHaveBeenCalledWith('DELETE FROM teams');
    });

    it('should treat a missing row count as zero', async () => {
      mockQuery.mockResolvedValueOnce(queryResult([], null));

      await expect(repository.deleteAll()).resolves.toBe(0);
    });
  });
});
