/**
 * Row mapper tests
 */

import { mapTeamRow, mapTeamWithHeroesRow } from '../../src/models/team';
import { mapHeroRow, mapHeroWithTeamRow } from '../../src/models/hero';

describe('Team mappers', () => {
  it('should map a team row to the public view', () => {
    expect(mapTeamRow({ id: 1, name: 'Preventers', headquarters: 'Sharp Tower' })).toEqual({
      id: 1,
      name: 'Preventers',
      headquarters: 'Sharp Tower',
    });
  });

  it('should map aggregated heroes', () => {
    expect(
      mapTeamWithHeroesRow({
        id: 1,
        name: 'Preventers',
        headquarters: 'Sharp Tower',
        heroes: [{ id: 4, name: 'Rusty-Man', age: 48, team_id: 1 }],
      })
    ).toEqual({
      id: 1,
      name: 'Preventers',
      headquarters: 'Sharp Tower',
      heroes: [{ id: 4, name: 'Rusty-Man', age: 48, team_id: 1 }],
    });
  });
});

describe('Hero mappers', () => {
  it('should drop columns outside the public view', () => {
    const row = { id: 2, name: 'Deadpond', age: null, team_id: null, secret_name: 'Dive Wilson' };

    expect(mapHeroRow(row)).toEqual({ id: 2, name: 'Deadpond', age: null, team_id: null });
  });

  it('should embed the joined team', () => {
    expect(
      mapHeroWithTeamRow({
        id: 3,
        name: 'Spider-Boy',
        age: 16,
        team_id: 1,
        team_name: 'Preventers',
        team_headquarters: 'Sharp Tower',
      })
    ).toEqual({
      id: 3,
      name: 'Spider-Boy',
      age: 16,
      team_id: 1,
      team: { id: 1, name: 'Preventers', headquarters: 'Sharp Tower' },
    });
  });

  it('should set team to null for a hero without a team', () => {
    expect(
      mapHeroWithTeamRow({
        id: 2,
        name: 'Deadpond',
        age: null,
        team_id: null,
        team_name: null,
        team_headquarters: null,
      }).team
    ).toBeNull();
  });
});
