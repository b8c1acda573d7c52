import { ArchetypeRepository } from '../../src/services/archetype-repository';
import { InputLoader } from '../../src/services/input-loader';
import { SchemaValidator } from '../../src/services/schema-validator';
import { archetype } from '../fixtures/archetypes';
import { DATA_DIR } from '../fixtures/payload';
import { MockLogger } from '../mocks/logger.mock';

describe('ArchetypeRepository', () => {
  const repository = new ArchetypeRepository([
    archetype('O1', 'Offices', 'Pre-1945', { floorArea: 200 }),
    archetype('A1', 'Apartment Block', 'Pre-1945'),
    archetype('O2', 'Offices', '1970-1979', { floorArea: 300 }),
    archetype('A2', 'Apartment Block', 'Pre-1945'),
  ]);

  it('counts every archetype', () => {
    expect(repository.size).toBe(4);
  });

  it('lists archetypes of a use in inventory order', () => {
    expect(repository.forUse('Offices').map(a => a.archetypeId)).toEqual(['O1', 'O2']);
    expect(repository.forUse('Sport')).toEqual([]);
  });

  it('filters by construction period', () => {
    expect(repository.forUseAndPeriod('Apartment Block', 'Pre-1945').map(a => a.archetypeId)).toEqual(['A1', 'A2']);
    expect(repository.forUseAndPeriod('Offices', 'Post-2010')).toEqual([]);
  });

  it('sums floor area per use', () => {
    expect(repository.totalFloorArea('Offices')).toBe(500);
  });

  it('stores frozen copies', () => {
    const [stored] = repository.forUse('Offices');
    expect(stored.archetypeId).toBe('O1');
    expect(Object.isFrozen(stored)).toBe(true);
  });

  it('covers the shipped inventory', () => {
    const logger = new MockLogger();
    const loader = new InputLoader(DATA_DIR, new SchemaValidator(logger), logger);
    const shipped = new ArchetypeRepository(loader.loadArchetypes('ES21'));

    expect(shipped.size).toBe(98);
    expect(shipped.forUse('Apartment Block')).toHaveLength(28);
    expect(shipped.forUse('Offices')).toHaveLength(7);
    expect(shipped.totalFloorArea('Offices')).toBe(1500000);
  });
});
