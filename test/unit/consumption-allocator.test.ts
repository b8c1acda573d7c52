import { Technology } from '../../src/constants/building-stock';
import { ConsumptionAllocator, resolve } from '../../src/services/consumption-allocator';
import { DefaultDatabase } from '../../src/services/default-database';
import { DemandStreams, EndUseMix, TechMixEntries, TechMixSpec } from '../../src/types';
import { byEndUse, byTechnology, sum } from '../../src/util/keyed';
import { DATA_DIR } from '../fixtures/payload';
import { MockLogger } from '../mocks/logger.mock';

const mixOf = (pctBuildEquipped: number, shares: Partial<Record<Technology, number>> = {}): EndUseMix => ({
  pctBuildEquipped,
  shares: byTechnology(tech => shares[tech] ?? 0),
});

const demandOf = (values: Partial<DemandStreams>, length: number = 1): DemandStreams =>
  byEndUse(endUse => values[endUse] ?? new Array<number>(length).fill(0));

describe('resolve', () => {
  it('prefers scenario values only when user defined', () => {
    expect(resolve(true, 'scenario', 'default')).toBe('scenario');
    expect(resolve(false, 'scenario', 'default')).toBe('default');
  });
});

describe('ConsumptionAllocator', () => {
  const database = DefaultDatabase.load(DATA_DIR);
  let allocator: ConsumptionAllocator;

  const idle: TechMixEntries = {
    space_heating: { ...mixOf(0), electricityInCirculation: 0 },
    space_cooling: mixOf(0),
    water_heating: mixOf(0),
    cooking: mixOf(0),
    lighting: mixOf(0),
    appliances: mixOf(0),
  };

  beforeEach(() => {
    allocator = new ConsumptionAllocator(database, new MockLogger());
  });

  describe('resolveMix', () => {
    const spec = (userDefinedData: boolean): TechMixSpec => ({
      ...idle,
      buildingUse: 'Offices',
      userDefinedData,
    });

    it('uses the scenario entry when user defined', () => {
      const mix = allocator.resolveMix(spec(true), 2019);
      expect(mix.cooking.pctBuildEquipped).toBe(0);
    });

    it('falls back to the database default for the scenario year', () => {
      const mix = allocator.resolveMix(spec(false), 2030);
      expect(mix).toEqual(database.techMixDefault('Offices', 2030));
      expect(mix.space_heating.electricityInCirculation).toBe(0.45);
    });
  });

  describe('allocate', () => {
    it('divides demand by efficiency per technology', () => {
      const mix: TechMixEntries = {
        ...idle,
        space_heating: {
          ...mixOf(1, { natural_gas: 0.5, advanced_electric_heating: 0.5 }),
          electricityInCirculation: 0.5,
        },
      };
      const result = allocator.allocate(demandOf({ space_heating: [10] }), mix, 'Offices');

      expect(result.fuels['Gases|Gas'][0]).toBeCloseTo(5 / 0.9, 12);
      expect(result.auxiliary[0]).toBeCloseTo(0.1, 12);
      expect(result.fuels.Electricity[0]).toBeCloseTo(5 / 3.2 + 0.1, 12);
      expect(result.byEndUse.space_heating.Electricity[0]).toBeCloseTo(5 / 3.2, 12);
    });

    it('weights shares by the equipped fraction', () => {
      const mix: TechMixEntries = {
        ...idle,
        cooking: mixOf(0.3, { lpg: 0.1, natural_gas: 0.45, electricity: 0.45 }),
      };
      const result = allocator.allocate(demandOf({ cooking: [2] }), mix, 'Offices');

      expect(result.fuels['Liquids|Gas'][0]).toBeCloseTo((2 * 0.3 * 0.1) / 0.5, 12);
      expect(result.fuels['Gases|Gas'][0]).toBeCloseTo((2 * 0.3 * 0.45) / 0.55, 12);
      expect(result.fuels.Electricity[0]).toBeCloseTo((2 * 0.3 * 0.45) / 0.8, 12);
    });

    it('recovers the served demand when efficiencies are applied back', () => {
      const mix: TechMixEntries = {
        ...idle,
        water_heating: mixOf(0.5, { natural_gas: 0.6, solar: 0.4 }),
      };
      const result = allocator.allocate(demandOf({ water_heating: [4] }), mix, 'Offices');
      const gas = result.fuels['Gases|Gas'][0];
      const solar = result.fuels['Heat|Solar'][0];

      expect(solar).toBeCloseTo(0.8, 12);
      expect(gas * 0.85 + solar * 1).toBeCloseTo(4 * 0.5, 12);
    });

    it('allocates nothing for an end use with no equipped buildings', () => {
      const mix: TechMixEntries = { ...idle, lighting: mixOf(0, { electricity: 1 }) };
      const result = allocator.allocate(demandOf({ lighting: [5] }), mix, 'Offices');

      expect(sum(Object.values(result.fuels).map(series => series[0]))).toBe(0);
    });

    it('keeps the fuel totals equal to the per-end-use split plus auxiliary electricity', () => {
      const mix = database.techMixDefault('Offices', 2019);
      const demand = demandOf({ space_heating: [3], space_cooling: [1], water_heating: [2], cooking: [1], lighting: [4], appliances: [5] });
      const result = allocator.allocate(demand, mix, 'Offices');

      const electricity = Object.values(result.byEndUse).reduce((total, fuels) => total + fuels.Electricity[0], 0);
      expect(result.fuels.Electricity[0]).toBeCloseTo(electricity + result.auxiliary[0], 12);
      expect(result.fuels['Solids|Coal'][0]).toBe(0);
      expect(result.fuels.Hydrogen[0]).toBe(0);
    });
  });
});
