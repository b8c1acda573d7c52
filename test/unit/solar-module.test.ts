import { DateTime } from 'luxon';
import { DefaultDatabase } from '../../src/services/default-database';
import { SolarModule } from '../../src/services/solar-module';
import { RadiationRecord, SolarSpec } from '../../src/types';
import { byFuel, sum } from '../../src/util/keyed';
import { buildHourlyWindow } from '../../src/util/time-window';
import { DATA_DIR } from '../fixtures/payload';
import { MockLogger } from '../mocks/logger.mock';

const band = (region: string, areaM2: number, medianRadiation: number): RadiationRecord => ({
  region,
  centroidX: 0,
  centroidY: 0,
  totalArea: 10 * areaM2,
  maxRadiation: medianRadiation + 49,
  averageRadiation: medianRadiation,
  threshold: medianRadiation - 50,
  areaM2,
  medianRadiation,
  medianRadiationX: 0,
  medianRadiationY: 0,
});

const spec = (values: Partial<SolarSpec>): SolarSpec => ({
  buildingUse: 'Offices',
  areaTotal: null,
  power: null,
  capex: null,
  ...values,
});

describe('SolarModule', () => {
  const database = DefaultDatabase.load(DATA_DIR);
  const records = [band('ES211', 100, 750), band('ES212', 300, 1050), band('ES411', 1000, 2000)];
  const year = buildHourlyWindow(DateTime.utc(2019, 1, 1, 0), DateTime.utc(2019, 12, 31, 23));
  let logger: MockLogger;
  let solar: SolarModule;

  beforeEach(() => {
    logger = new MockLogger();
    solar = new SolarModule(database, logger);
  });

  describe('resolveCapacity', () => {
    it('converts peak power to collector area', () => {
      expect(solar.resolveCapacity(spec({ power: 10 }))).toEqual({ source: 'power', areaM2: 60, powerKw: 10 });
    });

    it('prefers area over power', () => {
      const capacity = solar.resolveCapacity(spec({ areaTotal: 100, power: 10 }));
      expect(capacity.source).toBe('area_total');
      expect(capacity.areaM2).toBe(100);
      expect(capacity.powerKw).toBeCloseTo(100 / 6, 12);
    });

    it('converts investment through the cost per kWp', () => {
      expect(solar.resolveCapacity(spec({ capex: 13000 }))).toEqual({ source: 'capex', areaM2: 60, powerKw: 10 });
    });

    it('installs nothing when every value is null', () => {
      expect(solar.resolveCapacity(spec({}))).toEqual({ source: 'none', areaM2: 0, powerKw: 0 });
    });

    it('prefers power over investment', () => {
      expect(solar.resolveCapacity(spec({ power: 10, capex: 99999 }))).toEqual({ source: 'power', areaM2: 60, powerKw: 10 });
    });

    it('takes an explicit zero as a value', () => {
      expect(solar.resolveCapacity(spec({ areaTotal: 0, power: 10 })).source).toBe('area_total');
    });
  });

  it('weights band radiation by area within the region', () => {
    expect(solar.representativeRadiation(records, ['ES211', 'ES212'])).toEqual({
      radiation: 975,
      availableArea: 400,
      bands: 2,
    });
    expect(solar.representativeRadiation(records, ['ES301'])).toEqual({ radiation: 0, availableArea: 0, bands: 0 });
  });

  it('only reads bands of the NUTS3 areas listed for the region', () => {
    const generation = solar.generate({
      spec: spec({ areaTotal: 1000 }),
      records: [...records, band('ES2199', 5000, 3000)],
      nutsid: 'ES21',
      window: year,
      year: 2019,
      latitude: 43.2,
    });

    expect(generation.installedAreaM2).toBe(400);
    expect(sum(generation.pv)).toBeCloseTo(360 * 975 * 0.15, 4);
  });

  it('spreads availability so a full year sums to 1', () => {
    const weights = solar.availability(year, 2019, 43.2);
    expect(sum(weights)).toBeCloseTo(1, 9);
    expect(weights[0]).toBe(0);
  });

  it('caps the installed area at the available roof area', () => {
    const generation = solar.generate({
      spec: spec({ areaTotal: 1000 }),
      records,
      nutsid: 'ES21',
      window: year,
      year: 2019,
      latitude: 43.2,
    });

    // 400 m² installed, 10 % of it thermal for offices
    expect(sum(generation.pv)).toBeCloseTo(360 * 975 * 0.15, 4);
    expect(sum(generation.thermal)).toBeCloseTo(40 * 975 * 0.45, 4);
    expect(generation.installedAreaM2).toBe(400);
    expect(generation.installedPowerKw).toBeCloseTo(400 / 6, 12);
    expect(logger.warn).toHaveBeenCalledWith('Solar area for Offices capped at the available roof area', {
      requested: 1000,
      available: 400,
    });
  });

  it('generates nothing at night', () => {
    const night = buildHourlyWindow(DateTime.utc(2019, 6, 1, 0), DateTime.utc(2019, 6, 1, 2));
    const generation = solar.generate({
      spec: spec({ power: 10 }),
      records,
      nutsid: 'ES21',
      window: night,
      year: 2019,
      latitude: 43.2,
    });
    expect(generation.pv).toEqual([0, 0, 0]);
    expect(generation.thermal).toEqual([0, 0, 0]);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('meets water heating with solar heat up to the demand', () => {
    expect(solar.offsetWaterHeating([1, 2], [1.5, 0.5])).toEqual({ residual: [0, 1.5], used: [1, 0.5] });
  });

  it('never drives grid electricity below zero', () => {
    const fuels = byFuel(() => [0, 0, 0]);
    fuels.Electricity = [5, 1, 0];

    expect(solar.offsetElectricity(fuels, [2, 3, 1])).toEqual([2, 1, 0]);
    expect(fuels.Electricity).toEqual([3, 0, 0]);
  });
});
