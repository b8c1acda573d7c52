import { DateTime } from 'luxon';
import { FUEL_CATEGORIES, RESULT_CATEGORIES } from '../../src/constants/building-stock';
import { ArchetypeRepository } from '../../src/services/archetype-repository';
import { BuildingStockModel } from '../../src/services/building-stock-model';
import { DefaultDatabase } from '../../src/services/default-database';
import { InputLoader } from '../../src/services/input-loader';
import { ResultAggregator } from '../../src/services/result-aggregator';
import { SchemaValidator } from '../../src/services/schema-validator';
import { ModelResult, RadiationRecord, ScenarioConfig } from '../../src/types';
import { buildHourlyWindow } from '../../src/util/time-window';
import { baselinePayload, DATA_DIR, examplePayload, RawPayload } from '../fixtures/payload';
import { MockLogger } from '../mocks/logger.mock';

describe('BuildingStockModel', () => {
  const logger = new MockLogger();
  const validator = new SchemaValidator(logger);
  const loader = new InputLoader(DATA_DIR, validator, logger);
  const database = DefaultDatabase.load(DATA_DIR);
  const archetypes = new ArchetypeRepository(loader.loadArchetypes('ES21'));
  const radiation: RadiationRecord[] = loader.loadRadiation('ES21');

  const scenarioOf = (payload: RawPayload): ScenarioConfig =>
    validator.assertValid(validator.validatePayload(payload), 'test payload');

  const run = (payload: RawPayload, start: DateTime, end: DateTime): ModelResult =>
    new BuildingStockModel(database, logger).run({
      scenario: scenarioOf(payload),
      archetypes,
      radiation,
      window: buildHourlyWindow(start, end),
      buildingUse: 'Offices',
    });

  describe('baseline run for offices in ES21', () => {
    const start = DateTime.utc(2019, 3, 1, 13);
    const end = DateTime.utc(2019, 3, 2, 13);
    let result: ModelResult;

    beforeAll(() => {
      result = run(baselinePayload(), start, end);
    });

    it('is a baseline run', () => {
      expect(result.runKind).toBe('baseline');
      expect(result.buildingUse).toBe('Offices');
    });

    it('returns 25 hourly entries for every category', () => {
      const document = new ResultAggregator(logger).toDocument(result.series);

      expect(Object.keys(document)).toEqual(['Datetime', ...RESULT_CATEGORIES]);
      expect(document.Datetime).toHaveLength(25);
      expect(document.Datetime[0]).toBe('2019-03-01 13:00');
      for (const category of RESULT_CATEGORIES) {
        expect(document[category]).toHaveLength(25);
      }
    });

    it('reports no coal or hydrogen for offices', () => {
      expect(result.series.values['Solids|Coal'].every(value => value === 0)).toBe(true);
      expect(result.series.values.Hydrogen.every(value => value === 0)).toBe(true);
    });

    it('keeps every value finite and non-negative', () => {
      for (const category of RESULT_CATEGORIES) {
        expect(result.series.values[category].every(value => Number.isFinite(value) && value >= 0)).toBe(true);
      }
    });

    it('uses electricity in every hour', () => {
      expect(result.series.values.Electricity.every(value => value > 0)).toBe(true);
    });

    it('generates the solar capacity of the payload', () => {
      expect(result.summary.solarGeneration.pv).toBeGreaterThan(0);
      expect(result.summary.solarGeneration.thermal).toBeGreaterThan(0);
      expect(result.series.values['Heat|Solar'].some(value => value > 0)).toBe(true);
      expect(result.summary.investment.solar).toEqual({ powerKw: 1500, capex: 1950000, opex: 30000 });
    });

    it('warns about the scenario factors it ignores', () => {
      expect(logger.warn).toHaveBeenCalledWith('Base-year run for Offices ignores scenario factors', {
        hdd_reduction: 0.1,
        increase_service_built_area: 0.03,
        passive_measures: 0.25,
      });
    });

    it('costs no retrofitting', () => {
      expect(result.summary.investment.retrofitCost).toBe(0);
      expect(result.summary.investment.totalCapex).toBeGreaterThan(result.summary.investment.solar.capex);
    });

    it('prices every hour with the base-year factors', () => {
      const factors = database.fuelFactors(2019);
      const hour = 5;
      const expected = FUEL_CATEGORIES.reduce(
        (total, fuel) => total + result.series.values[fuel][hour] * factors[fuel].cost,
        0
      );
      expect(result.series.values['Variable cost [€/KWh]'][hour]).toBeCloseTo(expected, 9);
    });

    it('is deterministic', () => {
      expect(run(baselinePayload(), start, end)).toEqual(result);
    });
  });

  describe('scenario run', () => {
    const start = DateTime.utc(2030, 6, 3, 8);
    const end = DateTime.utc(2030, 6, 3, 17);

    it('adds the new solar capacity', () => {
      const result = run(examplePayload(), start, end);

      expect(result.runKind).toBe('scenario');
      expect(result.summary.solarGeneration.pv).toBeGreaterThan(0);
      expect(result.summary.solarGeneration.thermal).toBeGreaterThan(0);
      expect(result.series.values['Heat|Solar'].every(value => value > 0)).toBe(true);
      expect(result.summary.investment.solar).toEqual({ powerKw: 1500, capex: 1950000, opex: 30000 });
      expect(result.summary.investment.retrofitCost).toBeGreaterThan(0);
    });

    it('covers solar heat in a base-year run of a service building', () => {
      const payload = examplePayload();
      payload.year = 2019;
      payload.scenario.hdd_reduction = 0.9;
      payload.scenario.increase_service_built_area = 1;
      for (const entry of payload.scenario.solar) {
        entry.area_total = 5000;
        entry.power = null;
      }

      const result = run(payload, DateTime.utc(2019, 6, 3, 8), DateTime.utc(2019, 6, 3, 17));
      expect(result.runKind).toBe('baseline');
      expect(result.summary.solarGeneration.thermal).toBeGreaterThan(0);
      expect(result.summary.investment.solar.powerKw).toBeCloseTo(5000 / 6, 9);
    });

    it('scales demand with the service floor-area increase', () => {
      const flat = examplePayload();
      flat.scenario.increase_service_built_area = 0;
      const grown = examplePayload();
      grown.scenario.increase_service_built_area = 0.1;

      const ratio = run(grown, start, end).summary.demand.lighting / run(flat, start, end).summary.demand.lighting;
      expect(ratio).toBeCloseTo(1.1, 9);
    });

    it('lowers heating demand with deeper renovation', () => {
      const winterStart = DateTime.utc(2030, 1, 14, 0);
      const winterEnd = DateTime.utc(2030, 1, 14, 23);
      const untouched = examplePayload();
      const renovated = examplePayload();
      for (const entry of untouched.scenario.passive_measures) {
        for (const period of Object.keys(entry.percentages_by_periods)) {
          entry.percentages_by_periods[period] = 0;
        }
      }
      for (const entry of renovated.scenario.passive_measures) {
        entry.ref_level = 'High';
        for (const period of Object.keys(entry.percentages_by_periods)) {
          entry.percentages_by_periods[period] = 1;
        }
      }

      const before = run(untouched, winterStart, winterEnd).summary.demand.space_heating;
      const after = run(renovated, winterStart, winterEnd).summary.demand.space_heating;
      expect(before).toBeGreaterThan(0);
      expect(after).toBeLessThan(before);
    });
  });
});
