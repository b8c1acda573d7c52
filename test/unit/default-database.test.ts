import fs from 'fs';
import os from 'os';
import path from 'path';
import { DATABASE_FILE, DefaultDatabase, pickYear } from '../../src/services/default-database';
import { AppError, ErrorCategory, ValidationError } from '../../src/util/error-handler';
import { DATA_DIR, thrown } from '../fixtures/payload';

interface RawDatabase {
  techMixDefaults: Record<string, Record<string, Record<string, Record<string, number>>>>;
  [section: string]: unknown;
}

const readDocument = (): RawDatabase => JSON.parse(fs.readFileSync(path.join(DATA_DIR, DATABASE_FILE), 'utf8'));

describe('DefaultDatabase', () => {
  let database: DefaultDatabase;

  beforeAll(() => {
    database = DefaultDatabase.load(DATA_DIR);
  });

  it('loads the shipped database', () => {
    expect(database.version).toBe('v0.10.0');
    expect(database.baseYear).toBe(2019);
    expect(database.auxiliaryCirculationRatio).toBe(0.02);
  });

  it('knows the supported regions', () => {
    expect(database.region('ES21').latitude).toBe(43.2);
    expect(database.region('ES21').nuts3).toEqual(['ES211', 'ES212', 'ES213']);
    expect(database.climate('ES41').dailyAmplitude).toBe(12);
  });

  it('types every keyed section by its own entries', () => {
    expect(database.solar.thermalShare.Offices).toBe(0.1);
    expect(database.baseTemperatures.Sport).toEqual({ heating: 14, cooling: 25 });
  });

  it('reads investment parameters', () => {
    const { investment } = database;
    expect(investment.retrofitCost.High).toBe(200);
    expect(investment.equipmentCapacity.Offices.space_heating).toBe(70);
    expect(investment.equipmentCapacity.Offices.cooking).toBe(2);
    expect(investment.equipmentCosts.natural_gas).toEqual({ capex: 200, opex: 8 });
    expect(database.solar.opexPerKw).toBe(20);
  });

  it('throws a data integrity error for unknown regions', () => {
    expect(() => database.region('FR10')).toThrow('Region FR10 is not in the default database');
    const error = thrown(() => database.climate('FR10'));
    expect(error).toBeInstanceOf(AppError);
    expect(error).toMatchObject({ category: ErrorCategory.DATA_INTEGRITY });
  });

  it('picks the default tech mix of the nearest listed year at or below', () => {
    const circulation = (year: number): number =>
      database.techMixDefault('Offices', year).space_heating.electricityInCirculation;

    expect(circulation(2019)).toBe(0.4);
    expect(circulation(2025)).toBe(0.4);
    expect(circulation(2030)).toBe(0.45);
    expect(circulation(2050)).toBe(0.5);
    expect(circulation(2010)).toBe(0.4);
    expect(database.techMixDefault('Offices', 2030).cooking.shares.lpg).toBe(0.05);
  });

  it('fills technologies that do not apply to an end use with 0', () => {
    const mix = database.techMixDefault('Offices', 2019);
    expect(mix.lighting.shares.electricity).toBe(1);
    expect(mix.lighting.shares.natural_gas).toBe(0);
  });

  it('returns efficiencies and fuel factors', () => {
    expect(database.efficiency('space_cooling', 'electric_space_cooling')).toBe(3);
    expect(database.efficiency('space_heating', 'advanced_electric_heating')).toBe(3.2);
    expect(() => database.efficiency('lighting', 'solids')).toThrow('No efficiency for solids in lighting');
    expect(database.fuelFactors(2019).Electricity).toEqual({ cost: 0.19, emissions: 0.25 });
    expect(database.fuelFactors(2035).Electricity).toEqual({ cost: 0.17, emissions: 0.15 });
  });

  it('returns envelope, ventilation and schedule data per use', () => {
    expect(database.uValues('1970-1979')).toEqual({ wall: 1.4, roof: 1.4, floor: 1, window: 4.5 });
    expect(database.retrofitUValues('High')).toEqual({ wall: 0.25, roof: 0.2, floor: 0.3, window: 1.2 });
    expect(database.windowRatio('Offices')).toBe(0.35);
    expect(database.ventilation('Offices')).toBe(1);
    expect(database.baseTemperatures('Offices')).toEqual({ heating: 16, cooling: 24 });
    expect(database.schedule('Offices', false)[10]).toBe(1);
    expect(database.schedule('Offices', true)[10]).toBe(0.05);
  });

  it('is immutable', () => {
    expect(Object.isFrozen(database.solar)).toBe(true);
    expect(Object.isFrozen(database.solar.thermalShare)).toBe(true);
  });

  describe('integrity check', () => {
    it('reports a missing section', () => {
      const document = readDocument();
      delete document.fuelFactors;

      const result = DefaultDatabase.validateIntegrity(document);
      expect(result).toEqual({
        ok: false,
        violations: [{ path: 'database.fuelFactors', rule: 'required', message: 'section is missing' }],
      });
    });

    it('enforces the sum-to-1 rule on default mixes', () => {
      const document = readDocument();
      document.techMixDefaults.Offices['2019'].cooking.lpg = 0.2;

      const result = DefaultDatabase.validateIntegrity(document);
      expect(result.ok).toBe(false);
      expect(result.ok ? [] : result.violations).toEqual([
        {
          path: 'database.techMixDefaults.Offices.2019.cooking',
          rule: 'sum-to-one',
          message: 'fuel shares sum to 1.1, expected 1 (tolerance 0.0001)',
        },
      ]);
    });

    it('throws a data integrity ValidationError from fromDocument', () => {
      const document = readDocument();
      delete document.solar;

      const error = thrown(() => DefaultDatabase.fromDocument(document));
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        category: ErrorCategory.DATA_INTEGRITY,
        violations: [{ path: 'database.solar', rule: 'required', message: 'section is missing' }],
      });
    });

    it('rejects a missing database file', () => {
      const empty = fs.mkdtempSync(path.join(os.tmpdir(), 'bsem-db-'));
      try {
        expect(() => DefaultDatabase.load(empty)).toThrow(`Default database not found at ${path.join(empty, DATABASE_FILE)}`);
      } finally {
        fs.rmSync(empty, { recursive: true, force: true });
      }
    });
  });
});

describe('pickYear', () => {
  const entries = [
    { year: 2019, value: 'a' },
    { year: 2030, value: 'b' },
    { year: 2050, value: 'c' },
  ];

  it('takes the nearest year at or below', () => {
    expect(pickYear(entries, 2019)).toBe('a');
    expect(pickYear(entries, 2049)).toBe('b');
    expect(pickYear(entries, 2050)).toBe('c');
  });

  it('falls back to the earliest year', () => {
    expect(pickYear(entries, 2000)).toBe('a');
  });
});
