import fs from 'fs';
import path from 'path';
import {
  BUILDING_USES,
  BuildingUse,
  CONSTRUCTION_PERIODS,
  ConstructionPeriod,
  END_USE_TECHNOLOGIES,
  END_USES,
  EndUse,
  EQUIPMENT_END_USES,
  EquipmentEndUse,
  FUEL_CATEGORIES,
  FuelCategory,
  REF_LEVELS,
  RefLevel,
  Technology,
} from '../constants/building-stock';
import { DefaultModelConfig, MODEL_VERSION } from '../config/model-defaults';
import { TechMixEntries } from '../types';
import {
  dataIntegrityError,
  ErrorCategory,
  ValidationError,
} from '../util/error-handler';
import {
  byEndUse,
  byEquipmentEndUse,
  byFuel,
  byLevel,
  byPeriod,
  byTechnology,
  byUse,
  isComplete,
} from '../util/keyed';
import { Logger } from '../util/logger';
import {
  requireField,
  validateArray,
  validateNumber,
  validateObject,
  validateString,
  ValidationResult,
  ViolationCollector,
} from '../util/validation';
import { parseTechMixEntries } from './tech-mix-parser';

export interface EnvelopeUValues {
  wall: number;
  roof: number;
  floor: number;
  window: number;
}

export interface BaseTemperatures {
  heating: number;
  cooling: number;
}

/** Gains and specific loads of a building use (W/m² of floor area). */
export interface UseGains {
  internal: number;
  /** Peak solar gain through glazing */
  solar: number;
  water_heating: number;
  cooking: number;
  lighting: number;
  appliances: number;
}

export interface DaySchedules {
  weekday: number[];
  weekend: number[];
}

export interface FuelFactor {
  /** €/kWh */
  cost: number;
  /** kgCO2/kWh */
  emissions: number;
}

export interface RegionInfo {
  name: string;
  latitude: number;
  nuts3: string[];
}

export interface RegionClimate {
  /** Monthly mean outdoor temperature, January first (°C) */
  monthlyMeanTemperature: number[];
  /** Peak-to-trough daily swing (K) */
  dailyAmplitude: number;
}

export interface SolarParameters {
  pvEfficiency: number;
  thermalEfficiency: number;
  /** Collector area per installed kWp */
  squareMetresPerKw: number;
  /** Investment per installed kWp (€) */
  capexPerKw: number;
  /** Running cost per installed kWp (€/yr) */
  opexPerKw: number;
  /** Fraction of the installed area used for solar thermal, per building use */
  thermalShare: Record<BuildingUse, number>;
}

export interface EquipmentCost {
  /** Investment per kW of rated capacity (€) */
  capex: number;
  /** Running cost per kW of rated capacity (€/yr) */
  opex: number;
}

export interface InvestmentParameters {
  /** Rated equipment capacity per m² of floor area (W/m²) */
  equipmentCapacity: Record<BuildingUse, Record<EquipmentEndUse, number>>;
  equipmentCosts: Record<Technology, EquipmentCost>;
  /** Envelope retrofitting cost per m² of renovated floor area (€) */
  retrofitCost: Record<RefLevel, number>;
}

/** Conversion efficiency of each technology serving an end use */
export type Efficiencies = Partial<Record<Technology, number>>;

export interface YearEntry<T> {
  year: number;
  value: T;
}

/** Values listed for some years, ascending */
export type YearIndexed<T> = YearEntry<T>[];

export interface DatabaseDocument {
  version: string;
  baseYear: number;
  regions: Record<string, RegionInfo>;
  climate: Record<string, RegionClimate>;
  baseTemperatures: Record<BuildingUse, BaseTemperatures>;
  uValues: Record<ConstructionPeriod, EnvelopeUValues>;
  retrofitUValues: Record<RefLevel, EnvelopeUValues>;
  windowRatio: Record<BuildingUse, number>;
  ventilation: Record<BuildingUse, number>;
  gains: Record<BuildingUse, UseGains>;
  schedules: Record<BuildingUse, DaySchedules>;
  techMixDefaults: Record<BuildingUse, YearIndexed<TechMixEntries>>;
  efficiencies: Record<EndUse, Efficiencies>;
  auxiliaryCirculationRatio: number;
  fuelFactors: YearIndexed<Record<FuelCategory, FuelFactor>>;
  solar: SolarParameters;
  investment: InvestmentParameters;
}

export const DATABASE_FILE = path.join('database', 'default-database.json');

const REQUIRED_SECTIONS = [
  'baseYear',
  'regions',
  'climate',
  'baseTemperatures',
  'uValues',
  'windowRatio',
  'retrofitUValues',
  'ventilation',
  'gains',
  'schedules',
  'techMixDefaults',
  'efficiencies',
  'fuelFactors',
  'solar',
  'investment',
] as const;

const TECHNOLOGIES: readonly Technology[] = Object.values(byTechnology(tech => tech));

/**
 * Pick the entry listed for the nearest year at or below `year`, falling back
 * to the earliest listed year
 */
export function pickYear<T>(entries: YearIndexed<T>, year: number): T {
  let chosen = entries[0];
  for (const entry of entries) {
    if (entry.year <= year) {
      chosen = entry;
    }
  }
  return chosen.value;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    Object.values(value).forEach(deepFreeze);
  }
  return value;
}

// Section parsers. Each records violations and yields undefined on failure.

type Collector = ViolationCollector;

function readNumber(
  source: Record<string, unknown>,
  key: string,
  at: string,
  c: Collector,
  options: { min?: number; max?: number; integer?: boolean } = {}
): number | undefined {
  const raw = requireField(source, key, `${at}.${key}`, c);
  return raw === undefined ? undefined : validateNumber(raw, `${at}.${key}`, c, options);
}

function keyed<K extends string, T>(
  raw: unknown,
  at: string,
  c: Collector,
  keys: readonly K[],
  make: (fn: (key: K) => T | undefined) => Record<K, T | undefined>,
  parseEntry: (value: unknown, at: string, key: K) => T | undefined
): Record<K, T> | undefined {
  const section = validateObject(raw, at, c);
  if (!section) {
    return undefined;
  }
  const record = make(key => {
    const value = requireField(section, key, `${at}.${key}`, c);
    return value === undefined ? undefined : parseEntry(value, `${at}.${key}`, key);
  });
  return isComplete(keys, record) ? record : undefined;
}

function yearIndexed<T>(
  raw: unknown,
  at: string,
  c: Collector,
  parseEntry: (value: unknown, at: string) => T | undefined
): YearIndexed<T> | undefined {
  const section = validateObject(raw, at, c);
  if (!section) {
    return undefined;
  }
  const entries: YearIndexed<T> = [];
  let failed = false;
  for (const [key, value] of Object.entries(section)) {
    const year = Number(key);
    if (!/^\d{4}$/.test(key)) {
      c.add(`${at}.${key}`, 'format', 'year keys must be four-digit years');
      failed = true;
      continue;
    }
    const parsed = parseEntry(value, `${at}.${key}`);
    if (parsed === undefined) {
      failed = true;
      continue;
    }
    entries.push({ year, value: parsed });
  }
  if (entries.length === 0 && !failed) {
    c.add(at, 'required', 'must list at least one year');
  }
  return failed || entries.length === 0 ? undefined : entries.sort((a, b) => a.year - b.year);
}

function positive(value: unknown, at: string, c: Collector): number | undefined {
  return validateNumber(value, at, c, { min: 0 });
}

function envelope(value: unknown, at: string, c: Collector): EnvelopeUValues | undefined {
  const obj = validateObject(value, at, c);
  if (!obj) return undefined;
  const wall = readNumber(obj, 'wall', at, c, { min: 0 });
  const roof = readNumber(obj, 'roof', at, c, { min: 0 });
  const floor = readNumber(obj, 'floor', at, c, { min: 0 });
  const window = readNumber(obj, 'window', at, c, { min: 0 });
  if (wall === undefined || roof === undefined || floor === undefined || window === undefined) {
    return undefined;
  }
  return { wall, roof, floor, window };
}

function hourlyProfile(value: unknown, at: string, c: Collector): number[] | undefined {
  const list = validateArray(value, at, c);
  if (!list) return undefined;
  if (list.length !== 24) {
    c.add(at, 'length', `must hold 24 hourly values, found ${list.length}`);
    return undefined;
  }
  const values = list.map((v, hour) => validateNumber(v, `${at}[${hour}]`, c, { min: 0, max: 1 }));
  return values.every((v): v is number => v !== undefined) ? values : undefined;
}

function region(value: unknown, at: string, c: Collector): RegionInfo | undefined {
  const obj = validateObject(value, at, c);
  if (!obj) return undefined;
  const rawName = requireField(obj, 'name', `${at}.name`, c);
  const name = rawName === undefined ? undefined : validateString(rawName, `${at}.name`, c, { minLength: 1 });
  const latitude = readNumber(obj, 'latitude', at, c, { min: -90, max: 90 });
  const rawCodes = requireField(obj, 'nuts3', `${at}.nuts3`, c);
  const codes = rawCodes === undefined ? undefined : validateArray(rawCodes, `${at}.nuts3`, c, { minLength: 1 });
  const nuts3 = codes?.map((code, i) => validateString(code, `${at}.nuts3[${i}]`, c, { minLength: 1 }));
  if (name === undefined || latitude === undefined || !nuts3 || !nuts3.every((n): n is string => n !== undefined)) {
    return undefined;
  }
  return { name, latitude, nuts3 };
}

function climate(value: unknown, at: string, c: Collector): RegionClimate | undefined {
  const obj = validateObject(value, at, c);
  if (!obj) return undefined;
  const rawMonths = requireField(obj, 'monthlyMeanTemperature', `${at}.monthlyMeanTemperature`, c);
  const months = rawMonths === undefined ? undefined : validateArray(rawMonths, `${at}.monthlyMeanTemperature`, c);
  if (months && months.length !== 12) {
    c.add(`${at}.monthlyMeanTemperature`, 'length', `must hold 12 monthly values, found ${months.length}`);
    return undefined;
  }
  const temperatures = months?.map((t, i) =>
    validateNumber(t, `${at}.monthlyMeanTemperature[${i}]`, c, { min: -60, max: 60 })
  );
  const dailyAmplitude = readNumber(obj, 'dailyAmplitude', at, c, { min: 0, max: 40 });
  if (!temperatures || !temperatures.every((t): t is number => t !== undefined) || dailyAmplitude === undefined) {
    return undefined;
  }
  return { monthlyMeanTemperature: temperatures, dailyAmplitude };
}

function gains(value: unknown, at: string, c: Collector): UseGains | undefined {
  const obj = validateObject(value, at, c);
  if (!obj) return undefined;
  const internal = readNumber(obj, 'internal', at, c, { min: 0 });
  const solar = readNumber(obj, 'solar', at, c, { min: 0 });
  const water = readNumber(obj, 'water_heating', at, c, { min: 0 });
  const cooking = readNumber(obj, 'cooking', at, c, { min: 0 });
  const lighting = readNumber(obj, 'lighting', at, c, { min: 0 });
  const appliances = readNumber(obj, 'appliances', at, c, { min: 0 });
  if (
    internal === undefined ||
    solar === undefined ||
    water === undefined ||
    cooking === undefined ||
    lighting === undefined ||
    appliances === undefined
  ) {
    return undefined;
  }
  return { internal, solar, water_heating: water, cooking, lighting, appliances };
}

function schedules(value: unknown, at: string, c: Collector): DaySchedules | undefined {
  const obj = validateObject(value, at, c);
  if (!obj) return undefined;
  const day = (key: 'weekday' | 'weekend'): number[] | undefined => {
    const raw = requireField(obj, key, `${at}.${key}`, c);
    return raw === undefined ? undefined : hourlyProfile(raw, `${at}.${key}`, c);
  };
  const weekday = day('weekday');
  const weekend = day('weekend');
  return weekday && weekend ? { weekday, weekend } : undefined;
}

function efficiencies(value: unknown, at: string, c: Collector): Record<EndUse, Efficiencies> | undefined {
  return keyed<EndUse, Efficiencies>(value, at, c, END_USES, byEndUse, (raw, entryAt, endUse) => {
    const obj = validateObject(raw, entryAt, c);
    if (!obj) return undefined;
    const technologies: readonly Technology[] = END_USE_TECHNOLOGIES[endUse];
    const out: Efficiencies = {};
    let complete = true;
    for (const tech of technologies) {
      const eff = readNumber(obj, tech, entryAt, c, { min: 0 });
      if (eff === undefined || eff === 0) {
        if (eff === 0) c.add(`${entryAt}.${tech}`, 'range', 'efficiency must be greater than 0');
        complete = false;
        continue;
      }
      out[tech] = eff;
    }
    return complete ? out : undefined;
  });
}

function fuelFactors(value: unknown, at: string, c: Collector): Record<FuelCategory, FuelFactor> | undefined {
  return keyed<FuelCategory, FuelFactor>(value, at, c, FUEL_CATEGORIES, byFuel, (raw, entryAt) => {
    const obj = validateObject(raw, entryAt, c);
    if (!obj) return undefined;
    const cost = readNumber(obj, 'cost', entryAt, c, { min: 0 });
    const emissions = readNumber(obj, 'emissions', entryAt, c, { min: 0 });
    return cost === undefined || emissions === undefined ? undefined : { cost, emissions };
  });
}

function solarParameters(value: unknown, at: string, c: Collector): SolarParameters | undefined {
  const obj = validateObject(value, at, c);
  if (!obj) return undefined;
  const pvEfficiency = readNumber(obj, 'pvEfficiency', at, c, { min: 0, max: 1 });
  const thermalEfficiency = readNumber(obj, 'thermalEfficiency', at, c, { min: 0, max: 1 });
  const squareMetresPerKw = readNumber(obj, 'squareMetresPerKw', at, c, { min: 0 });
  const capexPerKw = readNumber(obj, 'capexPerKw', at, c, { min: 0 });
  const opexPerKw = readNumber(obj, 'opexPerKw', at, c, { min: 0 });
  const thermalShare = keyed<BuildingUse, number>(
    obj.thermalShare,
    `${at}.thermalShare`,
    c,
    BUILDING_USES,
    byUse,
    (raw, entryAt) => validateNumber(raw, entryAt, c, { min: 0, max: 1 })
  );
  if (
    pvEfficiency === undefined ||
    thermalEfficiency === undefined ||
    squareMetresPerKw === undefined ||
    capexPerKw === undefined ||
    opexPerKw === undefined ||
    !thermalShare
  ) {
    return undefined;
  }
  if (squareMetresPerKw === 0 || capexPerKw === 0) {
    c.add(at, 'range', 'squareMetresPerKw and capexPerKw must be greater than 0');
    return undefined;
  }
  return { pvEfficiency, thermalEfficiency, squareMetresPerKw, capexPerKw, opexPerKw, thermalShare };
}

function investmentParameters(value: unknown, at: string, c: Collector): InvestmentParameters | undefined {
  const obj = validateObject(value, at, c);
  if (!obj) return undefined;
  const equipmentCapacity = keyed<BuildingUse, Record<EquipmentEndUse, number>>(
    obj.equipmentCapacity,
    `${at}.equipmentCapacity`,
    c,
    BUILDING_USES,
    byUse,
    (raw, entryAt) =>
      keyed<EquipmentEndUse, number>(raw, entryAt, c, EQUIPMENT_END_USES, byEquipmentEndUse, (v, valueAt) =>
        positive(v, valueAt, c)
      )
  );
  const equipmentCosts = keyed<Technology, EquipmentCost>(
    obj.equipmentCosts,
    `${at}.equipmentCosts`,
    c,
    TECHNOLOGIES,
    byTechnology,
    (raw, entryAt) => {
      const entry = validateObject(raw, entryAt, c);
      if (!entry) return undefined;
      const capex = readNumber(entry, 'capex', entryAt, c, { min: 0 });
      const opex = readNumber(entry, 'opex', entryAt, c, { min: 0 });
      return capex === undefined || opex === undefined ? undefined : { capex, opex };
    }
  );
  const retrofitCost = keyed<RefLevel, number>(obj.retrofitCost, `${at}.retrofitCost`, c, REF_LEVELS, byLevel, (v, entryAt) =>
    positive(v, entryAt, c)
  );
  if (!equipmentCapacity || !equipmentCosts || !retrofitCost) {
    return undefined;
  }
  return { equipmentCapacity, equipmentCosts, retrofitCost };
}

function regionKeyed<T>(
  raw: unknown,
  at: string,
  c: Collector,
  parseEntry: (value: unknown, at: string, c: Collector) => T | undefined
): Record<string, T> | undefined {
  const section = validateObject(raw, at, c);
  if (!section) return undefined;
  const out: Record<string, T> = {};
  let complete = true;
  for (const code of DefaultModelConfig.regions) {
    if (section[code] === undefined) {
      c.add(`${at}.${code}`, 'required', `supported region ${code} is missing`);
      complete = false;
    }
  }
  for (const [code, value] of Object.entries(section)) {
    const parsed = parseEntry(value, `${at}.${code}`, c);
    if (parsed === undefined) {
      complete = false;
    } else {
      out[code] = parsed;
    }
  }
  return complete ? out : undefined;
}

/**
 * Immutable default-value database: regional climate, envelope properties,
 * per-use loads and schedules, default technology mixes, efficiencies,
 * year-indexed fuel prices and emission factors, and investment costs.
 */
export class DefaultDatabase {
  private constructor(private readonly document: DatabaseDocument) {}

  /**
   * Check a raw database document section by section
   */
  static validateIntegrity(raw: unknown, tolerance: number = DefaultModelConfig.shareTolerance): ValidationResult<DatabaseDocument> {
    const c = new ViolationCollector();
    const root = validateObject(raw, 'database', c);
    if (!root) {
      return { ok: false, violations: c.violations };
    }

    for (const section of REQUIRED_SECTIONS) {
      if (root[section] === undefined || root[section] === null) {
        c.add(`database.${section}`, 'required', 'section is missing');
      }
    }
    if (c.hasErrors()) {
      return { ok: false, violations: c.violations };
    }

    const version = typeof root.version === 'string' ? root.version : MODEL_VERSION;
    const baseYear = validateNumber(root.baseYear, 'database.baseYear', c, {
      integer: true,
      min: DefaultModelConfig.years.min,
      max: DefaultModelConfig.years.max,
    });
    const regions = regionKeyed(root.regions, 'database.regions', c, region);
    const climateSection = regionKeyed(root.climate, 'database.climate', c, climate);
    const baseTemperatures = keyed<BuildingUse, BaseTemperatures>(
      root.baseTemperatures,
      'database.baseTemperatures',
      c,
      BUILDING_USES,
      byUse,
      (value, at) => {
        const obj = validateObject(value, at, c);
        if (!obj) return undefined;
        const heating = readNumber(obj, 'heating', at, c, { min: -10, max: 40 });
        const cooling = readNumber(obj, 'cooling', at, c, { min: -10, max: 40 });
        return heating === undefined || cooling === undefined ? undefined : { heating, cooling };
      }
    );
    const uValues = keyed<ConstructionPeriod, EnvelopeUValues>(
      root.uValues,
      'database.uValues',
      c,
      CONSTRUCTION_PERIODS,
      byPeriod,
      (v, at) => envelope(v, at, c)
    );
    const retrofitUValues = keyed<RefLevel, EnvelopeUValues>(
      root.retrofitUValues,
      'database.retrofitUValues',
      c,
      REF_LEVELS,
      byLevel,
      (v, at) => envelope(v, at, c)
    );
    const windowRatio = keyed<BuildingUse, number>(root.windowRatio, 'database.windowRatio', c, BUILDING_USES, byUse, (v, at) =>
      validateNumber(v, at, c, { min: 0, max: 1 })
    );
    const ventilation = keyed<BuildingUse, number>(root.ventilation, 'database.ventilation', c, BUILDING_USES, byUse, (v, at) =>
      positive(v, at, c)
    );
    const gainsSection = keyed<BuildingUse, UseGains>(root.gains, 'database.gains', c, BUILDING_USES, byUse, (v, at) =>
      gains(v, at, c)
    );
    const schedulesSection = keyed<BuildingUse, DaySchedules>(
      root.schedules,
      'database.schedules',
      c,
      BUILDING_USES,
      byUse,
      (v, at) => schedules(v, at, c)
    );
    const techMixDefaults = keyed<BuildingUse, YearIndexed<TechMixEntries>>(
      root.techMixDefaults,
      'database.techMixDefaults',
      c,
      BUILDING_USES,
      byUse,
      (v, at) =>
        yearIndexed(v, at, c, (entry, entryAt) => {
          const obj = validateObject(entry, entryAt, c);
          return obj ? parseTechMixEntries(obj, entryAt, c, { checkSums: true, tolerance }) : undefined;
        })
    );
    const efficiencySection = efficiencies(root.efficiencies, 'database.efficiencies', c);
    const auxiliaryCirculationRatio = validateNumber(
      root.auxiliaryCirculationRatio ?? 0,
      'database.auxiliaryCirculationRatio',
      c,
      { min: 0, max: 1 }
    );
    const fuelFactorSection = yearIndexed(root.fuelFactors, 'database.fuelFactors', c, (v, at) => fuelFactors(v, at, c));
    const solar = solarParameters(root.solar, 'database.solar', c);
    const investment = investmentParameters(root.investment, 'database.investment', c);

    if (
      baseYear === undefined ||
      !regions ||
      !climateSection ||
      !baseTemperatures ||
      !uValues ||
      !retrofitUValues ||
      !windowRatio ||
      !ventilation ||
      !gainsSection ||
      !schedulesSection ||
      !techMixDefaults ||
      !efficiencySection ||
      auxiliaryCirculationRatio === undefined ||
      !fuelFactorSection ||
      !solar ||
      !investment
    ) {
      return { ok: false, violations: c.violations };
    }

    return c.result({
      version,
      baseYear,
      regions,
      climate: climateSection,
      baseTemperatures,
      uValues,
      retrofitUValues,
      windowRatio,
      ventilation,
      gains: gainsSection,
      schedules: schedulesSection,
      techMixDefaults,
      efficiencies: efficiencySection,
      auxiliaryCirculationRatio,
      fuelFactors: fuelFactorSection,
      solar,
      investment,
    });
  }

  /**
   * Build a database from a parsed JSON document
   * @throws ValidationError (data integrity) when a section is missing or malformed
   */
  static fromDocument(raw: unknown, tolerance?: number): DefaultDatabase {
    const result = DefaultDatabase.validateIntegrity(raw, tolerance);
    if (!result.ok) {
      throw new ValidationError('Default database failed integrity check', result.violations, ErrorCategory.DATA_INTEGRITY);
    }
    return new DefaultDatabase(deepFreeze(result.value));
  }

  /**
   * Read and validate `<dataDir>/database/default-database.json`
   */
  static load(dataDir: string, logger?: Logger, tolerance?: number): DefaultDatabase {
    const file = path.join(dataDir, DATABASE_FILE);
    if (!fs.existsSync(file)) {
      throw dataIntegrityError(`Default database not found at ${file}`, { file });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(file, 'utf8'));
    } catch (error) {
      throw dataIntegrityError(`Default database at ${file} is not valid JSON: ${String(error)}`, { file });
    }

    const database = DefaultDatabase.fromDocument(raw, tolerance);
    logger?.debug(`Loaded default database ${database.version} (base year ${database.baseYear}) from ${file}`);
    return database;
  }

  get version(): string {
    return this.document.version;
  }

  get baseYear(): number {
    return this.document.baseYear;
  }

  get auxiliaryCirculationRatio(): number {
    return this.document.auxiliaryCirculationRatio;
  }

  get solar(): SolarParameters {
    return this.document.solar;
  }

  get investment(): InvestmentParameters {
    return this.document.investment;
  }

  region(nutsid: string): RegionInfo {
    const info = this.document.regions[nutsid];
    if (!info) {
      throw dataIntegrityError(`Region ${nutsid} is not in the default database`, { nutsid });
    }
    return info;
  }

  climate(nutsid: string): RegionClimate {
    const profile = this.document.climate[nutsid];
    if (!profile) {
      throw dataIntegrityError(`No climate data for region ${nutsid}`, { nutsid });
    }
    return profile;
  }

  techMixDefault(use: BuildingUse, year: number): TechMixEntries {
    return pickYear(this.document.techMixDefaults[use], year);
  }

  efficiency(endUse: EndUse, tech: Technology): number {
    const value = this.document.efficiencies[endUse][tech];
    if (value === undefined) {
      throw dataIntegrityError(`No efficiency for ${tech} in ${endUse}`, { endUse, tech });
    }
    return value;
  }

  fuelFactors(year: number): Record<FuelCategory, FuelFactor> {
    return pickYear(this.document.fuelFactors, year);
  }

  uValues(period: ConstructionPeriod): EnvelopeUValues {
    return this.document.uValues[period];
  }

  retrofitUValues(level: RefLevel): EnvelopeUValues {
    return this.document.retrofitUValues[level];
  }

  windowRatio(use: BuildingUse): number {
    return this.document.windowRatio[use];
  }

  ventilation(use: BuildingUse): number {
    return this.document.ventilation[use];
  }

  baseTemperatures(use: BuildingUse): BaseTemperatures {
    return this.document.baseTemperatures[use];
  }

  gains(use: BuildingUse): UseGains {
    return this.document.gains[use];
  }

  /**
   * Hour-of-day occupancy profile in [0, 1]
   */
  schedule(use: BuildingUse, weekend: boolean): readonly number[] {
    const day = this.document.schedules[use];
    return weekend ? day.weekend : day.weekday;
  }
}
