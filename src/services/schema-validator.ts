import fs from 'fs';
import {
  ARCHETYPE_CSV_COLUMNS,
  ARCHETYPE_VARIANTS,
  BUILDING_USES,
  BuildingUse,
  CONSTRUCTION_PERIODS,
  ConstructionPeriod,
  EXPECTED_ARCHETYPE_COUNT,
  RADIATION_BAND_START,
  RADIATION_BAND_STEP,
  REF_LEVELS,
  SOLAR_CSV_COLUMNS,
} from '../constants/building-stock';
import { DefaultModelConfig } from '../config/model-defaults';
import {
  Archetype,
  CommandLineArgs,
  RadiationRecord,
  RenovationSpec,
  ScenarioConfig,
  SolarSpec,
  TechMixSpec,
} from '../types';
import { CsvTable, toNumber } from '../util/csv';
import { ErrorCategory, ValidationError } from '../util/error-handler';
import { byPeriod, byUse, isComplete } from '../util/keyed';
import { Logger } from '../util/logger';
import { parseTimestamp } from '../util/time-window';
import {
  requireField,
  validateArray,
  validateBoolean,
  validateEnum,
  validateNumber,
  validateObject,
  validateString,
  ValidationResult,
  ViolationCollector,
} from '../util/validation';
import { parseTechMixEntries, readFraction } from './tech-mix-parser';

export interface SchemaValidatorOptions {
  /** Allowed deviation of a fuel-share sum from 1 */
  shareTolerance: number;
  /** NUTS2 codes with shipped inventories */
  regions: readonly string[];
}

type ListName = 'active_measures' | 'active_measures_baseline' | 'passive_measures' | 'solar';

/**
 * Validates the command line, the scenario payload and the two regional CSV
 * inventories. Every check runs to completion and all violations are returned
 * together; nothing downstream runs on input that did not pass.
 */
export class SchemaValidator {
  private readonly options: SchemaValidatorOptions;

  constructor(
    private readonly logger: Logger,
    options: Partial<SchemaValidatorOptions> = {}
  ) {
    this.options = {
      shareTolerance: options.shareTolerance ?? DefaultModelConfig.shareTolerance,
      regions: options.regions ?? DefaultModelConfig.regions,
    };
  }

  /**
   * Check the positional arguments `<payload> <start> <end> <building use>`.
   * The payload file is looked up only once every other argument is valid.
   */
  validateCommandLine(
    args: readonly string[],
    fileExists: (file: string) => boolean = fs.existsSync
  ): ValidationResult<CommandLineArgs> {
    const c = new ViolationCollector();

    if (args.length !== 4) {
      c.add(
        'arguments',
        'count',
        `expected 4 arguments (payload, start time, end time, building use), got ${args.length}`
      );
      return { ok: false, violations: c.violations };
    }

    const [payloadArg, startArg, endArg, useArg] = args;
    const payloadPath = payloadArg.trim();
    if (payloadPath.length === 0) {
      c.add('payload', 'required', 'payload file path is empty');
    }

    const start = parseTimestamp(startArg);
    const end = parseTimestamp(endArg);
    if (!start) {
      c.add('start_time', 'format', 'must have the format yyyy-MM-ddTHH:mm:ss');
    }
    if (!end) {
      c.add('end_time', 'format', 'must have the format yyyy-MM-ddTHH:mm:ss');
    }
    if (start && end && end.toMillis() <= start.toMillis()) {
      c.add('end_time', 'order', 'must be later than the start time');
    }

    const buildingUse = validateEnum(useArg.trim(), BUILDING_USES, 'building_use', c);

    if (!c.hasErrors() && !fileExists(payloadPath)) {
      c.add('payload', 'exists', `the process input data file does not exist: ${payloadPath}`);
    }

    if (c.hasErrors() || !start || !end || buildingUse === undefined) {
      return { ok: false, violations: c.violations };
    }

    return c.result({ payloadPath, start, end, buildingUse });
  }

  /**
   * Validate and type the scenario payload
   */
  validatePayload(payload: unknown): ValidationResult<ScenarioConfig> {
    const c = new ViolationCollector();
    const root = validateObject(payload, 'payload', c);
    if (!root) {
      return { ok: false, violations: c.violations };
    }

    const rawNutsid = requireField(root, 'nutsid', 'nutsid', c);
    const nutsidText = rawNutsid === undefined ? undefined : validateString(rawNutsid, 'nutsid', c, { minLength: 1 });
    const nutsid = nutsidText === undefined ? undefined : nutsidText.trim().toUpperCase();
    if (nutsid !== undefined && !this.options.regions.includes(nutsid)) {
      c.add('nutsid', 'enum', `must be one of: ${this.options.regions.join(', ')}`);
    }

    const rawYear = requireField(root, 'year', 'year', c);
    const year =
      rawYear === undefined
        ? undefined
        : validateNumber(rawYear, 'year', c, {
            integer: true,
            min: DefaultModelConfig.years.min,
            max: DefaultModelConfig.years.max,
          });

    const rawScenario = requireField(root, 'scenario', 'scenario', c);
    const scenario = rawScenario === undefined ? undefined : validateObject(rawScenario, 'scenario', c);
    if (!scenario) {
      return { ok: false, violations: c.violations };
    }

    const scalar = (key: string, min: number, max: number): number | undefined => {
      const raw = requireField(scenario, key, `scenario.${key}`, c);
      return raw === undefined ? undefined : validateNumber(raw, `scenario.${key}`, c, { min, max });
    };
    const increaseResidentialBuiltArea = scalar('increase_residential_built_area', 0, 1);
    const increaseServiceBuiltArea = scalar('increase_service_built_area', 0, 1);
    const hddReduction = scalar('hdd_reduction', -1, 1);
    const cddReduction = scalar('cdd_reduction', -1, 1);

    const activeMeasures = this.perUseList(scenario, 'active_measures', c, (entry, at) =>
      this.techMixEntry(entry, at, c)
    );
    const activeMeasuresBaseline = this.perUseList(scenario, 'active_measures_baseline', c, (entry, at) =>
      this.techMixEntry(entry, at, c)
    );
    const passiveMeasures = this.perUseList(scenario, 'passive_measures', c, (entry, at) =>
      this.renovationEntry(entry, at, c)
    );
    const solar = this.perUseList(scenario, 'solar', c, (entry, at) => this.solarEntry(entry, at, c));

    if (
      nutsid === undefined ||
      year === undefined ||
      increaseResidentialBuiltArea === undefined ||
      increaseServiceBuiltArea === undefined ||
      hddReduction === undefined ||
      cddReduction === undefined ||
      !activeMeasures ||
      !activeMeasuresBaseline ||
      !passiveMeasures ||
      !solar
    ) {
      return { ok: false, violations: c.violations };
    }

    const result = c.result({
      nutsid,
      year,
      increaseResidentialBuiltArea,
      increaseServiceBuiltArea,
      hddReduction,
      cddReduction,
      activeMeasures,
      activeMeasuresBaseline,
      passiveMeasures,
      solar,
    });
    if (result.ok) {
      this.logger.validation(`Payload valid for ${nutsid}, year ${year}`);
    }
    return result;
  }

  /**
   * Validate the archetype inventory (`<NUTS2>_preprocess.csv`)
   */
  validateArchetypeTable(table: CsvTable, source: string = 'archetypes'): ValidationResult<Archetype[]> {
    const c = new ViolationCollector();
    if (!this.checkColumns(table, ARCHETYPE_CSV_COLUMNS, source, c)) {
      return { ok: false, violations: c.violations };
    }

    if (table.rows.length !== EXPECTED_ARCHETYPE_COUNT) {
      c.add(source, 'count', `expected ${EXPECTED_ARCHETYPE_COUNT} archetypes, found ${table.rows.length}`);
    }

    const archetypes: Archetype[] = [];
    const seenIds = new Set<string>();
    const counts = new Map<string, number>();

    table.rows.forEach((row, index) => {
      const at = `${source}[${index + 2}]`;
      const buildingUse = validateEnum(row.Use, BUILDING_USES, `${at}.Use`, c);
      const constructionPeriod = validateEnum(row.Period, CONSTRUCTION_PERIODS, `${at}.Period`, c);
      const archetypeId = row.Archetype_ID ?? '';
      if (archetypeId.length === 0) {
        c.add(`${at}.Archetype_ID`, 'required', 'is empty');
      } else if (seenIds.has(archetypeId)) {
        c.add(`${at}.Archetype_ID`, 'unique', `duplicate archetype id ${archetypeId}`);
      }
      seenIds.add(archetypeId);

      const positiveCell = (column: string): number | undefined => {
        const value = validateNumber(toNumber(row[column]), `${at}.${column}`, c, { min: 0 });
        if (value === 0) {
          c.add(`${at}.${column}`, 'range', 'must be greater than 0');
          return undefined;
        }
        return value;
      };
      const floorArea = positiveCell('Floor_Area');
      const floorCount = validateNumber(toNumber(row.Floor_Count), `${at}.Floor_Count`, c, { min: 1 });
      const avgHeight = positiveCell('Avg_Height');
      const volume = positiveCell('Volume');
      const builtArea = positiveCell('Built_Area');
      const facadeArea = positiveCell('Facade_Area');

      if (buildingUse === undefined || constructionPeriod === undefined) {
        return;
      }
      const key = `${buildingUse}|${constructionPeriod}`;
      counts.set(key, (counts.get(key) ?? 0) + 1);

      if (
        floorArea !== undefined &&
        floorCount !== undefined &&
        avgHeight !== undefined &&
        volume !== undefined &&
        builtArea !== undefined &&
        facadeArea !== undefined
      ) {
        archetypes.push({
          buildingUse,
          constructionPeriod,
          archetypeId,
          floorArea,
          floorCount,
          avgHeight,
          volume,
          builtArea,
          facadeArea,
        });
      }
    });

    for (const use of BUILDING_USES) {
      for (const period of CONSTRUCTION_PERIODS) {
        const found = counts.get(`${use}|${period}`) ?? 0;
        if (found !== ARCHETYPE_VARIANTS[use]) {
          c.add(
            `${source}[${use}][${period}]`,
            'coverage',
            `expected ${ARCHETYPE_VARIANTS[use]} archetype(s), found ${found}`
          );
        }
      }
    }

    return c.result(archetypes);
  }

  /**
   * Validate the radiation-band inventory (`<NUTS2>_solar.csv`) and keep the
   * rows of the NUTS3 regions under `nutsid`
   */
  validateSolarTable(
    table: CsvTable,
    nutsid: string,
    source: string = 'solar'
  ): ValidationResult<RadiationRecord[]> {
    const c = new ViolationCollector();
    if (!this.checkColumns(table, SOLAR_CSV_COLUMNS, source, c)) {
      return { ok: false, violations: c.violations };
    }

    const records: RadiationRecord[] = [];
    table.rows.forEach((row, index) => {
      const at = `${source}[${index + 2}]`;
      const regionCode = row.Region ?? '';
      if (regionCode.length === 0) {
        c.add(`${at}.Region`, 'required', 'is empty');
        return;
      }

      const cell = (column: string, options: { min?: number } = {}): number | undefined =>
        validateNumber(toNumber(row[column]), `${at}.${column}`, c, options);
      const threshold = cell('Threshold', { min: RADIATION_BAND_START });
      if (threshold !== undefined && (threshold - RADIATION_BAND_START) % RADIATION_BAND_STEP !== 0) {
        c.add(
          `${at}.Threshold`,
          'band',
          `must be a multiple of ${RADIATION_BAND_STEP} starting at ${RADIATION_BAND_START}`
        );
      }
      const centroidX = cell('Centroid_X');
      const centroidY = cell('Centroid_Y');
      const totalArea = cell('Total_Area', { min: 0 });
      const maxRadiation = cell('Max_Radiation', { min: 0 });
      const averageRadiation = cell('Average_Radiation', { min: 0 });
      const areaM2 = cell('Area_m2', { min: 0 });
      const medianRadiation = cell('Median_Radiation', { min: 0 });
      const medianRadiationX = cell('Median_Radiation_X');
      const medianRadiationY = cell('Median_Radiation_Y');

      if (
        !regionCode.startsWith(nutsid) ||
        threshold === undefined ||
        centroidX === undefined ||
        centroidY === undefined ||
        totalArea === undefined ||
        maxRadiation === undefined ||
        averageRadiation === undefined ||
        areaM2 === undefined ||
        medianRadiation === undefined ||
        medianRadiationX === undefined ||
        medianRadiationY === undefined
      ) {
        return;
      }
      records.push({
        region: regionCode,
        centroidX,
        centroidY,
        totalArea,
        maxRadiation,
        averageRadiation,
        threshold,
        areaM2,
        medianRadiation,
        medianRadiationX,
        medianRadiationY,
      });
    });

    if (!c.hasErrors() && records.length === 0) {
      c.add(source, 'coverage', `no radiation bands for region ${nutsid}`);
    }

    return c.result(records);
  }

  /**
   * Unwrap a result or throw every violation at once
   * @throws ValidationError
   */
  assertValid<T>(result: ValidationResult<T>, message: string, category: ErrorCategory = ErrorCategory.VALIDATION): T {
    if (!result.ok) {
      throw new ValidationError(message, result.violations, category);
    }
    return result.value;
  }

  private checkColumns(
    table: CsvTable,
    expected: readonly string[],
    source: string,
    c: ViolationCollector
  ): boolean {
    const missing = expected.filter(column => !table.headers.includes(column));
    const unexpected = table.headers.filter(column => !expected.includes(column));
    if (missing.length > 0) {
      c.add(`${source}.columns`, 'required', `missing column(s): ${missing.join(', ')}`);
    }
    if (unexpected.length > 0) {
      c.add(`${source}.columns`, 'unexpected', `unexpected column(s): ${unexpected.join(', ')}`);
    }
    return missing.length === 0 && unexpected.length === 0;
  }

  /**
   * Parse one of the four per-use lists and check it holds exactly one entry
   * per building use
   */
  private perUseList<T extends { buildingUse: BuildingUse }>(
    scenario: Record<string, unknown>,
    name: ListName,
    c: ViolationCollector,
    parseEntry: (entry: Record<string, unknown>, at: string) => T | undefined
  ): Record<BuildingUse, T> | undefined {
    const at = `scenario.${name}`;
    const raw = requireField(scenario, name, at, c);
    const list = raw === undefined ? undefined : validateArray(raw, at, c, { minLength: 1 });
    if (!list) {
      return undefined;
    }

    const entries = new Map<BuildingUse, T>();
    const seen = new Set<BuildingUse>();
    let failed = false;

    list.forEach((item, index) => {
      const entry = validateObject(item, `${at}[${index}]`, c);
      if (!entry) {
        failed = true;
        return;
      }
      const rawUse = requireField(entry, 'building_use', `${at}[${index}].building_use`, c);
      const use = rawUse === undefined ? undefined : validateEnum(rawUse, BUILDING_USES, `${at}[${index}].building_use`, c);
      if (use === undefined) {
        failed = true;
        return;
      }
      if (seen.has(use)) {
        c.add(`${at}[${use}]`, 'unique', `more than one entry for building use "${use}"`);
        failed = true;
        return;
      }
      seen.add(use);

      const parsed = parseEntry(entry, `${at}[${use}]`);
      if (parsed === undefined) {
        failed = true;
      } else {
        entries.set(use, parsed);
      }
    });

    const missing = BUILDING_USES.filter(use => !seen.has(use));
    if (missing.length > 0) {
      c.add(at, 'completeness', `missing entries for: ${missing.map(use => `"${use}"`).join(', ')}`);
      failed = true;
    }

    const record = byUse(use => entries.get(use));
    return failed || !isComplete(BUILDING_USES, record) ? undefined : record;
  }

  private techMixEntry(entry: Record<string, unknown>, at: string, c: ViolationCollector): TechMixSpec | undefined {
    const use = validateEnum(entry.building_use, BUILDING_USES, `${at}.building_use`, c);
    const rawFlag = requireField(entry, 'user_defined_data', `${at}.user_defined_data`, c);
    const userDefinedData = rawFlag === undefined ? undefined : validateBoolean(rawFlag, `${at}.user_defined_data`, c);
    if (use === undefined || userDefinedData === undefined) {
      return undefined;
    }

    const mix = parseTechMixEntries(entry, at, c, {
      checkSums: userDefinedData,
      tolerance: this.options.shareTolerance,
    });
    return mix ? { ...mix, buildingUse: use, userDefinedData } : undefined;
  }

  private renovationEntry(entry: Record<string, unknown>, at: string, c: ViolationCollector): RenovationSpec | undefined {
    const use = validateEnum(entry.building_use, BUILDING_USES, `${at}.building_use`, c);
    const rawLevel = requireField(entry, 'ref_level', `${at}.ref_level`, c);
    const refLevel = rawLevel === undefined ? undefined : validateEnum(rawLevel, REF_LEVELS, `${at}.ref_level`, c);

    const rawPeriods = requireField(entry, 'percentages_by_periods', `${at}.percentages_by_periods`, c);
    const periods =
      rawPeriods === undefined ? undefined : validateObject(rawPeriods, `${at}.percentages_by_periods`, c);
    if (!periods) {
      return undefined;
    }
    const known: readonly string[] = CONSTRUCTION_PERIODS;
    for (const key of Object.keys(periods)) {
      if (!known.includes(key)) {
        c.add(`${at}.percentages_by_periods.${key}`, 'enum', 'is not a construction period');
      }
    }
    const fractions = byPeriod((period: ConstructionPeriod) =>
      readFraction(periods, period, `${at}.percentages_by_periods`, c)
    );

    if (use === undefined || refLevel === undefined || !isComplete(CONSTRUCTION_PERIODS, fractions)) {
      return undefined;
    }
    return { buildingUse: use, refLevel, percentagesByPeriods: fractions };
  }

  private solarEntry(entry: Record<string, unknown>, at: string, c: ViolationCollector): SolarSpec | undefined {
    const use = validateEnum(entry.building_use, BUILDING_USES, `${at}.building_use`, c);

    const nullable = (key: 'area_total' | 'power' | 'capex'): number | null | undefined => {
      if (!(key in entry)) {
        c.add(`${at}.${key}`, 'required', 'is not present');
        return undefined;
      }
      const value = entry[key];
      if (value === null) {
        return null;
      }
      return validateNumber(value, `${at}.${key}`, c, { min: 0 });
    };
    const areaTotal = nullable('area_total');
    const power = nullable('power');
    const capex = nullable('capex');

    if (use === undefined || areaTotal === undefined || power === undefined || capex === undefined) {
      return undefined;
    }
    return { buildingUse: use, areaTotal, power, capex };
  }
}
