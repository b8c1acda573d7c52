import fs from 'fs';
import path from 'path';
import { Archetype, RadiationRecord, ScenarioConfig } from '../types';
import { parseCsv } from '../util/csv';
import { AppError, dataIntegrityError, ErrorCategory } from '../util/error-handler';
import { Logger } from '../util/logger';
import { SchemaValidator } from './schema-validator';

export const REGIONS_DIR = 'regions';

export function archetypeFile(dataDir: string, nutsid: string): string {
  return path.join(dataDir, REGIONS_DIR, `${nutsid}_preprocess.csv`);
}

export function solarFile(dataDir: string, nutsid: string): string {
  return path.join(dataDir, REGIONS_DIR, `${nutsid}_solar.csv`);
}

/**
 * Reads the scenario payload and the regional inventories from disk and runs
 * them through the schema validator
 */
export class InputLoader {
  constructor(
    private readonly dataDir: string,
    private readonly validator: SchemaValidator,
    private readonly logger: Logger
  ) {}

  /**
   * @throws ValidationError for an invalid payload, AppError for unreadable JSON
   */
  loadPayload(file: string): ScenarioConfig {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(file, 'utf8'));
    } catch (error) {
      throw new AppError(`Payload ${file} could not be read as JSON`, ErrorCategory.VALIDATION, error, { file });
    }
    return this.validator.assertValid(this.validator.validatePayload(raw), `Payload ${file} is invalid`);
  }

  loadArchetypes(nutsid: string): Archetype[] {
    const file = archetypeFile(this.dataDir, nutsid);
    const table = parseCsv(this.readData(file));
    const archetypes = this.validator.assertValid(
      this.validator.validateArchetypeTable(table, path.basename(file)),
      `Archetype inventory ${file} is invalid`,
      ErrorCategory.DATA_INTEGRITY
    );
    this.logger.debug(`Loaded ${archetypes.length} archetypes from ${file}`);
    return archetypes;
  }

  loadRadiation(nutsid: string): RadiationRecord[] {
    const file = solarFile(this.dataDir, nutsid);
    const table = parseCsv(this.readData(file));
    const records = this.validator.assertValid(
      this.validator.validateSolarTable(table, nutsid, path.basename(file)),
      `Radiation inventory ${file} is invalid`,
      ErrorCategory.DATA_INTEGRITY
    );
    this.logger.debug(`Loaded ${records.length} radiation bands from ${file}`);
    return records;
  }

  private readData(file: string): string {
    if (!fs.existsSync(file)) {
      throw dataIntegrityError(`Required input file does not exist: ${file}`, { file });
    }
    return fs.readFileSync(file, 'utf8');
  }
}
