import path from 'path';
import { DefaultModelConfig } from '../config/model-defaults';
import { Logger, LogLevel, parseLogLevel } from '../util/logger';
import { SettingsAccessor, SettingsSource } from '../util/settings-accessor';

export const SETTINGS_KEYS = {
  DATA_DIR: 'BSEM_DATA_DIR',
  LOG_LEVEL: 'BSEM_LOG_LEVEL',
  SHARE_TOLERANCE: 'BSEM_SHARE_TOLERANCE',
  OUTPUT_FILE: 'BSEM_OUTPUT_FILE',
} as const;

/** Directory shipped with the package holding the database and regional CSVs */
export const DEFAULT_DATA_DIR = path.resolve(__dirname, '..', '..', 'data');

export interface ModelSettings {
  dataDir: string;
  logLevel: LogLevel;
  /** Allowed deviation of a fuel-share sum from 1 */
  shareTolerance: number;
  /** Extra destination for the JSON result */
  outputFile?: string;
}

/**
 * Resolves model settings from the environment (or any key/value source)
 */
export class SettingsLoader {
  private readonly accessor: SettingsAccessor;

  constructor(source: SettingsSource = process.env, logger?: Logger) {
    this.accessor = new SettingsAccessor(source, logger);
  }

  load(): ModelSettings {
    const dataDir = path.resolve(this.accessor.getString(SETTINGS_KEYS.DATA_DIR, DEFAULT_DATA_DIR));
    const logLevel = this.accessor.getParsed(SETTINGS_KEYS.LOG_LEVEL, LogLevel.INFO, parseLogLevel);
    const shareTolerance = this.accessor.getNumber(
      SETTINGS_KEYS.SHARE_TOLERANCE,
      DefaultModelConfig.shareTolerance,
      { min: 0, max: 0.01 }
    );
    const outputFile = this.accessor.getOptionalString(SETTINGS_KEYS.OUTPUT_FILE);

    return {
      dataDir,
      logLevel,
      shareTolerance,
      ...(outputFile !== undefined ? { outputFile: path.resolve(outputFile) } : {}),
    };
  }
}
