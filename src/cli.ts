#!/usr/bin/env node
/**
 * building-energy-process <payload.json> <start> <end> <building use>
 *
 * Prints the hourly result as JSON on stdout. Log output goes to stderr.
 */

import fs from 'fs';
import path from 'path';
import { MODEL_VERSION } from './config/model-defaults';
import { BuildingStockModel } from './services/building-stock-model';
import { DefaultDatabase } from './services/default-database';
import { InputLoader } from './services/input-loader';
import { ResultAggregator } from './services/result-aggregator';
import { SchemaValidator } from './services/schema-validator';
import { SettingsLoader } from './services/settings-loader';
import { ErrorCategory, ErrorHandler } from './util/error-handler';
import { ConsoleLogger, LogCategory, Logger, LogLevel, LogSink } from './util/logger';
import { buildHourlyWindow } from './util/time-window';

export interface CliIo {
  stdout: (text: string) => void;
  stderr: LogSink;
  env: Readonly<Record<string, string | undefined>>;
  fileExists?: (file: string) => boolean;
}

const defaultIo: CliIo = {
  stdout: text => process.stdout.write(text),
  stderr: { log: console.error, error: console.error },
  env: process.env,
};

/**
 * Run one invocation
 * @param args Positional arguments, without the node and script paths
 * @returns Process exit code
 */
export function main(args: readonly string[], io: CliIo = defaultIo): number {
  const bootstrap = new ConsoleLogger(io.stderr, { prefix: 'BSEM', includeTimestamps: false });
  const settings = new SettingsLoader(io.env, bootstrap).load();
  const logger: Logger = new ConsoleLogger(io.stderr, {
    prefix: 'BSEM',
    level: settings.logLevel,
    includeTimestamps: true,
    verboseMode: settings.logLevel === LogLevel.DEBUG,
  });
  const errors = new ErrorHandler(logger);
  const validator = new SchemaValidator(logger, { shareTolerance: settings.shareTolerance });

  try {
    const command = validator.assertValid(
      validator.validateCommandLine(args, io.fileExists),
      'Invalid command line',
      ErrorCategory.ARGUMENT
    );
    logger.marker(`Building stock energy model ${MODEL_VERSION}`);

    const loader = new InputLoader(settings.dataDir, validator, logger);
    const scenario = loader.loadPayload(command.payloadPath);

    const database = DefaultDatabase.load(settings.dataDir, logger, settings.shareTolerance);
    const archetypes = loader.loadArchetypes(scenario.nutsid);
    const radiation = loader.loadRadiation(scenario.nutsid);

    const model = new BuildingStockModel(database, logger);
    const result = model.run({
      scenario,
      archetypes,
      radiation,
      window: buildHourlyWindow(command.start, command.end),
      buildingUse: command.buildingUse,
    });

    const document = new ResultAggregator(logger).toDocument(result.series);
    const json = JSON.stringify(document);
    io.stdout(`${json}\n`);

    if (settings.outputFile) {
      fs.mkdirSync(path.dirname(settings.outputFile), { recursive: true });
      fs.writeFileSync(settings.outputFile, json);
      logger.log(`Result written to ${settings.outputFile}`);
    }

    if (logger.isCategoryEnabled(LogCategory.MODEL)) {
      logger.info(`Totals: ${logger.formatValue(result.summary.totals)}`);
      const { totalCapex, totalOpex } = result.summary.investment;
      logger.info(`Investment: ${logger.formatValue({ capex: totalCapex, opex: totalOpex })}`);
    }
    return 0;
  } catch (error) {
    return errors.handleFatal(error, { args: [...args] });
  }
}

if (require.main === module) {
  process.exitCode = main(process.argv.slice(2));
}
