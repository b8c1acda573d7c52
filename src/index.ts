export * from './constants/building-stock';
export { DefaultModelConfig, MODEL_VERSION } from './config/model-defaults';
export * from './types';
export { ArchetypeRepository } from './services/archetype-repository';
export { BuildingStockModel, ModelRunInput } from './services/building-stock-model';
export { ConsumptionAllocator, AllocationResult } from './services/consumption-allocator';
export { CostEmissionCalculator, CostEmissionSeries } from './services/cost-emission-calculator';
export { DefaultDatabase, DatabaseDocument, pickYear } from './services/default-database';
export { ClimateProfile, DegreeDayCalculator } from './services/degree-day-calculator';
export { DemandEngine, heatLossCoefficient, renovatedUValues } from './services/demand-engine';
export { InputLoader } from './services/input-loader';
export { InvestmentCalculator, InvestmentRequest } from './services/investment-calculator';
export { ResultAggregator, ResultDocument } from './services/result-aggregator';
export { SchemaValidator } from './services/schema-validator';
export { SettingsLoader, ModelSettings } from './services/settings-loader';
export { SolarModule, ResolvedCapacity } from './services/solar-module';
export { AppError, ErrorCategory, ErrorHandler, EXIT_CODES, ValidationError, Violation } from './util/error-handler';
export { ConsoleLogger, Logger, LogLevel } from './util/logger';
export { buildHourlyWindow, parseTimestamp, TimeWindow } from './util/time-window';
export { main } from './cli';
