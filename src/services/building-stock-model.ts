import { BuildingUse, isResidential } from '../constants/building-stock';
import {
  Archetype,
  DemandStreams,
  InvestmentSummary,
  ModelResult,
  RadiationRecord,
  ResultSeries,
  RunKind,
  RunSummary,
  ScenarioConfig,
  SolarGeneration,
} from '../types';
import { addInto, byEndUse, byResultCategory, sum } from '../util/keyed';
import { Logger } from '../util/logger';
import { TimeWindow } from '../util/time-window';
import { ArchetypeRepository } from './archetype-repository';
import { ConsumptionAllocator } from './consumption-allocator';
import { CostEmissionCalculator } from './cost-emission-calculator';
import { DefaultDatabase } from './default-database';
import { DegreeDayCalculator } from './degree-day-calculator';
import { DemandEngine } from './demand-engine';
import { InvestmentCalculator } from './investment-calculator';
import { ResultAggregator } from './result-aggregator';
import { SolarModule } from './solar-module';

export interface ModelRunInput {
  scenario: ScenarioConfig;
  archetypes: readonly Archetype[] | ArchetypeRepository;
  radiation: readonly RadiationRecord[];
  window: TimeWindow;
  buildingUse: BuildingUse;
}

function builtAreaIncrease(scenario: ScenarioConfig, use: BuildingUse): number {
  return isResidential(use) ? scenario.increaseResidentialBuiltArea : scenario.increaseServiceBuiltArea;
}

/**
 * Runs the full calculation for one scenario, building use and window
 */
export class BuildingStockModel {
  private readonly degreeDays: DegreeDayCalculator;
  private readonly demand: DemandEngine;
  private readonly allocator: ConsumptionAllocator;
  private readonly solar: SolarModule;
  private readonly costs: CostEmissionCalculator;
  private readonly investment: InvestmentCalculator;
  private readonly aggregator: ResultAggregator;

  constructor(
    private readonly database: DefaultDatabase,
    private readonly logger: Logger
  ) {
    this.degreeDays = new DegreeDayCalculator(database, logger);
    this.demand = new DemandEngine(database, logger);
    this.allocator = new ConsumptionAllocator(database, logger);
    this.solar = new SolarModule(database, logger);
    this.costs = new CostEmissionCalculator(database);
    this.investment = new InvestmentCalculator(database, logger);
    this.aggregator = new ResultAggregator(logger);
  }

  /**
   * Baseline when the scenario year is the database base year
   */
  runKind(scenario: ScenarioConfig): RunKind {
    return scenario.year === this.database.baseYear ? 'baseline' : 'scenario';
  }

  run(input: ModelRunInput): ModelResult {
    const { scenario, window, buildingUse: use } = input;
    const repository =
      input.archetypes instanceof ArchetypeRepository ? input.archetypes : new ArchetypeRepository(input.archetypes);
    const kind = this.runKind(scenario);
    const baseline = kind === 'baseline';
    const latitude = this.database.region(scenario.nutsid).latitude;

    this.logger.marker(`${kind} run: ${use}, ${scenario.nutsid} ${scenario.year}`);
    this.logger.debug(`${repository.forUse(use).length} of ${repository.size} archetypes in use`);
    if (baseline) {
      this.warnIgnoredFactors(scenario, use);
    }

    const degreeDays = this.degreeDays.compute(window, scenario.nutsid, scenario.year, use, {
      hdd: baseline ? 0 : scenario.hddReduction,
      cdd: baseline ? 0 : scenario.cddReduction,
    });

    const renovation = baseline ? undefined : scenario.passiveMeasures[use];
    const growthFactor = baseline ? 1 : 1 + builtAreaIncrease(scenario, use);
    const demand = this.demand.compute({
      buildingUse: use,
      archetypes: repository.forUse(use),
      window,
      degreeDays,
      latitude,
      renovation,
      growthFactor,
    });

    const generation = this.solar.generate({
      spec: scenario.solar[use],
      records: input.radiation,
      nutsid: scenario.nutsid,
      window,
      year: scenario.year,
      latitude,
    });
    const solarHeat = this.solar.offsetWaterHeating(demand.water_heating, generation.thermal);

    const spec = baseline ? scenario.activeMeasuresBaseline[use] : scenario.activeMeasures[use];
    const mix = this.allocator.resolveMix(spec, scenario.year);
    const allocation = this.allocator.allocate({ ...demand, water_heating: solarHeat.residual }, mix, use);

    addInto(allocation.fuels['Heat|Solar'], generation.thermal);
    this.solar.offsetElectricity(allocation.fuels, generation.pv);

    const costs = this.costs.compute(allocation.fuels, scenario.year);
    const series = this.aggregator.aggregate(window, allocation.fuels, costs);

    const investment = this.investment.compute({
      buildingUse: use,
      archetypes: repository,
      mix,
      renovation,
      growthFactor,
      solarPowerKw: generation.installedPowerKw,
    });

    const summary = this.summarize(series, demand, generation, investment);
    this.logger.model(`Run complete: ${summary.hours} h`, {
      electricity: summary.totals.Electricity,
      cost: summary.totals['Variable cost [€/KWh]'],
    });

    return { runKind: kind, buildingUse: use, series, generation, summary };
  }

  /**
   * Base-year runs describe the stock as it stands, so scenario factors are
   * left out of them
   */
  private warnIgnoredFactors(scenario: ScenarioConfig, use: BuildingUse): void {
    const growthKey = isResidential(use) ? 'increase_residential_built_area' : 'increase_service_built_area';
    const factors: Record<string, number> = {
      hdd_reduction: scenario.hddReduction,
      cdd_reduction: scenario.cddReduction,
      [growthKey]: builtAreaIncrease(scenario, use),
      passive_measures: Math.max(...Object.values(scenario.passiveMeasures[use].percentagesByPeriods)),
    };
    const ignored = Object.fromEntries(Object.entries(factors).filter(([, value]) => value !== 0));
    if (Object.keys(ignored).length > 0) {
      this.logger.warn(`Base-year run for ${use} ignores scenario factors`, ignored);
    }
  }

  private summarize(
    series: ResultSeries,
    demand: DemandStreams,
    generation: SolarGeneration,
    investment: InvestmentSummary
  ): RunSummary {
    return {
      hours: series.Datetime.length,
      totals: byResultCategory(category => sum(series.values[category])),
      demand: byEndUse(endUse => sum(demand[endUse])),
      solarGeneration: { pv: sum(generation.pv), thermal: sum(generation.thermal) },
      investment,
    };
  }
}
