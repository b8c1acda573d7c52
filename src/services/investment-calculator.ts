import {
  BuildingUse,
  CONSTRUCTION_PERIODS,
  END_USE_TECHNOLOGIES,
  EQUIPMENT_END_USES,
  Technology,
} from '../constants/building-stock';
import { InvestmentSummary, RenovationSpec, TechMixEntries } from '../types';
import { byTechnology, sum } from '../util/keyed';
import { Logger } from '../util/logger';
import { ArchetypeRepository } from './archetype-repository';
import { DefaultDatabase } from './default-database';

export interface InvestmentRequest {
  buildingUse: BuildingUse;
  archetypes: ArchetypeRepository;
  mix: TechMixEntries;
  /** Renovation applied by the run; absent in base-year runs */
  renovation?: RenovationSpec;
  growthFactor: number;
  /** Installed solar peak power (kWp) */
  solarPowerKw: number;
}

/**
 * Investment and running costs behind a run: rated equipment per technology,
 * envelope retrofitting and new solar capacity
 */
export class InvestmentCalculator {
  constructor(
    private readonly database: DefaultDatabase,
    private readonly logger: Logger
  ) {}

  /**
   * Rated capacity (kW) per technology. Each equipment end use is sized by the
   * floor area and its specific capacity, then split by coverage and fuel shares.
   */
  equivalentPower(use: BuildingUse, floorArea: number, mix: TechMixEntries): Record<Technology, number> {
    const capacity = this.database.investment.equipmentCapacity[use];
    const power = byTechnology(() => 0);

    for (const endUse of EQUIPMENT_END_USES) {
      const entry = mix[endUse];
      const rated = (floorArea * capacity[endUse]) / 1000;
      const technologies: readonly Technology[] = END_USE_TECHNOLOGIES[endUse];
      for (const tech of technologies) {
        power[tech] += rated * entry.pctBuildEquipped * entry.shares[tech];
      }
    }
    return power;
  }

  /**
   * Cost of bringing the renovated share of each period to the target level
   */
  retrofitCost(use: BuildingUse, archetypes: ArchetypeRepository, renovation?: RenovationSpec): number {
    if (!renovation) {
      return 0;
    }
    const costPerM2 = this.database.investment.retrofitCost[renovation.refLevel];
    return CONSTRUCTION_PERIODS.reduce((total, period) => {
      const floorArea = sum(archetypes.forUseAndPeriod(use, period).map(archetype => archetype.floorArea));
      return total + floorArea * renovation.percentagesByPeriods[period] * costPerM2;
    }, 0);
  }

  compute(request: InvestmentRequest): InvestmentSummary {
    const { equipmentCosts } = this.database.investment;
    const solarParams = this.database.solar;
    const use = request.buildingUse;

    const floorArea = request.archetypes.totalFloorArea(use) * request.growthFactor;
    const equivalentPower = this.equivalentPower(use, floorArea, request.mix);
    const equipmentCapex = sum(Object.values(byTechnology(tech => equivalentPower[tech] * equipmentCosts[tech].capex)));
    const equipmentOpex = sum(Object.values(byTechnology(tech => equivalentPower[tech] * equipmentCosts[tech].opex)));
    const retrofitCost = this.retrofitCost(use, request.archetypes, request.renovation);
    const solar = {
      powerKw: request.solarPowerKw,
      capex: request.solarPowerKw * solarParams.capexPerKw,
      opex: request.solarPowerKw * solarParams.opexPerKw,
    };

    const summary: InvestmentSummary = {
      equivalentPower,
      equipmentCapex,
      equipmentOpex,
      retrofitCost,
      solar,
      totalCapex: equipmentCapex + retrofitCost + solar.capex,
      totalOpex: equipmentOpex + solar.opex,
    };
    this.logger.model(`Investment for ${use}`, {
      capex: summary.totalCapex,
      opex: summary.totalOpex,
      retrofitting: retrofitCost,
    });
    return summary;
  }
}
