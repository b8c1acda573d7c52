import {
  BuildingUse,
  END_USE_TECHNOLOGIES,
  END_USES,
  EndUse,
  Technology,
  TECHNOLOGY_FUEL,
} from '../constants/building-stock';
import {
  DemandStreams,
  EndUseMix,
  FuelStreams,
  HourlySeries,
  TechMixEntries,
  TechMixSpec,
} from '../types';
import { addInto, byEndUse, byFuel, zeroSeries } from '../util/keyed';
import { Logger } from '../util/logger';
import { DefaultDatabase } from './default-database';

export interface AllocationResult {
  /** Delivered energy per fuel category, all end uses summed */
  fuels: FuelStreams;
  /** Delivered energy per end use and fuel category */
  byEndUse: Record<EndUse, FuelStreams>;
  /** Circulation pump electricity, already included in `fuels.Electricity` */
  auxiliary: HourlySeries;
}

/**
 * Pick the scenario value when the entry is user defined, the database value
 * otherwise
 */
export function resolve<T>(userDefined: boolean, scenarioValue: T, defaultValue: T): T {
  return userDefined ? scenarioValue : defaultValue;
}

/**
 * Converts end-use demand into delivered energy per fuel using equipment
 * coverage, fuel shares and technology efficiencies
 */
export class ConsumptionAllocator {
  constructor(
    private readonly database: DefaultDatabase,
    private readonly logger: Logger
  ) {}

  /**
   * Tech mix that applies to a run: the scenario entry as given, or the
   * database default for (use, year) when it is not user defined
   */
  resolveMix(spec: TechMixSpec, year: number): TechMixEntries {
    const defaults = this.database.techMixDefault(spec.buildingUse, year);
    const pick = <E extends EndUse>(endUse: E): TechMixEntries[E] =>
      resolve<TechMixEntries[E]>(spec.userDefinedData, spec[endUse], defaults[endUse]);

    if (!spec.userDefinedData) {
      this.logger.debug(`Using database tech mix for ${spec.buildingUse} (${year})`);
    }

    return {
      space_heating: pick('space_heating'),
      space_cooling: pick('space_cooling'),
      water_heating: pick('water_heating'),
      cooking: pick('cooking'),
      lighting: pick('lighting'),
      appliances: pick('appliances'),
    };
  }

  allocate(demand: DemandStreams, mix: TechMixEntries, use: BuildingUse): AllocationResult {
    const length = demand.space_heating.length;
    const fuels = byFuel(() => zeroSeries(length));
    const perEndUse = byEndUse(() => byFuel(() => zeroSeries(length)));

    for (const endUse of END_USES) {
      const entry: EndUseMix = mix[endUse];
      const technologies: readonly Technology[] = END_USE_TECHNOLOGIES[endUse];
      for (const tech of technologies) {
        const share = entry.shares[tech];
        if (share === 0 || entry.pctBuildEquipped === 0) {
          continue;
        }
        const factor = (entry.pctBuildEquipped * share) / this.database.efficiency(endUse, tech);
        const fuel = TECHNOLOGY_FUEL[tech];
        addInto(perEndUse[endUse][fuel], demand[endUse], factor);
        addInto(fuels[fuel], demand[endUse], factor);
      }
    }

    const heating = mix.space_heating;
    const auxiliary = demand.space_heating.map(
      value =>
        value * heating.pctBuildEquipped * heating.electricityInCirculation * this.database.auxiliaryCirculationRatio
    );
    addInto(fuels.Electricity, auxiliary);

    this.logger.debug(`Allocated demand of ${use} over ${length} h`);
    return { fuels, byEndUse: perEndUse, auxiliary };
  }
}
