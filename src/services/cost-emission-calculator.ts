import { FUEL_CATEGORIES } from '../constants/building-stock';
import { FuelStreams, HourlySeries } from '../types';
import { zeroSeries } from '../util/keyed';
import { DefaultDatabase } from './default-database';

export interface CostEmissionSeries {
  /** € per hour */
  cost: HourlySeries;
  /** kgCO2 per hour */
  emissions: HourlySeries;
}

export class CostEmissionCalculator {
  constructor(private readonly database: DefaultDatabase) {}

  compute(fuels: FuelStreams, year: number): CostEmissionSeries {
    const factors = this.database.fuelFactors(year);
    const length = fuels.Electricity.length;
    const cost = zeroSeries(length);
    const emissions = zeroSeries(length);

    for (const fuel of FUEL_CATEGORIES) {
      const { cost: unitCost, emissions: factor } = factors[fuel];
      fuels[fuel].forEach((consumption, i) => {
        cost[i] += consumption * unitCost;
        emissions[i] += consumption * factor;
      });
    }

    return { cost, emissions };
  }
}
