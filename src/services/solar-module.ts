import { BuildingUse } from '../constants/building-stock';
import { FuelStreams, HourlySeries, RadiationRecord, SolarGeneration, SolarSpec } from '../types';
import { Logger } from '../util/logger';
import { daylightFactor } from '../util/solar-geometry';
import { hoursOfYear, TimeWindow } from '../util/time-window';
import { DefaultDatabase, SolarParameters } from './default-database';

export type CapacitySource = 'area_total' | 'power' | 'capex' | 'none';

export interface ResolvedCapacity {
  source: CapacitySource;
  /** Collector area (m²) */
  areaM2: number;
  /** Peak power (kWp) */
  powerKw: number;
}

export interface RadiationSummary {
  /** Area-weighted median radiation of the bands (kWh/m²·yr) */
  radiation: number;
  /** Roof area across the bands (m²) */
  availableArea: number;
  bands: number;
}

export interface SolarGenerationRequest {
  spec: SolarSpec;
  records: readonly RadiationRecord[];
  nutsid: string;
  window: TimeWindow;
  year: number;
  latitude: number;
}

interface CapacityRule {
  source: Exclude<CapacitySource, 'none'>;
  read: (spec: SolarSpec) => number | null;
  convert: (value: number, params: SolarParameters) => { areaM2: number; powerKw: number };
}

/** Ordered by precedence: the first rule with a value wins. */
const CAPACITY_RULES: readonly CapacityRule[] = [
  {
    source: 'area_total',
    read: spec => spec.areaTotal,
    convert: (area, p) => ({ areaM2: area, powerKw: area / p.squareMetresPerKw }),
  },
  {
    source: 'power',
    read: spec => spec.power,
    convert: (power, p) => ({ areaM2: power * p.squareMetresPerKw, powerKw: power }),
  },
  {
    source: 'capex',
    read: spec => spec.capex,
    convert: (capex, p) => {
      const powerKw = capex / p.capexPerKw;
      return { areaM2: powerKw * p.squareMetresPerKw, powerKw };
    },
  },
];

/**
 * Rooftop PV and solar thermal generation from the regional radiation-band
 * inventory
 */
export class SolarModule {
  private readonly annualShapeTotals = new Map<string, number>();

  constructor(
    private readonly database: DefaultDatabase,
    private readonly logger: Logger
  ) {}

  resolveCapacity(spec: SolarSpec): ResolvedCapacity {
    const params = this.database.solar;
    for (const rule of CAPACITY_RULES) {
      const value = rule.read(spec);
      if (value !== null) {
        return { source: rule.source, ...rule.convert(value, params) };
      }
    }
    return { source: 'none', areaM2: 0, powerKw: 0 };
  }

  /**
   * Radiation of the bands whose NUTS3 code is one of `regions`
   */
  representativeRadiation(records: readonly RadiationRecord[], regions: readonly string[]): RadiationSummary {
    const bands = records.filter(record => regions.includes(record.region));
    const availableArea = bands.reduce((total, band) => total + band.areaM2, 0);
    const weighted = bands.reduce((total, band) => total + band.areaM2 * band.medianRadiation, 0);
    return {
      radiation: availableArea > 0 ? weighted / availableArea : 0,
      availableArea,
      bands: bands.length,
    };
  }

  /**
   * Hourly availability weights over the window; the weights of a full year sum to 1
   */
  availability(window: TimeWindow, year: number, latitude: number): HourlySeries {
    const total = this.annualShapeTotal(year, latitude);
    return window.hours.map(hour => (total > 0 ? daylightFactor(hour, latitude) / total : 0));
  }

  generate(request: SolarGenerationRequest): SolarGeneration {
    const use: BuildingUse = request.spec.buildingUse;
    const params = this.database.solar;
    const capacity = this.resolveCapacity(request.spec);
    const { nuts3 } = this.database.region(request.nutsid);
    const { radiation, availableArea } = this.representativeRadiation(request.records, nuts3);

    const installed = Math.min(capacity.areaM2, availableArea);
    if (installed < capacity.areaM2) {
      this.logger.warn(`Solar area for ${use} capped at the available roof area`, {
        requested: capacity.areaM2,
        available: availableArea,
      });
    }
    const thermalArea = installed * params.thermalShare[use];
    const pvArea = installed - thermalArea;

    const availability = this.availability(request.window, request.year, request.latitude);
    const pv = availability.map(weight => pvArea * radiation * params.pvEfficiency * weight);
    const thermal = availability.map(weight => thermalArea * radiation * params.thermalEfficiency * weight);

    this.logger.debug(
      `Solar for ${use}: ${capacity.source}, ${installed.toFixed(1)} m² (PV ${pvArea.toFixed(1)}, thermal ${thermalArea.toFixed(1)}), ${radiation.toFixed(1)} kWh/m²·yr`
    );
    return { pv, thermal, installedAreaM2: installed, installedPowerKw: installed / params.squareMetresPerKw };
  }

  /**
   * Meet water heating demand with solar thermal, hour by hour
   * @returns The remaining demand and the heat used
   */
  offsetWaterHeating(demand: HourlySeries, thermal: HourlySeries): { residual: HourlySeries; used: HourlySeries } {
    const used = demand.map((value, i) => Math.min(value, thermal[i] ?? 0));
    return { residual: demand.map((value, i) => value - used[i]), used };
  }

  /**
   * Reduce grid electricity by PV output, never below zero
   * @returns The electricity displaced in each hour
   */
  offsetElectricity(fuels: FuelStreams, pv: HourlySeries): HourlySeries {
    return fuels.Electricity.map((value, i) => {
      const displaced = Math.min(value, pv[i] ?? 0);
      fuels.Electricity[i] = value - displaced;
      return displaced;
    });
  }

  private annualShapeTotal(year: number, latitude: number): number {
    const key = `${year}|${latitude}`;
    let total = this.annualShapeTotals.get(key);
    if (total === undefined) {
      total = hoursOfYear(year).reduce((acc, hour) => acc + daylightFactor(hour, latitude), 0);
      this.annualShapeTotals.set(key, total);
    }
    return total;
  }
}
