import { BuildingUse, END_USES } from '../constants/building-stock';
import { DefaultModelConfig } from '../config/model-defaults';
import { Archetype, DegreeDayProfile, DemandStreams, RenovationSpec } from '../types';
import { computationError } from '../util/error-handler';
import { addInto, byEndUse, zeroSeries } from '../util/keyed';
import { Logger } from '../util/logger';
import { daylightFactor } from '../util/solar-geometry';
import { isWeekend, TimeWindow } from '../util/time-window';
import { DefaultDatabase, EnvelopeUValues } from './default-database';

export interface DemandRequest {
  buildingUse: BuildingUse;
  archetypes: readonly Archetype[];
  window: TimeWindow;
  degreeDays: DegreeDayProfile;
  /** Site latitude for the solar gain shape */
  latitude: number;
  /** Envelope renovation; omitted for baseline runs */
  renovation?: RenovationSpec;
  /** Floor-area growth multiplier */
  growthFactor: number;
}

const SCHEDULED_LOADS = ['water_heating', 'cooking', 'lighting', 'appliances'] as const;

/**
 * Blend period U-values towards the retrofit level by the renovated fraction
 */
export function renovatedUValues(
  period: EnvelopeUValues,
  retrofit: EnvelopeUValues,
  fraction: number
): EnvelopeUValues {
  const blend = (original: number, improved: number): number => (1 - fraction) * original + fraction * improved;
  return {
    wall: blend(period.wall, retrofit.wall),
    roof: blend(period.roof, retrofit.roof),
    floor: blend(period.floor, retrofit.floor),
    window: blend(period.window, retrofit.window),
  };
}

/**
 * Transmission plus ventilation heat loss coefficient of an archetype (W/K)
 */
export function heatLossCoefficient(
  archetype: Archetype,
  u: EnvelopeUValues,
  windowRatio: number,
  airChangesPerHour: number
): number {
  const glazing = archetype.facadeArea * windowRatio;
  const walls = archetype.facadeArea - glazing;
  const transmission =
    u.wall * walls +
    u.window * glazing +
    u.roof * archetype.builtArea +
    u.floor * archetype.builtArea * DefaultModelConfig.groundLossFactor;
  const ventilation = DefaultModelConfig.airHeatCapacity * airChangesPerHour * archetype.volume;
  return transmission + ventilation;
}

/**
 * Hourly useful-energy demand (kWh) per end use for the archetypes of one
 * building use
 */
export class DemandEngine {
  constructor(
    private readonly database: DefaultDatabase,
    private readonly logger: Logger
  ) {}

  compute(request: DemandRequest): DemandStreams {
    const { window, degreeDays } = request;
    if (degreeDays.hdd.length !== window.hours.length || degreeDays.cdd.length !== window.hours.length) {
      throw computationError('Degree-day profile does not match the requested window', {
        hours: window.hours.length,
        hdd: degreeDays.hdd.length,
        cdd: degreeDays.cdd.length,
      });
    }

    const totals = byEndUse(() => zeroSeries(window.hours.length));
    for (const archetype of request.archetypes) {
      const contribution = this.archetypeDemand(archetype, request);
      for (const endUse of END_USES) {
        addInto(totals[endUse], contribution[endUse], request.growthFactor);
      }
    }

    this.logger.debug(`Demand for ${request.buildingUse}: ${request.archetypes.length} archetype(s), ${window.hours.length} h`);
    return totals;
  }

  /**
   * Demand of a single archetype, before floor-area growth
   */
  archetypeDemand(archetype: Archetype, request: DemandRequest): DemandStreams {
    const use = request.buildingUse;
    const gains = this.database.gains(use);
    const periodU = this.database.uValues(archetype.constructionPeriod);
    const u = request.renovation
      ? renovatedUValues(
          periodU,
          this.database.retrofitUValues(request.renovation.refLevel),
          request.renovation.percentagesByPeriods[archetype.constructionPeriod]
        )
      : periodU;
    const h = heatLossCoefficient(archetype, u, this.database.windowRatio(use), this.database.ventilation(use));

    const streams = byEndUse(() => zeroSeries(request.window.hours.length));
    request.window.hours.forEach((hour, i) => {
      const occupancy = this.database.schedule(use, isWeekend(hour))[hour.hour];
      const hdd = request.degreeDays.hdd[i];
      const cdd = request.degreeDays.cdd[i];

      const internalGains =
        hdd > 0
          ? (archetype.floorArea * (gains.internal * occupancy + gains.solar * daylightFactor(hour, request.latitude))) / 1000
          : 0;
      streams.space_heating[i] = Math.max(0, (h * hdd * 24) / 1000 - internalGains);
      streams.space_cooling[i] = ((h * cdd * 24) / 1000) * DefaultModelConfig.coolingReductionFactor;

      for (const load of SCHEDULED_LOADS) {
        streams[load][i] = (archetype.floorArea * gains[load] * occupancy) / 1000;
      }
    });

    return streams;
  }
}
