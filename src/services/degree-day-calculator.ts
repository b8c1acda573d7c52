import { DateTime } from 'luxon';
import { BuildingUse } from '../constants/building-stock';
import { DefaultModelConfig } from '../config/model-defaults';
import { DegreeDayProfile, HourlySeries } from '../types';
import { computationError } from '../util/error-handler';
import { sum } from '../util/keyed';
import { Logger } from '../util/logger';
import { TimeWindow, windowWithinYear } from '../util/time-window';
import { DefaultDatabase, RegionClimate } from './default-database';

export interface DegreeDayReductions {
  hdd: number;
  cdd: number;
}

/**
 * Hourly outdoor temperature of one region and year, built from monthly means
 * with a daily cosine swing
 */
export class ClimateProfile {
  /** Day-of-year (0-based, fractional) of each mid-month anchor */
  private readonly anchors: number[];
  private readonly daysInYear: number;

  constructor(
    private readonly climate: RegionClimate,
    readonly year: number,
    private readonly peakHour: number = DefaultModelConfig.peakTemperatureHour
  ) {
    this.daysInYear = DateTime.utc(year, 12, 31).ordinal;
    this.anchors = climate.monthlyMeanTemperature.map((_, month) => DateTime.utc(year, month + 1, 15).ordinal - 1);
  }

  /**
   * Daily mean temperature at a fractional day of the year, linearly
   * interpolated between mid-month values and wrapping over the new year
   */
  private meanAt(day: number): number {
    const means = this.climate.monthlyMeanTemperature;
    const last = this.anchors.length - 1;

    let fromDay: number;
    let toDay: number;
    let from: number;
    let to: number;

    if (day < this.anchors[0]) {
      fromDay = this.anchors[last] - this.daysInYear;
      toDay = this.anchors[0];
      from = means[last];
      to = means[0];
    } else if (day >= this.anchors[last]) {
      fromDay = this.anchors[last];
      toDay = this.anchors[0] + this.daysInYear;
      from = means[last];
      to = means[0];
    } else {
      let month = 0;
      while (day >= this.anchors[month + 1]) {
        month++;
      }
      fromDay = this.anchors[month];
      toDay = this.anchors[month + 1];
      from = means[month];
      to = means[month + 1];
    }

    const weight = (day - fromDay) / (toDay - fromDay);
    return from + (to - from) * weight;
  }

  temperatureAt(hour: DateTime): number {
    const day = hour.ordinal - 1 + hour.hour / 24;
    const swing = (this.climate.dailyAmplitude / 2) * Math.cos((2 * Math.PI * (hour.hour - this.peakHour)) / 24);
    return this.meanAt(day) + swing;
  }

  /**
   * Mean of the 24 hourly temperatures of the calendar day containing `hour`
   */
  dailyMean(hour: DateTime): number {
    const midnight = hour.startOf('day');
    let total = 0;
    for (let h = 0; h < 24; h++) {
      total += this.temperatureAt(midnight.plus({ hours: h }));
    }
    return total / 24;
  }
}

/**
 * Computes hourly heating and cooling degree-days (K·day per hour) for a
 * building use over a window
 */
export class DegreeDayCalculator {
  private readonly profiles = new Map<string, ClimateProfile>();

  constructor(
    private readonly database: DefaultDatabase,
    private readonly logger: Logger
  ) {}

  /**
   * Climate profile of a region; only the scenario year is available
   */
  climateProfile(nutsid: string, year: number): ClimateProfile {
    const key = `${nutsid}|${year}`;
    let profile = this.profiles.get(key);
    if (!profile) {
      profile = new ClimateProfile(this.database.climate(nutsid), year);
      this.profiles.set(key, profile);
    }
    return profile;
  }

  /**
   * Outdoor temperature for each hour of the window (°C)
   */
  temperatures(window: TimeWindow, nutsid: string, year: number): HourlySeries {
    this.assertCovered(window, nutsid, year);
    const profile = this.climateProfile(nutsid, year);
    return window.hours.map(hour => profile.temperatureAt(hour));
  }

  compute(
    window: TimeWindow,
    nutsid: string,
    year: number,
    use: BuildingUse,
    reductions: DegreeDayReductions
  ): DegreeDayProfile {
    const temperatures = this.temperatures(window, nutsid, year);
    const profile = this.climateProfile(nutsid, year);
    const base = this.database.baseTemperatures(use);
    const { winterTemperature, summerTemperature } = DefaultModelConfig.seasons;

    const hdd: HourlySeries = [];
    const cdd: HourlySeries = [];
    const dayMeans = new Map<number, number>();

    window.hours.forEach((hour, i) => {
      const temperature = temperatures[i];
      let dayMean = dayMeans.get(hour.ordinal);
      if (dayMean === undefined) {
        dayMean = profile.dailyMean(hour);
        dayMeans.set(hour.ordinal, dayMean);
      }

      const heating = dayMean > summerTemperature ? 0 : Math.max(0, base.heating - temperature) / 24;
      const cooling = dayMean < winterTemperature ? 0 : Math.max(0, temperature - base.cooling) / 24;

      hdd.push(Math.max(0, heating * (1 - reductions.hdd)));
      cdd.push(Math.max(0, cooling * (1 - reductions.cdd)));
    });

    this.logger.debug(
      `Degree-days for ${use} in ${nutsid}: HDD ${sum(hdd).toFixed(3)}, CDD ${sum(cdd).toFixed(3)} over ${window.hours.length} h`
    );
    return { hdd, cdd };
  }

  private assertCovered(window: TimeWindow, nutsid: string, year: number): void {
    if (!windowWithinYear(window, year)) {
      throw computationError(
        `Requested window is outside the climate data available for ${nutsid} (year ${year})`,
        { nutsid, year, hours: window.hours.length }
      );
    }
  }
}
