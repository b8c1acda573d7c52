import {
  COST_KEY,
  DATETIME_KEY,
  EMISSIONS_KEY,
  RESULT_CATEGORIES,
  ResultCategory,
} from '../constants/building-stock';
import { FuelStreams, HourlySeries, ResultSeries } from '../types';
import { computationError } from '../util/error-handler';
import { byResultCategory } from '../util/keyed';
import { Logger } from '../util/logger';
import { formatTimestamp, TimeWindow } from '../util/time-window';
import { CostEmissionSeries } from './cost-emission-calculator';

const HOUR_MS = 60 * 60 * 1000;

/** Output record keyed by `Datetime` and every result category, in order */
export type ResultDocument = { [DATETIME_KEY]: string[] } & Record<ResultCategory, number[]>;

/**
 * Assembles the category-keyed hourly result and checks it before release
 */
export class ResultAggregator {
  constructor(private readonly logger: Logger) {}

  aggregate(window: TimeWindow, fuels: Partial<FuelStreams>, costs: CostEmissionSeries): ResultSeries {
    const length = window.hours.length;
    this.assertTimeline(window);

    const pick = (category: ResultCategory): HourlySeries => {
      if (category === COST_KEY) return costs.cost;
      if (category === EMISSIONS_KEY) return costs.emissions;
      return fuels[category] ?? [];
    };
    const values = byResultCategory(category => {
      const series = pick(category);
      return Array.from({ length }, (_, i) => series[i] ?? 0);
    });

    const result: ResultSeries = {
      Datetime: window.hours.map(formatTimestamp),
      values,
    };
    this.assertSane(result);

    this.logger.model(`Aggregated ${RESULT_CATEGORIES.length} categories over ${length} hour(s)`);
    return result;
  }

  /**
   * Flatten to the published output shape
   */
  toDocument(series: ResultSeries): ResultDocument {
    return { [DATETIME_KEY]: series.Datetime, ...series.values };
  }

  private assertTimeline(window: TimeWindow): void {
    if (window.hours.length === 0) {
      throw computationError('Requested window contains no full hour');
    }
    for (let i = 1; i < window.hours.length; i++) {
      if (window.hours[i].toMillis() - window.hours[i - 1].toMillis() !== HOUR_MS) {
        throw computationError('Timestamps are not at one-hour steps', { index: i });
      }
    }
  }

  private assertSane(result: ResultSeries): void {
    for (const category of RESULT_CATEGORIES) {
      const series = result.values[category];
      const bad = series.findIndex(value => !Number.isFinite(value) || value < 0);
      if (bad >= 0) {
        throw computationError(`Output series "${category}" has an invalid value at ${result.Datetime[bad]}`, {
          category,
          value: series[bad],
        });
      }
    }
  }
}
