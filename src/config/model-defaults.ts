/**
 * Default model settings
 *
 * Fixed parameters of the calculation. Values that a deployment may want to
 * change live in the settings loader instead.
 */

export const MODEL_VERSION = 'v0.10.0';

export interface SeasonGates {
  /** Days with a mean outdoor temperature below this never need cooling (°C) */
  winterTemperature: number;
  /** Days with a mean outdoor temperature above this never need heating (°C) */
  summerTemperature: number;
}

export interface ModelDefaults {
  seasons: SeasonGates;
  /** Share of the sensible cooling load met by cooling equipment */
  coolingReductionFactor: number;
  /** Floor heat loss is taken against the ground, not outdoor air */
  groundLossFactor: number;
  /** Ventilation heat capacity of air (Wh/m³K) */
  airHeatCapacity: number;
  /** Sum-to-1 tolerance applied to fuel shares */
  shareTolerance: number;
  /** Hour of the day with the highest outdoor temperature */
  peakTemperatureHour: number;
  years: { min: number; max: number };
  regions: readonly string[];
}

export const DefaultModelConfig: ModelDefaults = {
  seasons: { winterTemperature: 12, summerTemperature: 22.5 },
  coolingReductionFactor: 0.333,
  groundLossFactor: 0.5,
  airHeatCapacity: 0.34,
  shareTolerance: 1e-4,
  peakTemperatureHour: 15,
  years: { min: 1900, max: 2050 },
  regions: ['ES21', 'ES41'],
};
