import { DateTime } from 'luxon';
import {
  BuildingUse,
  ConstructionPeriod,
  EndUse,
  FuelCategory,
  RefLevel,
  ResultCategory,
  Technology,
} from '../constants/building-stock';

// Building stock inventory

export interface Archetype {
  buildingUse: BuildingUse;
  constructionPeriod: ConstructionPeriod;
  archetypeId: string;
  /** Total floor area represented by the archetype (m²) */
  floorArea: number;
  floorCount: number;
  /** Average storey height (m) */
  avgHeight: number;
  /** Heated volume (m³) */
  volume: number;
  /** Footprint (m²) */
  builtArea: number;
  /** External wall area including openings (m²) */
  facadeArea: number;
}

export interface RadiationRecord {
  region: string;
  centroidX: number;
  centroidY: number;
  totalArea: number;
  maxRadiation: number;
  averageRadiation: number;
  /** Lower bound of the radiation band (kWh/m²·yr) */
  threshold: number;
  /** Roof area falling in the band (m²) */
  areaM2: number;
  medianRadiation: number;
  medianRadiationX: number;
  medianRadiationY: number;
}

// Scenario payload

/**
 * Equipment coverage and fuel shares of one end use. Technologies that do not
 * apply to the end use hold 0.
 */
export interface EndUseMix {
  pctBuildEquipped: number;
  shares: Record<Technology, number>;
}

export interface SpaceHeatingMix extends EndUseMix {
  /** Fraction of the heated stock with hydronic circulation */
  electricityInCirculation: number;
}

export interface TechMixEntries {
  space_heating: SpaceHeatingMix;
  space_cooling: EndUseMix;
  water_heating: EndUseMix;
  cooking: EndUseMix;
  lighting: EndUseMix;
  appliances: EndUseMix;
}

export interface TechMixSpec extends TechMixEntries {
  buildingUse: BuildingUse;
  userDefinedData: boolean;
}

export interface RenovationSpec {
  buildingUse: BuildingUse;
  refLevel: RefLevel;
  percentagesByPeriods: Record<ConstructionPeriod, number>;
}

export interface SolarSpec {
  buildingUse: BuildingUse;
  /** Collector area (m²) */
  areaTotal: number | null;
  /** Installed peak power (kWp) */
  power: number | null;
  /** Investment (€) */
  capex: number | null;
}

export interface ScenarioConfig {
  nutsid: string;
  year: number;
  increaseResidentialBuiltArea: number;
  increaseServiceBuiltArea: number;
  hddReduction: number;
  cddReduction: number;
  activeMeasures: Record<BuildingUse, TechMixSpec>;
  activeMeasuresBaseline: Record<BuildingUse, TechMixSpec>;
  passiveMeasures: Record<BuildingUse, RenovationSpec>;
  solar: Record<BuildingUse, SolarSpec>;
}

// Invocation

export interface CommandLineArgs {
  payloadPath: string;
  start: DateTime;
  end: DateTime;
  buildingUse: BuildingUse;
}

// Hourly series

/** One value per hour of the requested window. */
export type HourlySeries = number[];

export type DemandStreams = Record<EndUse, HourlySeries>;

export type FuelStreams = Record<FuelCategory, HourlySeries>;

export interface DegreeDayProfile {
  hdd: HourlySeries;
  cdd: HourlySeries;
}

export type RunKind = 'baseline' | 'scenario';

export interface ResultSeries {
  /** Hourly timestamps, `yyyy-MM-dd HH:mm` */
  Datetime: string[];
  values: Record<ResultCategory, HourlySeries>;
}

export interface SolarGeneration {
  pv: HourlySeries;
  thermal: HourlySeries;
  /** Collector area installed after the roof-area cap (m²) */
  installedAreaM2: number;
  /** Peak power of the installed area (kWp) */
  installedPowerKw: number;
}

export interface InvestmentSummary {
  /** Rated equipment capacity per technology (kW) */
  equivalentPower: Record<Technology, number>;
  /** € */
  equipmentCapex: number;
  /** €/yr */
  equipmentOpex: number;
  /** Envelope retrofitting of the renovated floor area (€) */
  retrofitCost: number;
  solar: { powerKw: number; capex: number; opex: number };
  /** Equipment, retrofitting and solar investment (€) */
  totalCapex: number;
  /** Equipment and solar running cost (€/yr) */
  totalOpex: number;
}

export interface RunSummary {
  hours: number;
  totals: Record<ResultCategory, number>;
  demand: Record<EndUse, number>;
  solarGeneration: { pv: number; thermal: number };
  investment: InvestmentSummary;
}

export interface ModelResult {
  runKind: RunKind;
  buildingUse: BuildingUse;
  series: ResultSeries;
  generation: SolarGeneration;
  summary: RunSummary;
}
