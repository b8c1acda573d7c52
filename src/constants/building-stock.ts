/**
 * Building stock constants
 *
 * Closed enumerations used across the model. Every per-use or per-period table
 * is keyed by these tuples, so adding a value here makes the compiler point at
 * every table that needs a new entry.
 */

export const BUILDING_USES = [
  'Apartment Block',
  'Single family- Terraced houses',
  'Hotels and Restaurants',
  'Health',
  'Education',
  'Offices',
  'Trade',
  'Other non-residential buildings',
  'Sport',
] as const;

export type BuildingUse = (typeof BUILDING_USES)[number];

export const RESIDENTIAL_USES: readonly BuildingUse[] = [
  'Apartment Block',
  'Single family- Terraced houses',
];

export const CONSTRUCTION_PERIODS = [
  'Pre-1945',
  '1945-1969',
  '1970-1979',
  '1980-1989',
  '1990-1999',
  '2000-2010',
  'Post-2010',
] as const;

export type ConstructionPeriod = (typeof CONSTRUCTION_PERIODS)[number];

export const REF_LEVELS = ['Low', 'Medium', 'High'] as const;

export type RefLevel = (typeof REF_LEVELS)[number];

export const END_USES = [
  'space_heating',
  'space_cooling',
  'water_heating',
  'cooking',
  'lighting',
  'appliances',
] as const;

export type EndUse = (typeof END_USES)[number];

/**
 * End uses served by installed equipment with a rated capacity. Lighting and
 * appliances are not sized as building systems.
 */
export const EQUIPMENT_END_USES = [
  'space_heating',
  'space_cooling',
  'water_heating',
  'cooking',
] as const satisfies readonly EndUse[];

export type EquipmentEndUse = (typeof EQUIPMENT_END_USES)[number];

/**
 * Technologies (fuel-share fields) accepted for each end use, in payload order.
 */
export const END_USE_TECHNOLOGIES = {
  space_heating: [
    'solids',
    'lpg',
    'diesel_oil',
    'gas_heat_pumps',
    'natural_gas',
    'biomass',
    'geothermal',
    'distributed_heat',
    'advanced_electric_heating',
    'conventional_electric_heating',
    'bio_oil',
    'bio_gas',
    'hydrogen',
  ],
  space_cooling: ['gas_heat_pumps', 'electric_space_cooling'],
  water_heating: [
    'solids',
    'lpg',
    'diesel_oil',
    'natural_gas',
    'biomass',
    'geothermal',
    'distributed_heat',
    'advanced_electric_heating',
    'bio_oil',
    'bio_gas',
    'hydrogen',
    'solar',
    'electricity',
  ],
  cooking: ['solids', 'lpg', 'natural_gas', 'biomass', 'electricity'],
  lighting: ['electricity'],
  appliances: ['electricity'],
} as const satisfies Record<EndUse, readonly string[]>;

export type TechnologyOf<E extends EndUse> = (typeof END_USE_TECHNOLOGIES)[E][number];

export type Technology = TechnologyOf<EndUse>;

/**
 * Space heating carries one extra field that is not a fuel share: the fraction
 * of the heated stock served by hydronic circulation.
 */
export const CIRCULATION_FIELD = 'electricity_in_circulation';

export const FUEL_CATEGORIES = [
  'Solids|Coal',
  'Liquids|Gas',
  'Liquids|Oil',
  'Gases|Gas',
  'Solids|Biomass',
  'Electricity',
  'Heat',
  'Liquids|Biomass',
  'Gases|Biomass',
  'Hydrogen',
  'Heat|Solar',
] as const;

export type FuelCategory = (typeof FUEL_CATEGORIES)[number];

export const TECHNOLOGY_FUEL: Record<Technology, FuelCategory> = {
  solids: 'Solids|Coal',
  lpg: 'Liquids|Gas',
  diesel_oil: 'Liquids|Oil',
  gas_heat_pumps: 'Gases|Gas',
  natural_gas: 'Gases|Gas',
  biomass: 'Solids|Biomass',
  geothermal: 'Electricity',
  distributed_heat: 'Heat',
  advanced_electric_heating: 'Electricity',
  conventional_electric_heating: 'Electricity',
  bio_oil: 'Liquids|Biomass',
  bio_gas: 'Gases|Biomass',
  hydrogen: 'Hydrogen',
  electric_space_cooling: 'Electricity',
  solar: 'Heat|Solar',
  electricity: 'Electricity',
};

export const COST_KEY = 'Variable cost [€/KWh]';
export const EMISSIONS_KEY = 'Emissions [KgCO2/KWh]';
export const DATETIME_KEY = 'Datetime';

export const RESULT_CATEGORIES = [...FUEL_CATEGORIES, COST_KEY, EMISSIONS_KEY] as const;

export type ResultCategory = (typeof RESULT_CATEGORIES)[number];

/**
 * Archetype variants per construction period. Residential uses are split by
 * form factor; service uses have a single archetype per period.
 */
export const ARCHETYPE_VARIANTS: Record<BuildingUse, number> = {
  'Apartment Block': 4,
  'Single family- Terraced houses': 3,
  'Hotels and Restaurants': 1,
  Health: 1,
  Education: 1,
  Offices: 1,
  Trade: 1,
  'Other non-residential buildings': 1,
  Sport: 1,
};

export const EXPECTED_ARCHETYPE_COUNT = Object.values(ARCHETYPE_VARIANTS).reduce(
  (sum, variants) => sum + variants * CONSTRUCTION_PERIODS.length,
  0
);

export const ARCHETYPE_CSV_COLUMNS = [
  'Use',
  'Period',
  'Archetype_ID',
  'Floor_Area',
  'Floor_Count',
  'Avg_Height',
  'Volume',
  'Built_Area',
  'Facade_Area',
] as const;

export const SOLAR_CSV_COLUMNS = [
  'Region',
  'Centroid_X',
  'Centroid_Y',
  'Total_Area',
  'Max_Radiation',
  'Average_Radiation',
  'Threshold',
  'Area_m2',
  'Median_Radiation',
  'Median_Radiation_X',
  'Median_Radiation_Y',
] as const;

/** Lowest radiation band and band width in the solar inventory (kWh/m²·yr). */
export const RADIATION_BAND_START = 700;
export const RADIATION_BAND_STEP = 100;

export function isBuildingUse(value: unknown): value is BuildingUse {
  return typeof value === 'string' && (BUILDING_USES as readonly string[]).includes(value);
}

export function isConstructionPeriod(value: unknown): value is ConstructionPeriod {
  return typeof value === 'string' && (CONSTRUCTION_PERIODS as readonly string[]).includes(value);
}

export function isRefLevel(value: unknown): value is RefLevel {
  return typeof value === 'string' && (REF_LEVELS as readonly string[]).includes(value);
}

export function isResidential(use: BuildingUse): boolean {
  return RESIDENTIAL_USES.includes(use);
}
