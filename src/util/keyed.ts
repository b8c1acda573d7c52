import {
  BuildingUse,
  ConstructionPeriod,
  EndUse,
  EquipmentEndUse,
  FuelCategory,
  RefLevel,
  ResultCategory,
  Technology,
} from '../constants/building-stock';

/**
 * Builders for the fixed-key records used throughout the model. Each lists its
 * keys explicitly so the compiler checks the record is exhaustive.
 */

export function byUse<T>(fn: (use: BuildingUse) => T): Record<BuildingUse, T> {
  return {
    'Apartment Block': fn('Apartment Block'),
    'Single family- Terraced houses': fn('Single family- Terraced houses'),
    'Hotels and Restaurants': fn('Hotels and Restaurants'),
    Health: fn('Health'),
    Education: fn('Education'),
    Offices: fn('Offices'),
    Trade: fn('Trade'),
    'Other non-residential buildings': fn('Other non-residential buildings'),
    Sport: fn('Sport'),
  };
}

export function byPeriod<T>(fn: (period: ConstructionPeriod) => T): Record<ConstructionPeriod, T> {
  return {
    'Pre-1945': fn('Pre-1945'),
    '1945-1969': fn('1945-1969'),
    '1970-1979': fn('1970-1979'),
    '1980-1989': fn('1980-1989'),
    '1990-1999': fn('1990-1999'),
    '2000-2010': fn('2000-2010'),
    'Post-2010': fn('Post-2010'),
  };
}

export function byLevel<T>(fn: (level: RefLevel) => T): Record<RefLevel, T> {
  return {
    Low: fn('Low'),
    Medium: fn('Medium'),
    High: fn('High'),
  };
}

export function byEndUse<T>(fn: (endUse: EndUse) => T): Record<EndUse, T> {
  return {
    space_heating: fn('space_heating'),
    space_cooling: fn('space_cooling'),
    water_heating: fn('water_heating'),
    cooking: fn('cooking'),
    lighting: fn('lighting'),
    appliances: fn('appliances'),
  };
}

export function byEquipmentEndUse<T>(fn: (endUse: EquipmentEndUse) => T): Record<EquipmentEndUse, T> {
  return {
    space_heating: fn('space_heating'),
    space_cooling: fn('space_cooling'),
    water_heating: fn('water_heating'),
    cooking: fn('cooking'),
  };
}

export function byTechnology<T>(fn: (tech: Technology) => T): Record<Technology, T> {
  return {
    solids: fn('solids'),
    lpg: fn('lpg'),
    diesel_oil: fn('diesel_oil'),
    gas_heat_pumps: fn('gas_heat_pumps'),
    natural_gas: fn('natural_gas'),
    biomass: fn('biomass'),
    geothermal: fn('geothermal'),
    distributed_heat: fn('distributed_heat'),
    advanced_electric_heating: fn('advanced_electric_heating'),
    conventional_electric_heating: fn('conventional_electric_heating'),
    bio_oil: fn('bio_oil'),
    bio_gas: fn('bio_gas'),
    hydrogen: fn('hydrogen'),
    electric_space_cooling: fn('electric_space_cooling'),
    solar: fn('solar'),
    electricity: fn('electricity'),
  };
}

export function byFuel<T>(fn: (fuel: FuelCategory) => T): Record<FuelCategory, T> {
  return {
    'Solids|Coal': fn('Solids|Coal'),
    'Liquids|Gas': fn('Liquids|Gas'),
    'Liquids|Oil': fn('Liquids|Oil'),
    'Gases|Gas': fn('Gases|Gas'),
    'Solids|Biomass': fn('Solids|Biomass'),
    Electricity: fn('Electricity'),
    Heat: fn('Heat'),
    'Liquids|Biomass': fn('Liquids|Biomass'),
    'Gases|Biomass': fn('Gases|Biomass'),
    Hydrogen: fn('Hydrogen'),
    'Heat|Solar': fn('Heat|Solar'),
  };
}

export function byResultCategory<T>(fn: (category: ResultCategory) => T): Record<ResultCategory, T> {
  return {
    ...byFuel<T>(fn),
    'Variable cost [€/KWh]': fn('Variable cost [€/KWh]'),
    'Emissions [KgCO2/KWh]': fn('Emissions [KgCO2/KWh]'),
  };
}

/**
 * Narrow a record built from partial input once every key holds a value
 */
export function isComplete<K extends string, T>(
  keys: readonly K[],
  record: Record<K, T | undefined>
): record is Record<K, T> {
  return keys.every(key => record[key] !== undefined);
}

export function zeroSeries(length: number): number[] {
  return new Array<number>(length).fill(0);
}

/**
 * Element-wise sum into `target`; both series share the window length
 */
export function addInto(target: number[], source: readonly number[], factor: number = 1): void {
  for (let i = 0; i < target.length; i++) {
    target[i] += (source[i] ?? 0) * factor;
  }
}

export function sum(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0);
}
