import {
  CIRCULATION_FIELD,
  END_USE_TECHNOLOGIES,
  EndUse,
  Technology,
} from '../constants/building-stock';
import { EndUseMix, TechMixEntries } from '../types';
import { byTechnology, isComplete } from '../util/keyed';
import {
  isRecord,
  requireField,
  validateFraction,
  validateObject,
  ViolationCollector,
} from '../util/validation';

export interface TechMixParseOptions {
  /** Enforce the sum-to-1 rule on fuel shares */
  checkSums: boolean;
  tolerance: number;
}

/**
 * Read a required [0, 1] field, recording one violation when it is absent or
 * out of range
 */
export function readFraction(
  source: Record<string, unknown>,
  key: string,
  path: string,
  collector: ViolationCollector
): number | undefined {
  const raw = requireField(source, key, `${path}.${key}`, collector);
  return raw === undefined ? undefined : validateFraction(raw, `${path}.${key}`, collector);
}

function parseEndUseMix(
  endUse: EndUse,
  raw: unknown,
  path: string,
  collector: ViolationCollector,
  options: TechMixParseOptions
): EndUseMix | undefined {
  const block = validateObject(raw, path, collector);
  if (!block) {
    return undefined;
  }

  const pctBuildEquipped = readFraction(block, 'pct_build_equipped', path, collector);
  const technologies: readonly Technology[] = END_USE_TECHNOLOGIES[endUse];
  const shares = byTechnology(tech =>
    technologies.includes(tech) ? readFraction(block, tech, path, collector) : 0
  );

  if (pctBuildEquipped === undefined || !isComplete(technologies, shares)) {
    return undefined;
  }
  if (options.checkSums) {
    const total = technologies.reduce((sum, tech) => sum + shares[tech], 0);
    if (Math.abs(total - 1) > options.tolerance) {
      collector.add(
        path,
        'sum-to-one',
        `fuel shares sum to ${Number(total.toFixed(6))}, expected 1 (tolerance ${options.tolerance})`
      );
      return undefined;
    }
  }

  return { pctBuildEquipped, shares };
}

/**
 * Parse the six end-use blocks of a tech-mix entry. Used for scenario entries
 * and for the database defaults alike.
 */
export function parseTechMixEntries(
  source: Record<string, unknown>,
  path: string,
  collector: ViolationCollector,
  options: TechMixParseOptions
): TechMixEntries | undefined {
  const block = (endUse: EndUse): EndUseMix | undefined => {
    const raw = requireField(source, endUse, `${path}.${endUse}`, collector);
    return raw === undefined
      ? undefined
      : parseEndUseMix(endUse, raw, `${path}.${endUse}`, collector, options);
  };

  const spaceHeating = block('space_heating');
  const heating = source.space_heating;
  const circulation = isRecord(heating)
    ? readFraction(heating, CIRCULATION_FIELD, `${path}.space_heating`, collector)
    : undefined;
  const spaceCooling = block('space_cooling');
  const waterHeating = block('water_heating');
  const cooking = block('cooking');
  const lighting = block('lighting');
  const appliances = block('appliances');

  if (
    !spaceHeating ||
    circulation === undefined ||
    !spaceCooling ||
    !waterHeating ||
    !cooking ||
    !lighting ||
    !appliances
  ) {
    return undefined;
  }

  return {
    space_heating: { ...spaceHeating, electricityInCirculation: circulation },
    space_cooling: spaceCooling,
    water_heating: waterHeating,
    cooking,
    lighting,
    appliances,
  };
}
