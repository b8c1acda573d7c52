import { BuildingUse, ConstructionPeriod } from '../constants/building-stock';
import { Archetype } from '../types';

/**
 * Read-only index of the regional archetypes by building use and construction
 * period
 */
export class ArchetypeRepository {
  private readonly byUse = new Map<BuildingUse, Archetype[]>();
  readonly size: number;

  constructor(archetypes: readonly Archetype[]) {
    this.size = archetypes.length;
    for (const archetype of archetypes) {
      const frozen = Object.freeze({ ...archetype });
      const list = this.byUse.get(archetype.buildingUse) ?? [];
      list.push(frozen);
      this.byUse.set(archetype.buildingUse, list);
    }
  }

  /**
   * Archetypes of one use, in inventory order
   */
  forUse(use: BuildingUse): readonly Archetype[] {
    return this.byUse.get(use) ?? [];
  }

  forUseAndPeriod(use: BuildingUse, period: ConstructionPeriod): readonly Archetype[] {
    return this.forUse(use).filter(archetype => archetype.constructionPeriod === period);
  }

  /**
   * Floor area of one use across all periods (m²)
   */
  totalFloorArea(use: BuildingUse): number {
    return this.forUse(use).reduce((sum, archetype) => sum + archetype.floorArea, 0);
  }
}
