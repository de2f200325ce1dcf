/** Minimal shape a unit needs to take part in the hierarchy. */
export interface HierarchyUnit {
  id: number;
  parentUnitId: number | null;
}

export type TreeBuilder<T extends HierarchyUnit, R> = (unit: T, children: R[], depth: number) => R;
