export { UnitHierarchy } from './unit-hierarchy.js';
export type { HierarchyUnit, TreeBuilder } from './types.js';
