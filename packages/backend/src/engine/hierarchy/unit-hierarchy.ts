import type { HierarchyUnit, TreeBuilder } from './types.js';
import { NotFoundError, ValidationError } from '../../lib/errors.js';

const NO_PARENT = -1;

/**
 * Read model over the unit parent relation. Units live in a flat array;
 * parent and child links are array indices. Building fails on duplicate
 * ids, dangling parent references and cycles, so every query below may
 * assume a forest.
 */
export class UnitHierarchy<T extends HierarchyUnit> {
  private readonly nodes: T[];
  private readonly indexById: Map<number, number>;
  private readonly parent: number[];
  private readonly children: number[][];
  private readonly rootIndices: number[];

  constructor(units: readonly T[]) {
    this.nodes = [...units];
    this.indexById = new Map();
    this.parent = new Array<number>(this.nodes.length).fill(NO_PARENT);
    this.children = this.nodes.map(() => []);
    this.rootIndices = [];

    this.nodes.forEach((unit, index) => {
      if (this.indexById.has(unit.id)) {
        throw new ValidationError(`Duplicate unit id ${unit.id}`);
      }
      this.indexById.set(unit.id, index);
    });

    this.nodes.forEach((unit, index) => {
      if (unit.parentUnitId === null) {
        this.rootIndices.push(index);
        return;
      }
      const parentIndex = this.indexById.get(unit.parentUnitId);
      if (parentIndex === undefined) {
        throw new ValidationError(
          `Unit ${unit.id} references unknown parent unit ${unit.parentUnitId}`,
        );
      }
      this.parent[index] = parentIndex;
      this.children[parentIndex].push(index);
    });

    this.assertAcyclic();
  }

  private assertAcyclic(): void {
    // 0 = unvisited, 1 = on the current walk, 2 = known to reach a root
    const state = new Array<number>(this.nodes.length).fill(0);

    for (let start = 0; start < this.nodes.length; start++) {
      const walk: number[] = [];
      let current = start;
      while (current !== NO_PARENT && state[current] === 0) {
        state[current] = 1;
        walk.push(current);
        current = this.parent[current];
      }
      if (current !== NO_PARENT && state[current] === 1) {
        const cycle = walk.slice(walk.indexOf(current)).map((i) => this.nodes[i].id);
        throw new ValidationError(`Unit hierarchy contains a cycle: ${cycle.join(' -> ')}`, {
          cycle,
        });
      }
      for (const index of walk) {
        state[index] = 2;
      }
    }
  }

  private indexOf(id: number): number {
    const index = this.indexById.get(id);
    if (index === undefined) {
      throw new NotFoundError('Unit', id);
    }
    return index;
  }

  get size(): number {
    return this.nodes.length;
  }

  has(id: number): boolean {
    return this.indexById.has(id);
  }

  get(id: number): T {
    return this.nodes[this.indexOf(id)];
  }

  all(): T[] {
    return [...this.nodes];
  }

  roots(): T[] {
    return this.rootIndices.map((i) => this.nodes[i]);
  }

  parentOf(id: number): T | undefined {
    const parentIndex = this.parent[this.indexOf(id)];
    return parentIndex === NO_PARENT ? undefined : this.nodes[parentIndex];
  }

  childrenOf(id: number): T[] {
    return this.children[this.indexOf(id)].map((i) => this.nodes[i]);
  }

  isLeaf(id: number): boolean {
    return this.children[this.indexOf(id)].length === 0;
  }

  /** Ancestors ordered from the root down to the direct parent. */
  ancestors(id: number): T[] {
    const result: T[] = [];
    let current = this.parent[this.indexOf(id)];
    while (current !== NO_PARENT) {
      result.push(this.nodes[current]);
      current = this.parent[current];
    }
    return result.reverse();
  }

  /** Descendants in breadth-first order, excluding the unit itself. */
  descendants(id: number): T[] {
    const result: T[] = [];
    const queue = [...this.children[this.indexOf(id)]];
    for (let head = 0; head < queue.length; head++) {
      const index = queue[head];
      result.push(this.nodes[index]);
      queue.push(...this.children[index]);
    }
    return result;
  }

  /** Ids of the unit and all of its descendants. */
  subtreeIds(id: number): number[] {
    return [id, ...this.descendants(id).map((unit) => unit.id)];
  }

  /** Roots have depth 0. */
  depth(id: number): number {
    let depth = 0;
    let current = this.parent[this.indexOf(id)];
    while (current !== NO_PARENT) {
      depth++;
      current = this.parent[current];
    }
    return depth;
  }

  maxDepth(): number {
    return this.nodes.reduce((deepest, unit) => Math.max(deepest, this.depth(unit.id)), 0);
  }

  /**
   * True when making `parentId` the parent of `id` would close a loop,
   * i.e. the new parent is the unit itself or one of its descendants.
   */
  wouldCreateCycle(id: number, parentId: number | null): boolean {
    if (parentId === null) return false;
    if (parentId === id) return true;
    if (!this.has(id)) return false;
    return this.descendants(id).some((unit) => unit.id === parentId);
  }

  /**
   * Fold the forest (or the subtree under `rootId`) bottom-up into a
   * nested structure.
   */
  toTree<R>(build: TreeBuilder<T, R>, rootId?: number): R[] {
    const fold = (index: number, depth: number): R =>
      build(
        this.nodes[index],
        this.children[index].map((child) => fold(child, depth + 1)),
        depth,
      );

    if (rootId !== undefined) {
      const index = this.indexOf(rootId);
      return [fold(index, this.depth(rootId))];
    }
    return this.rootIndices.map((index) => fold(index, 0));
  }
}
