import { describe, it, expect } from 'vitest';
import { UnitHierarchy } from '../engine/hierarchy/index.js';
import { NotFoundError, ValidationError } from '../lib/errors.js';

interface TestUnit {
  id: number;
  parentUnitId: number | null;
  name: string;
}

// 1 Board
// ├── 2 Engineering
// │   ├── 4 Platform
// │   └── 5 Apps
// │       └── 6 Mobile
// └── 3 Finance
// 7 Advisory (second root)
const units: TestUnit[] = [
  { id: 1, parentUnitId: null, name: 'Board' },
  { id: 2, parentUnitId: 1, name: 'Engineering' },
  { id: 3, parentUnitId: 1, name: 'Finance' },
  { id: 4, parentUnitId: 2, name: 'Platform' },
  { id: 5, parentUnitId: 2, name: 'Apps' },
  { id: 6, parentUnitId: 5, name: 'Mobile' },
  { id: 7, parentUnitId: null, name: 'Advisory' },
];

const ids = (list: TestUnit[]) => list.map((u) => u.id);

describe('UnitHierarchy', () => {
  const hierarchy = new UnitHierarchy(units);

  it('should expose roots in input order', () => {
    expect(ids(hierarchy.roots())).toEqual([1, 7]);
  });

  it('should list ancestors from the root down to the parent', () => {
    expect(ids(hierarchy.ancestors(6))).toEqual([1, 2, 5]);
    expect(hierarchy.ancestors(1)).toEqual([]);
  });

  it('should list descendants breadth first', () => {
    expect(ids(hierarchy.descendants(1))).toEqual([2, 3, 4, 5, 6]);
    expect(hierarchy.subtreeIds(5)).toEqual([5, 6]);
  });

  it('should compute depth from the root', () => {
    expect(hierarchy.depth(1)).toBe(0);
    expect(hierarchy.depth(6)).toBe(3);
    expect(hierarchy.maxDepth()).toBe(3);
  });

  it('should answer parent and child lookups', () => {
    expect(hierarchy.parentOf(4)?.name).toBe('Engineering');
    expect(hierarchy.parentOf(7)).toBeUndefined();
    expect(ids(hierarchy.childrenOf(2))).toEqual([4, 5]);
    expect(hierarchy.isLeaf(3)).toBe(true);
  });

  it('should detect moves that would close a cycle', () => {
    expect(hierarchy.wouldCreateCycle(2, 2)).toBe(true);
    expect(hierarchy.wouldCreateCycle(2, 6)).toBe(true);
    expect(hierarchy.wouldCreateCycle(2, 3)).toBe(false);
    expect(hierarchy.wouldCreateCycle(2, null)).toBe(false);
  });

  it('should fold the forest into a nested tree', () => {
    type Node = { id: number; depth: number; children: Node[] };
    const tree = hierarchy.toTree<Node>((unit, children, depth) => ({ id: unit.id, depth, children }));

    expect(tree.map((n) => n.id)).toEqual([1, 7]);
    expect(tree[0].children.map((n) => n.id)).toEqual([2, 3]);
    expect(tree[0].children[0].children[1].children).toEqual([{ id: 6, depth: 3, children: [] }]);
  });

  it('should fold a subtree keeping absolute depth', () => {
    const [subtree] = hierarchy.toTree<string>(
      (unit, children, depth) => `${unit.name}@${depth}[${children.join(',')}]`,
      5,
    );

    expect(subtree).toBe('Apps@2[Mobile@3[]]');
  });

  it('should throw NotFoundError for an unknown unit', () => {
    expect(() => hierarchy.ancestors(99)).toThrow(NotFoundError);
  });

  it('should reject a cycle when building', () => {
    const build = () =>
      new UnitHierarchy([
        { id: 1, parentUnitId: 2 },
        { id: 2, parentUnitId: 1 },
      ]);

    expect(build).toThrow(ValidationError);
    expect(build).toThrow('Unit hierarchy contains a cycle: 1 -> 2');
  });

  it('should reject a dangling parent reference', () => {
    expect(() => new UnitHierarchy([{ id: 1, parentUnitId: 9 }])).toThrow(
      'Unit 1 references unknown parent unit 9',
    );
  });

  it('should reject duplicate ids', () => {
    expect(
      () =>
        new UnitHierarchy([
          { id: 1, parentUnitId: null },
          { id: 1, parentUnitId: null },
        ]),
    ).toThrow('Duplicate unit id 1');
  });
});
