import { describe, expect, it } from 'vitest';
import fc from 'fast-check';

import { diffSchemas } from '../../src/diff/diff-engine.js';
import { applyStructuralOperations } from '../../src/diff/replay.js';
import { MutationEngine } from '../../src/mutation/engine.js';
import { fieldPaths, flatten } from '../../src/tree/flatten.js';
import { type SchemaNode } from '../../src/tree/schema-node.js';
import { toDocument } from '../../src/tree/serialize.js';
import { createRandom } from '../../src/util/rng.js';
import { rootArbitrary, seedArbitrary } from '../fixtures/schema-arbitrary.js';

function requiredResolves(node: SchemaNode): boolean {
  if (node.kind === 'array') return requiredResolves(node.items);
  if (node.kind !== 'object') return true;
  return (
    node.required.every((name) => node.properties.has(name)) &&
    [...node.properties.values()].every((child) => requiredResolves(child))
  );
}

describe('mutation properties', () => {
  const engine = new MutationEngine();

  it('keeps every required name resolvable after each step', () => {
    const property = fc.property(rootArbitrary, seedArbitrary, (root, seed) => {
      const run = engine.evolve(root, 10, createRandom(seed));
      for (const record of run.versions) {
        expect(requiredResolves(record.schema.root)).toBe(true);
      }
    });
    fc.assert(property, { seed: 31_001, numRuns: 60 });
  });

  it('replays the same versions for the same seed and never touches the seed schema', () => {
    const property = fc.property(rootArbitrary, seedArbitrary, (root, seed) => {
      const before = JSON.stringify(toDocument(root));
      const first = engine.evolve(root, 6, createRandom(seed));
      const second = engine.evolve(root, 6, createRandom(seed));
      expect(JSON.stringify(second.versions.map((v) => [v.description, v.document]))).toBe(
        JSON.stringify(first.versions.map((v) => [v.description, v.document]))
      );
      expect(JSON.stringify(toDocument(root))).toBe(before);
    });
    fc.assert(property, { seed: 31_002, numRuns: 40 });
  });

  it('leaves earlier snapshots untouched by later steps', () => {
    const property = fc.property(rootArbitrary, seedArbitrary, (root, seed) => {
      const run = engine.startRun(root, createRandom(seed));
      const first = run.step();
      const frozen = JSON.stringify(first.document);
      run.step();
      run.step();
      expect(JSON.stringify(first.schema.toDocument())).toBe(frozen);
    });
    fc.assert(property, { seed: 31_003, numRuns: 40 });
  });

  it('diffs of consecutive versions replay cleanly', () => {
    const property = fc.property(rootArbitrary, seedArbitrary, (root, seed) => {
      const run = engine.evolve(root, 5, createRandom(seed));
      let previous: SchemaNode = root;
      for (const record of run.versions) {
        const next = record.schema.root;
        const { operations } = diffSchemas(previous, next);
        const replayed = applyStructuralOperations(fieldPaths(flatten(previous)), operations);
        expect([...replayed].sort()).toEqual(fieldPaths(flatten(next)).sort());
        previous = next;
      }
    });
    fc.assert(property, { seed: 31_004, numRuns: 30 });
  });
});
