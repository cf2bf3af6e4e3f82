/**
 * Tree aligner: pairs removed and added paths of two flattened snapshots
 * into rename/move candidates.
 *
 * Matching is greedy over candidates sorted by score (descending) and then
 * by (removed, added) in code-unit order. It is not an optimal assignment;
 * the tie-break is part of the output contract.
 */

import { type Diagnostic, type AmbiguousMatchDetails, DIAGNOSTIC_CODES } from '../diag/codes.js';
import {
  type FlatIndex,
  fieldPaths,
  leafName,
  parentPath,
} from '../tree/flatten.js';
import { type NodeKind, type SchemaNode, declaredKind } from '../tree/schema-node.js';
import type { SimilarityWeights } from '../types/options.js';
import { compareCodeUnits } from '../util/canonical-json.js';

/** Derived descriptor of one node, used only for scoring. */
export interface Signature {
  kind: NodeKind;
  minimum: number | null;
  maximum: number | null;
  enumSize: number;
  itemKind: NodeKind | null;
  childKeys: ReadonlySet<string>;
  required: ReadonlySet<string>;
}

export function signatureOf(node: SchemaNode): Signature {
  return {
    kind: declaredKind(node),
    minimum: node.kind === 'scalar' ? (node.minimum ?? null) : null,
    maximum: node.kind === 'scalar' ? (node.maximum ?? null) : null,
    enumSize: node.kind === 'scalar' ? (node.enum?.length ?? 0) : 0,
    itemKind: node.kind === 'array' ? declaredKind(node.items) : null,
    childKeys:
      node.kind === 'object' ? new Set(node.properties.keys()) : new Set(),
    required: node.kind === 'object' ? new Set(node.required) : new Set(),
  };
}

function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 && b.size === 0) return 1;
  let shared = 0;
  for (const key of a) {
    if (b.has(key)) shared++;
  }
  return shared / (a.size + b.size - shared);
}

/**
 * Heuristic structural resemblance in [0, 1] with the default weights.
 * Terms are summed in a fixed order so equal inputs give bit-equal scores.
 */
export function similarity(
  a: Signature,
  b: Signature,
  weights: SimilarityWeights
): number {
  let score = 0;
  if (a.kind === b.kind) score += weights.kind;
  if (a.kind === 'object' && b.kind === 'object') {
    score += weights.childKeys * jaccard(a.childKeys, b.childKeys);
  }
  if ((a.enumSize > 0) === (b.enumSize > 0)) score += weights.enumPresence;
  if ((a.itemKind === null) === (b.itemKind === null)) {
    score += weights.itemsPresence;
  }
  if (a.itemKind !== null && a.itemKind === b.itemKind) {
    score += weights.itemKind;
  }
  return score;
}

export type MatchKind = 'rename' | 'move' | 'move+rename';

export interface Match {
  from: string;
  to: string;
  score: number;
  kind: MatchKind;
}

export interface Candidate {
  from: string;
  to: string;
  score: number;
}

export interface Alignment {
  matches: Match[];
  /** Removed paths left unmatched, sorted. */
  dropped: string[];
  /** Added paths left unmatched, sorted. */
  added: string[];
  diagnostics: Diagnostic<AmbiguousMatchDetails>[];
}

export interface AlignOptions {
  threshold: number;
  weights: SimilarityWeights;
}

export function classifyMatch(from: string, to: string): MatchKind {
  const sameParent = parentPath(from) === parentPath(to);
  const sameLeaf = leafName(from) === leafName(to);
  if (sameParent) return 'rename';
  if (sameLeaf) return 'move';
  return 'move+rename';
}

export function compareCandidates(a: Candidate, b: Candidate): number {
  if (a.score !== b.score) return b.score - a.score;
  return compareCodeUnits(a.from, b.from) || compareCodeUnits(a.to, b.to);
}

/** Scored pairs at or above the threshold, in acceptance order. */
export function scoreCandidates(
  indexA: FlatIndex,
  indexB: FlatIndex,
  removed: readonly string[],
  added: readonly string[],
  options: AlignOptions
): Candidate[] {
  const addedSignatures: Array<[string, Signature]> = [];
  for (const path of added) {
    const node = indexB.get(path);
    if (node) addedSignatures.push([path, signatureOf(node)]);
  }

  const candidates: Candidate[] = [];
  for (const from of removed) {
    const node = indexA.get(from);
    if (!node) continue;
    const sig = signatureOf(node);
    for (const [to, other] of addedSignatures) {
      const score = similarity(sig, other, options.weights);
      if (score >= options.threshold) candidates.push({ from, to, score });
    }
  }
  return candidates.sort(compareCandidates);
}

export function align(
  indexA: FlatIndex,
  indexB: FlatIndex,
  options: AlignOptions
): Alignment {
  const removed = fieldPaths(indexA)
    .filter((path) => !indexB.has(path))
    .sort(compareCodeUnits);
  const added = fieldPaths(indexB)
    .filter((path) => !indexA.has(path))
    .sort(compareCodeUnits);

  const usedFrom = new Set<string>();
  const usedTo = new Set<string>();
  const matches: Match[] = [];
  const diagnostics: Diagnostic<AmbiguousMatchDetails>[] = [];

  for (const candidate of scoreCandidates(indexA, indexB, removed, added, options)) {
    if (usedFrom.has(candidate.from) || usedTo.has(candidate.to)) continue;
    usedFrom.add(candidate.from);
    usedTo.add(candidate.to);
    const kind = classifyMatch(candidate.from, candidate.to);
    matches.push({ ...candidate, kind });
    if (kind === 'move+rename') {
      diagnostics.push({
        code: DIAGNOSTIC_CODES.AMBIGUOUS_MATCH,
        severity: 'warn',
        path: candidate.from,
        details: { ...candidate },
      });
    }
  }

  return {
    matches,
    dropped: removed.filter((path) => !usedFrom.has(path)),
    added: added.filter((path) => !usedTo.has(path)),
    diagnostics,
  };
}
