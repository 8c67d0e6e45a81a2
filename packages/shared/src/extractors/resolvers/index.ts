/**
 * Strategy Resolvers
 *
 * Dispatch table from strategy name to resolver.
 */

import type { FieldStrategy } from '../../types';
import type { BlockGraph } from '../block-graph';
import { isStrategyName, type FieldResolver, type StrategyName } from '../types';
import { resolveKeyValueSet } from './key-value-set';
import { resolveNextLine } from './next-line';
import { resolveSameLine } from './same-line';
import { resolveTable } from './table';

export const RESOLVERS: Readonly<Record<StrategyName, FieldResolver>> = Object.freeze({
  keyValueSet: resolveKeyValueSet,
  nextLine: resolveNextLine,
  sameLine: resolveSameLine,
  table: resolveTable,
});

/**
 * Resolve one field. Unknown strategy names resolve to undefined.
 */
export function resolveField(graph: BlockGraph, field: FieldStrategy): string | undefined {
  if (!isStrategyName(field.strategy)) return undefined;
  return RESOLVERS[field.strategy](graph, field.key);
}

export { resolveKeyValueSet, followValueRelationships } from './key-value-set';
export { resolveNextLine } from './next-line';
export { resolveSameLine } from './same-line';
export { resolveTable } from './table';
