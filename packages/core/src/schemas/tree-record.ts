import { z } from 'zod';
import type { NodeId } from '../entities/TreeConstants.js';

/**
 * Wire schemas for serialized trees.
 *
 * A tree record is `{ name?, nodes: [...] }`. Full node records carry
 * `node_id`, `value`, `children` and `parent`; compact ones drop `children`,
 * which are rebuilt from the parent pointers on load.
 *
 * The envelope schemas below check shape only. Ids and values are checked
 * field by field against the caller's schemas by the codec.
 */

export const serializationMode = z.enum(['full', 'compact']);
export type SerializationMode = z.infer<typeof serializationMode>;

export interface FullNodeRecord<Q extends NodeId, T> {
  node_id: Q;
  value: T | null;
  children: Q[];
  parent: Q | null;
}

export type CompactNodeRecord<Q extends NodeId, T> = Omit<FullNodeRecord<Q, T>, 'children'>;

export type NodeRecordOf<Q extends NodeId, T> = FullNodeRecord<Q, T> | CompactNodeRecord<Q, T>;

export interface TreeRecord<Q extends NodeId, T> {
  name?: string;
  nodes: NodeRecordOf<Q, T>[];
}

// A missing `value` or `parent` reads as null.
export const rawNodeRecordSchema = z.object({
  node_id: z.unknown(),
  value: z.unknown(),
  children: z.array(z.unknown()).optional(),
  parent: z.unknown(),
});

export type RawNodeRecord = z.infer<typeof rawNodeRecordSchema>;

export const rawTreeRecordSchema = z.object({
  name: z.string().nullish(),
  nodes: z.array(rawNodeRecordSchema),
});

export type RawTreeRecord = z.infer<typeof rawTreeRecordSchema>;
