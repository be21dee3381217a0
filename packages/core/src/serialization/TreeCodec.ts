import type { z } from 'zod';
import { Node } from '../entities/Node.js';
import { Tree } from '../entities/Tree.js';
import type { NodeId } from '../entities/TreeConstants.js';
import { validateTree } from '../entities/TreeValidation.js';
import { DeserializationError } from '../errors/tree.js';
import {
  type NodeRecordOf,
  type RawNodeRecord,
  type SerializationMode,
  type TreeRecord,
  rawTreeRecordSchema,
} from '../schemas/tree-record.js';
import { cfg } from '../utils/config.js';
import { createModuleLogger, logError } from '../utils/logger.js';

const logger = createModuleLogger('codec');

export interface TreeCodecOptions<Q extends NodeId, T> {
  /** Validates each `node_id`, `parent` and child id */
  idSchema: z.ZodType<Q>;
  /** Validates each non-null `value` */
  valueSchema: z.ZodType<T>;
  /** Defaults to the TREE_SERIALIZATION_MODE setting */
  mode?: SerializationMode;
}

type Checked<V> = { ok: true; value: V } | { ok: false };

/**
 * Converts trees to and from plain records.
 *
 * Full records list every node's children explicitly. Compact records omit
 * them; decoding walks the nodes in array order and re-attaches each one to
 * its parent, so children come back in record order. A compact round trip
 * reproduces the linkage only while every child list matches the order its
 * nodes appear in the collection. `sortChildren` breaks that, and so does
 * `removeNode` with `RetainChildren`, which appends the moved children after
 * their new siblings.
 */
export class TreeCodec<Q extends NodeId, T> {
  readonly mode: SerializationMode;

  constructor(private readonly options: TreeCodecOptions<Q, T>) {
    this.mode = options.mode ?? cfg.TREE_SERIALIZATION_MODE;
  }

  encode(tree: Tree<Q, T>): TreeRecord<Q, T> {
    const nodes = tree
      .getNodes()
      .toArray()
      .map((node): NodeRecordOf<Q, T> => {
        const { id, value, children, parent } = node.toRecord();
        return this.mode === 'full'
          ? { node_id: id, value, children, parent }
          : { node_id: id, value, parent };
      });

    const name = tree.getName();
    return name === null ? { nodes } : { name, nodes };
  }

  stringify(tree: Tree<Q, T>): string {
    return JSON.stringify(this.encode(tree));
  }

  /**
   * Build a tree from a record.
   *
   * @throws DeserializationError when the record is malformed, an id or value
   * fails its schema, or the decoded linkage breaks the tree invariants
   */
  decode(input: unknown): Tree<Q, T> {
    const envelope = rawTreeRecordSchema.safeParse(input);
    if (!envelope.success) {
      const problems = envelope.error.issues.map(
        (issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`
      );
      throw this.reject(new DeserializationError('Malformed tree record', problems));
    }

    const issues: string[] = [];
    const nodes: Node<Q, T>[] = [];
    envelope.data.nodes.forEach((raw, index) => {
      const node = this.decodeNode(raw, `nodes.${index}`, issues);
      if (node) nodes.push(node);
    });

    if (issues.length > 0) {
      throw this.reject(new DeserializationError('Tree record contains invalid nodes', issues));
    }

    if (this.mode === 'compact') {
      relinkChildren(nodes);
    }

    const tree = Tree.fromNodes(envelope.data.name ?? null, nodes);
    const validation = validateTree(tree);
    if (!validation.isValid) {
      const problems = validation.errors.map((error) => error.message);
      throw this.reject(
        new DeserializationError('Decoded tree violates tree invariants', problems, {
          mode: this.mode,
        })
      );
    }

    logger.debug({ mode: this.mode, nodes: nodes.length }, 'Tree decoded');
    return tree;
  }

  /**
   * @throws DeserializationError when `text` is not JSON or not a valid tree
   */
  parse(text: string): Tree<Q, T> {
    let input: unknown;
    try {
      input = JSON.parse(text);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw this.reject(
        new DeserializationError('Tree record is not valid JSON', [message], { cause: error })
      );
    }
    return this.decode(input);
  }

  private reject(error: DeserializationError): DeserializationError {
    logError(logger, error, { mode: this.mode }, 'debug');
    return error;
  }

  private decodeNode(raw: RawNodeRecord, path: string, issues: string[]): Node<Q, T> | null {
    const { idSchema, valueSchema } = this.options;

    const id = check(idSchema, raw.node_id, `${path}.node_id`, issues);
    const value = check(valueSchema.nullable(), raw.value ?? null, `${path}.value`, issues);
    const parent = check(idSchema.nullable(), raw.parent ?? null, `${path}.parent`, issues);

    let children: Q[] = [];
    if (this.mode === 'full') {
      if (raw.children === undefined) {
        issues.push(`${path}.children: Required in full mode`);
        return null;
      }
      const checked = check(idSchema.array(), raw.children, `${path}.children`, issues);
      if (!checked.ok) return null;
      children = checked.value;
    }

    if (!id.ok || !value.ok || !parent.ok) return null;
    return Node.fromRecord<Q, T>({ id: id.value, value: value.value, children, parent: parent.value });
  }
}

export function createTreeCodec<Q extends NodeId, T>(
  options: TreeCodecOptions<Q, T>
): TreeCodec<Q, T> {
  return new TreeCodec(options);
}

function check<V>(
  schema: z.ZodType<V>,
  input: unknown,
  path: string,
  issues: string[]
): Checked<V> {
  const result = schema.safeParse(input);
  if (result.success) {
    return { ok: true, value: result.data };
  }
  for (const issue of result.error.issues) {
    const suffix = issue.path.length > 0 ? `.${issue.path.join('.')}` : '';
    issues.push(`${path}${suffix}: ${issue.message}`);
  }
  return { ok: false };
}

/**
 * Rebuild child lists from parent pointers, in record order.
 */
function relinkChildren<Q extends NodeId, T>(nodes: Node<Q, T>[]): void {
  for (const node of nodes) {
    const parentId = node.getParentId();
    if (parentId === null) continue;
    const parent = nodes.find((candidate) => candidate.getNodeId() === parentId);
    parent?.addChild(node);
  }
}
