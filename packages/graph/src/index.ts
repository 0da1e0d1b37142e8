import type { JoinEdge, SemanticEdge, SemanticNode, TableNode } from '@lattice/core';
import { Graph } from './graph';

export { Graph } from './graph';
export type { EdgeLike, NodeLike } from './graph';
export * from './stats';
export * from './diff';

export type SchemaGraph = Graph<TableNode, JoinEdge>;
export type SemanticGraph = Graph<SemanticNode, SemanticEdge>;

export interface Catalog {
  schema: SchemaGraph;
  semantic: SemanticGraph;
}

export const createSchemaGraph = (): SchemaGraph => new Graph<TableNode, JoinEdge>({ directed: true });
export const createSemanticGraph = (): SemanticGraph => new Graph<SemanticNode, SemanticEdge>({ directed: true });
