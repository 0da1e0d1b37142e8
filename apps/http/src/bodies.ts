// apps/http/src/bodies.ts
import { z } from 'zod';

const Name = z.string().trim().min(1).max(256);

export const JoinPathBody = z.object({
  source: Name,
  target: Name,
}).strict();

export const JoinPlanBody = z.object({
  tables: z.array(Name).min(1).max(64),
}).strict();

export const ResolveConceptBody = z.object({
  intent: Name,
  field: Name,
  tableScope: Name.optional(),
  tieBreak: z.enum(['lexicographic', 'strict']).optional(),
}).strict();

export const InterpretationsParams = z.object({ field: Name });
export const InterpretationsQuery = z.object({ tableScope: Name.optional() });

export const RankIntentsBody = z.object({
  fields: z.array(z.object({ table: Name, column: Name }).strict()).min(1).max(500),
}).strict();

export const PersistBody = z.object({
  graphs: z.array(z.enum(['schema', 'semantic'])).min(1).default(['schema', 'semantic']),
  overwrite: z.boolean().default(false),
  batchSize: z.number().int().positive().max(100_000).optional(),
}).strict();
