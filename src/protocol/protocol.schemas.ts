/**
 * Command Protocol Zod Schemas
 *
 * Semantic validation applied to every request before it is encoded and
 * after it is decoded.
 */

import { z } from 'zod';
import { DirectionSchema, MouseButtonSchema } from '../shared/schemas/index.js';

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;
const UINT32_MAX = 2 ** 32 - 1;

const Int32Schema = z.number().int().min(INT32_MIN).max(INT32_MAX);
const PositiveUint32Schema = z.number().int().min(1).max(UINT32_MAX);

export const ButtonStateSchema = z.enum(['down', 'up']);

export const ClickRequestSchema = z.object({
  type: z.literal('click'),
  x: Int32Schema.describe('X coordinate or delta'),
  y: Int32Schema.describe('Y coordinate or delta'),
  button: MouseButtonSchema,
  buttonStates: z.array(ButtonStateSchema).min(1).describe('Ordered button transitions'),
  repeat: PositiveUint32Schema.describe('Click units contained in buttonStates'),
  absolute: z.boolean().describe('Whether x/y are absolute screen pixels'),
});

export const MoveRequestSchema = z.object({
  type: z.literal('move'),
  dx: Int32Schema,
  dy: Int32Schema,
  steps: PositiveUint32Schema,
});

export const ScrollRequestSchema = z.object({
  type: z.literal('scroll'),
  direction: DirectionSchema,
  steps: PositiveUint32Schema,
});

export const MoveToRequestSchema = z.object({
  type: z.literal('move-to'),
  x: Int32Schema,
  y: Int32Schema,
});

export const CommandRequestSchema = z.discriminatedUnion('type', [
  ClickRequestSchema,
  MoveRequestSchema,
  ScrollRequestSchema,
  MoveToRequestSchema,
]);
