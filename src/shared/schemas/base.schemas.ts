/**
 * Shared Zod schemas for base types
 *
 * Runtime validation for values that cross a process boundary
 * (scanner output files, configuration).
 */

import { z } from 'zod';

// ===== GEOMETRY =====

export const BoundingBoxSchema = z.object({
  x: z.number().describe('Left edge in screen pixels'),
  y: z.number().describe('Top edge in screen pixels'),
  width: z.number().nonnegative().describe('Width in pixels'),
  height: z.number().nonnegative().describe('Height in pixels'),
});

export const ScreenSizeSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

// ===== ELEMENT =====

export const ElementSchema = z.object({
  id: z.string().min(1).describe('Opaque backend handle'),
  boundingBox: BoundingBoxSchema,
  role: z.string().default('unknown').describe('Backend role name'),
});

export const ElementListSchema = z.array(ElementSchema);

// ===== ENUMS =====

export const MouseButtonSchema = z.enum(['left', 'right', 'middle']);

export const DirectionSchema = z.enum(['up', 'down', 'left', 'right']);

export type ScreenSize = z.infer<typeof ScreenSizeSchema>;
